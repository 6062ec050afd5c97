import winston from "winston";

const { combine, timestamp, errors, splat, printf, json } = winston.format;

const line = printf(({ level, message, timestamp: ts, stack }) => {
  return `${ts} - ${level.toUpperCase()} - ${stack ?? message}`;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  silent: process.env.NODE_ENV === "test",
  format: combine(
    timestamp(),
    errors({ stack: true }),
    splat(),
    process.env.LOG_FORMAT === "json" ? json() : line,
  ),
  transports: [new winston.transports.Console()],
});

export default logger;
