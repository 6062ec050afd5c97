import { z } from "zod";
import { ConfigError } from "../utils/httpError";

const required = (name: string) =>
  z.string({ required_error: `${name} is not defined` }).trim().min(1, `${name} is empty`);

const EnvSchema = z.object({
  BOT_TOKEN: required("BOT_TOKEN"),
  TMDB_API_KEY: required("TMDB_API_KEY"),
  MONGODB_URI: required("MONGODB_URI"),
  MONGO_DB_NAME: z.string().min(1).default("moviesdb"),
  MONGO_COLLECTION: z.string().min(1).default("movies"),
  PORT: z.coerce.number().int().positive().default(4000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  TMDB_BASE_URL: z.string().url().default("https://api.themoviedb.org/3"),
  TMDB_IMAGE_BASE_URL: z
    .string()
    .url()
    .default("https://image.tmdb.org/t/p/original"),
  TELEGRAM_API_URL: z.string().url().default("https://api.telegram.org"),
  TELEGRAM_POLL_TIMEOUT_SECONDS: z.coerce.number().int().min(0).default(30),
});

export interface AppConfig {
  botToken: string;
  tmdbApiKey: string;
  mongoUri: string;
  dbName: string;
  collectionName: string;
  port: number;
  httpTimeoutMs: number;
  tmdbBaseUrl: string;
  tmdbImageBaseUrl: string;
  telegramApiUrl: string;
  pollTimeoutSeconds: number;
}

/**
 * Validates the process environment. Empty strings count as unset so that a
 * blank line in .env fails the same way a missing one does.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== ""),
  );
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const missing = parsed.error.issues.map((i) => i.message);
    throw new ConfigError(`Invalid environment: ${missing.join("; ")}`, parsed.error.issues);
  }
  const e = parsed.data;
  return {
    botToken: e.BOT_TOKEN,
    tmdbApiKey: e.TMDB_API_KEY,
    mongoUri: e.MONGODB_URI,
    dbName: e.MONGO_DB_NAME,
    collectionName: e.MONGO_COLLECTION,
    port: e.PORT,
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    tmdbBaseUrl: e.TMDB_BASE_URL,
    tmdbImageBaseUrl: e.TMDB_IMAGE_BASE_URL,
    telegramApiUrl: e.TELEGRAM_API_URL,
    pollTimeoutSeconds: e.TELEGRAM_POLL_TIMEOUT_SECONDS,
  };
}
