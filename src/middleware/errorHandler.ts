import { Request, Response, NextFunction } from "express";
import { AppError, HttpError } from "../utils/httpError";
import logger from "../utils/logger";

export function notFound(req: Request, res: Response, next: NextFunction) {
  next(new HttpError(404, `Cannot ${req.method} ${req.path}`, "NOT_FOUND"));
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  // express only treats four-argument middleware as an error handler
  next: NextFunction,
) {
  if (err instanceof HttpError) {
    return res
      .status(err.status)
      .json({ code: err.code, message: err.message, details: err.details });
  }
  logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  const code = err instanceof AppError ? err.code : "INTERNAL_ERROR";
  res.status(500).json({ code, message: "Internal Server Error" });
}
