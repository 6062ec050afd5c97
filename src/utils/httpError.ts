export class AppError extends Error {
  code: string;
  details?: unknown;
  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class HttpError extends AppError {
  status: number;
  constructor(status: number, message: string, code = "HTTP_ERROR", details?: unknown) {
    super(message, code, details);
    this.status = status;
  }
}

// missing or malformed environment; fatal before anything starts
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, "INVALID_CONFIG", details);
  }
}

export class StoreError extends AppError {
  constructor(message: string, code = "STORE_ERROR", details?: unknown) {
    super(message, code, details);
  }
}
