/**
 * Error types shared across the pipeline
 */

export class ConfigError extends Error {
  constructor(
    message: string,
    public keys: string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export class FetchError extends Error {
  constructor(
    message: string,
    public url: string,
    public status?: number,
  ) {
    super(message);
    this.name = "FetchError";
  }
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public field?: string,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Normalizes a caught value into an Error for logging */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === "string" ? value : String(value));
}
