/**
 * Error types raised by the pipeline stages
 */

/**
 * Normalizes any thrown value into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === "string" ? value : String(value));
}

/** Transport failure, non-2xx status or malformed JSON on a catalog call */
export class FetchError extends Error {
  constructor(
    message: string,
    public url: string,
    public status?: number,
    public originalError?: Error,
  ) {
    super(message);
    this.name = "FetchError";
  }
}

/** A stage received an absent or empty value from its upstream stage */
export class MissingUpstreamDataError extends Error {
  constructor(
    public stage: string,
    public upstream: string,
  ) {
    super(`No data received from ${upstream} for ${stage}`);
    this.name = "MissingUpstreamDataError";
  }
}

/** Serialization or filesystem failure while writing the output file */
export class PersistenceError extends Error {
  constructor(
    message: string,
    public destination: string,
    public originalError?: Error,
  ) {
    super(message);
    this.name = "PersistenceError";
  }
}

/** A payload or argument does not have the expected shape */
export class ValidationError extends Error {
  constructor(
    message: string,
    public field?: string,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}
