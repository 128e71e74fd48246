/**
 * Base exception for rule violations inside the kitchen domain.
 * The `code` is stable and safe to log or compare against.
 */
export abstract class DomainException extends Error {
  protected constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}
