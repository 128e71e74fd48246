/**
 * Base class for all application-level errors.
 * These errors are returned as the left side of an Either,
 * not thrown (domain rule violations are thrown from the domain layer).
 */
export abstract class ApplicationError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): { code: string; message: string; name: string } {
    return {
      code: this.code,
      message: this.message,
      name: this.name,
    };
  }
}

// ============ Store Errors ============

export class UnrecognizedBurgerTypeError extends ApplicationError {
  readonly code = 'UNRECOGNIZED_BURGER_TYPE';

  constructor(
    public readonly storeName: string,
    public readonly burgerType: string,
    public readonly supportedTypes: readonly string[],
  ) {
    super(
      `Store '${storeName}' does not make '${burgerType}'. Available: ${supportedTypes.join(', ')}`,
    );
  }
}

export class StoreNotFoundError extends ApplicationError {
  readonly code = 'STORE_NOT_FOUND';

  constructor(storeName: string) {
    super(`Store '${storeName}' not found`);
  }
}

// ============ Validation Errors ============

export class ValidationError extends ApplicationError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
  }
}

// ============ Generic Errors ============

export class UnexpectedError extends ApplicationError {
  readonly code = 'UNEXPECTED_ERROR';

  constructor(reason: string) {
    super(`An unexpected error occurred: ${reason}`);
  }
}

export type OrderBurgerError =
  | UnrecognizedBurgerTypeError
  | StoreNotFoundError
  | ValidationError
  | UnexpectedError;
