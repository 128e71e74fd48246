/**
 * Either type for explicit error handling.
 *
 * Either<L, R> represents a value that can be one of two types:
 * - Left<L>: a failure, such as a store asked for a burger it does not make
 * - Right<R>: a success
 *
 * @example
 * ```typescript
 * const result = cheeseStore.order('CHEESE');
 * if (result.isRight()) {
 *   console.log(result.value.getName()); // CheeseBurger
 * }
 * ```
 */

// Left represents failure
export class Left<L> {
  constructor(public readonly value: L) {}

  isLeft(): this is Left<L> {
    return true;
  }

  isRight(): this is Right<never> {
    return false;
  }
}

// Right represents success
export class Right<R> {
  constructor(public readonly value: R) {}

  isLeft(): this is Left<never> {
    return false;
  }

  isRight(): this is Right<R> {
    return true;
  }
}

export type Either<L, R> = Left<L> | Right<R>;

export const left = <L, R = never>(value: L): Either<L, R> => new Left(value);
export const right = <L = never, R = unknown>(value: R): Either<L, R> => new Right(value);

// Apply one of two functions depending on the case
export const fold = <L, R, T>(
  either: Either<L, R>,
  onLeft: (l: L) => T,
  onRight: (r: R) => T,
): T => (either instanceof Left ? onLeft(either.value) : onRight(either.value));
