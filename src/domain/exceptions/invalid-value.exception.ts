import { DomainException } from './domain.exception';

/**
 * Thrown when a value object receives an invalid value.
 * Examples: empty BurgerId, unknown stage, duplicate topping.
 */
export class InvalidValueException extends DomainException {
  constructor(valueObjectName: string, reason: string) {
    super(`Invalid ${valueObjectName}: ${reason}`, 'INVALID_VALUE');
  }
}
