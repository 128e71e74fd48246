import { DomainException } from './domain.exception';

/**
 * Thrown when a lifecycle step is called out of order or more than once.
 */
export class InvalidBurgerStageException extends DomainException {
  constructor(
    burgerName: string,
    public readonly step: string,
    public readonly currentStage: string,
  ) {
    super(`Cannot ${step} ${burgerName} in "${currentStage}" stage`, 'INVALID_BURGER_STAGE');
  }
}
