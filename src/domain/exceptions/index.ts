export { DomainException } from './domain.exception';
export { InvalidValueException } from './invalid-value.exception';
export { InvalidBurgerStageException } from './invalid-burger-stage.exception';
