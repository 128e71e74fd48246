export {
  ApplicationError,
  UnrecognizedBurgerTypeError,
  StoreNotFoundError,
  ValidationError,
  UnexpectedError,
  OrderBurgerError,
} from './application.errors';
