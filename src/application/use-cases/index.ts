export { OrderBurgerUseCase } from './order-burger.use-case';
