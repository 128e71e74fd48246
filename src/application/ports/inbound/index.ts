// Order Burger Port
export { IOrderBurgerPort } from './order-burger.port';
