export { Burger, BurgerStep, KitchenLogEntry } from './burger.entity';
export { CheeseBurger } from './cheese-burger.entity';
export { DeluxeCheeseBurger } from './deluxe-cheese-burger.entity';
export { VeganBurger } from './vegan-burger.entity';
export { DeluxeVeganBurger } from './deluxe-vegan-burger.entity';
