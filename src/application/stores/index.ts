export { BurgerStore } from './burger.store';
export { CheeseBurgerStore, CHEESE_BURGER_MENU, CheeseBurgerType } from './cheese-burger.store';
export { VeganBurgerStore, VEGAN_BURGER_MENU, VeganBurgerType } from './vegan-burger.store';
