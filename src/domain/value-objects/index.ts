export { BurgerId } from './burger-id.vo';
export { BurgerStage, BurgerStageValue } from './burger-stage.vo';
export { BurgerRecipe } from './burger-recipe.vo';
