import { BurgerRecipe } from '../burger-recipe.vo';
import { InvalidValueException } from '../../exceptions';

describe('BurgerRecipe', () => {
  const createRecipe = (toppings: string[] = ['cheddar', 'onion']): BurgerRecipe =>
    BurgerRecipe.create({ base: 'beef patty on a bun', sauce: 'ketchup', toppings });

  describe('create', () => {
    it('should trim base and sauce', () => {
      const recipe = BurgerRecipe.create({ base: '  beef patty ', sauce: ' mustard ', toppings: [] });

      expect(recipe.base).toBe('beef patty');
      expect(recipe.sauce).toBe('mustard');
    });

    it('should normalize toppings', () => {
      const recipe = createRecipe([' Cheddar ', 'ONION']);

      expect(recipe.toppingList()).toEqual(['cheddar', 'onion']);
    });

    it('should throw for empty base', () => {
      expect(() => BurgerRecipe.create({ base: ' ', sauce: 'ketchup', toppings: [] })).toThrow(
        'Invalid BurgerRecipe: base cannot be empty',
      );
    });

    it('should throw for empty sauce', () => {
      expect(() => BurgerRecipe.create({ base: 'patty', sauce: '', toppings: [] })).toThrow(
        'Invalid BurgerRecipe: sauce cannot be empty',
      );
    });

    it('should throw for duplicate toppings', () => {
      expect(() => createRecipe(['onion', 'Onion'])).toThrow(InvalidValueException);
      expect(() => createRecipe(['onion', 'Onion'])).toThrow(
        'Invalid BurgerRecipe: duplicate topping "Onion"',
      );
    });

    it('should throw for blank toppings', () => {
      expect(() => createRecipe(['onion', '  '])).toThrow('toppings cannot be blank');
    });
  });

  describe('toppings', () => {
    it('should check toppings case-insensitively', () => {
      const recipe = createRecipe();

      expect(recipe.hasTopping('Cheddar')).toBe(true);
      expect(recipe.hasTopping('bacon')).toBe(false);
    });

    it('should not expose the internal set', () => {
      const recipe = createRecipe();
      const toppings = recipe.toppings;

      expect(toppings.size).toBe(2);
      recipe.toppingList().push('bacon');
      expect(recipe.hasTopping('bacon')).toBe(false);
    });
  });

  describe('equals', () => {
    it('should ignore topping order', () => {
      expect(createRecipe(['cheddar', 'onion']).equals(createRecipe(['onion', 'cheddar']))).toBe(
        true,
      );
    });

    it('should compare topping sets', () => {
      expect(createRecipe(['cheddar']).equals(createRecipe(['cheddar', 'onion']))).toBe(false);
    });
  });

  it('should describe the recipe', () => {
    expect(createRecipe(['onion', 'cheddar']).toString()).toBe(
      'beef patty on a bun with ketchup, topped with cheddar, onion',
    );
    expect(createRecipe([]).toString()).toBe('beef patty on a bun with ketchup');
  });
});
