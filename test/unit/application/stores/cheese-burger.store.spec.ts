import { CheeseBurgerStore } from '@application/stores';
import { UnrecognizedBurgerTypeError } from '@application/errors';
import { CheeseBurger, DeluxeCheeseBurger } from '@domain/entities';

describe('CheeseBurgerStore', () => {
  let store: CheeseBurgerStore;

  beforeEach(() => {
    store = new CheeseBurgerStore();
  });

  it('should describe its menu', () => {
    expect(store.name).toBe('cheese');
    expect(store.menu).toEqual(['CHEESE', 'DELUXE_CHEESE']);
  });

  describe('createBurger', () => {
    it('should map CHEESE to a CheeseBurger', () => {
      const result = store.createBurger('CHEESE');

      expect(result.isRight()).toBe(true);
      expect(result.value).toBeInstanceOf(CheeseBurger);
    });

    it('should map DELUXE_CHEESE to a DeluxeCheeseBurger', () => {
      const result = store.createBurger('DELUXE_CHEESE');

      expect(result.isRight()).toBe(true);
      expect(result.value).toBeInstanceOf(DeluxeCheeseBurger);
    });

    it('should reject vegan burgers instead of substituting one', () => {
      const result = store.createBurger('VEGAN');

      expect(result.isLeft()).toBe(true);
      expect(result.value).toBeInstanceOf(UnrecognizedBurgerTypeError);
      expect(result.value).toMatchObject({
        code: 'UNRECOGNIZED_BURGER_TYPE',
        storeName: 'cheese',
        burgerType: 'VEGAN',
        message: "Store 'cheese' does not make 'VEGAN'. Available: CHEESE, DELUXE_CHEESE",
      });
    });
  });

  describe('order', () => {
    it.each([
      ['CHEESE', 'CheeseBurger'],
      ['DELUXE_CHEESE', 'DeluxeCheeseBurger'],
    ])('should serve %s as %s', (type, name) => {
      const result = store.order(type);

      if (!result.isRight()) {
        throw new Error(`expected ${type} to be served`);
      }
      expect(result.value.getName()).toBe(name);
      expect(result.value.steps).toEqual(['prepare', 'cook', 'serve']);
      expect(result.value.isServed()).toBe(true);
    });

    it('should return independent burgers for repeated orders', () => {
      const first = store.order('CHEESE');
      const second = store.order('CHEESE');

      if (!first.isRight() || !second.isRight()) {
        throw new Error('expected both orders to be served');
      }
      expect(first.value).not.toBe(second.value);
      expect(first.value.id.equals(second.value.id)).toBe(false);
      expect(first.value.recipe.equals(second.value.recipe)).toBe(true);
      expect(first.value.kitchenLog).toEqual(second.value.kitchenLog);
    });
  });
});
