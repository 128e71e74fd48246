/**
 * DTOs for the burger ordering use case.
 */

/**
 * Input for ordering a burger from a named store.
 */
export interface OrderBurgerInputDto {
  /** Store to order from (e.g. "cheese", "vegan") */
  readonly storeName: string;

  /** Burger type on that store's menu (e.g. "CHEESE", "DELUXE_VEGAN") */
  readonly burgerType: string;
}

// ============ Output DTOs ============

export interface KitchenLogEntryOutputDto {
  readonly step: string;
  readonly note: string;
}

/**
 * A burger that went through the whole kitchen.
 */
export interface BurgerOutputDto {
  readonly burgerId: string;
  readonly name: string;
  readonly storeName: string;
  readonly stage: string;
  readonly base: string;
  readonly sauce: string;
  readonly toppings: string[];
  readonly kitchenLog: KitchenLogEntryOutputDto[];
}

export interface StoreMenuOutputDto {
  readonly storeName: string;
  readonly burgerTypes: string[];
}
