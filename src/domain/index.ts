/**
 * DOMAIN LAYER
 *
 * The burgers themselves. No frameworks and no knowledge of stores or hosts.
 *
 * Contains:
 * - Entities: the abstract Burger and its variants (CheeseBurger, VeganBurger, ...)
 * - Value Objects: BurgerId, BurgerStage, BurgerRecipe
 * - Exceptions: InvalidValueException, InvalidBurgerStageException
 *
 * Rules:
 * - NO imports from application or infrastructure layers
 * - Pure TypeScript only
 */

export * from './entities';
export * from './value-objects';
export * from './exceptions';
