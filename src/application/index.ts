/**
 * APPLICATION LAYER
 *
 * Decides which burger gets made and hands results back to the host.
 *
 * Contains:
 * - Stores: the creators (BurgerStore and its CheeseBurgerStore / VeganBurgerStore variants)
 * - Use Cases: OrderBurgerUseCase, the host-facing entry point
 * - Ports: IOrderBurgerPort, how the outside world calls us
 * - DTOs: plain data returned to the host
 *
 * Rules:
 * - CAN import from domain layer
 * - CANNOT import from infrastructure layer
 */

export * from './common';
export * from './errors';
export * from './dtos';
export * from './ports';
export * from './stores';
export * from './use-cases';
