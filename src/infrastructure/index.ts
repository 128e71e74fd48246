/**
 * INFRASTRUCTURE LAYER
 *
 * Hosts the kitchen inside a NestJS application context.
 *
 * Contains:
 * - Kitchen: NestJS wiring for the burger stores and the ordering use case
 * - Counter: the host collaborator that takes customer orders
 * - Config: environment validation and typed access
 * - Observability: pino logging
 *
 * Rules:
 * - CAN import from domain and application layers
 * - Contains all framework-specific wiring (NestJS, pino)
 */

export * from './config';
export * from './counter';
export * from './kitchen';
export * from './observability/logging';
