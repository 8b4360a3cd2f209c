/**
 * Container Fleet
 *
 * Cargo containers (liquid, gas, refrigerated) and the container ships that
 * carry them:
 * - Container construction with validated specs and serial numbers
 * - Cargo loading limits and hazard notification per container kind
 * - Ship capacity checks (container count and total weight)
 * - Load, unload, replace and transfer between ships
 * - Ship reports, logging and environment configuration
 */

export * from './types';
export * from './errors';
export * from './schema';
export * from './logging';
export * from './config';
export * from './containers';
export * from './ship';
export * from './scenario';
