/**
 * Container Fleet - Containers Module
 *
 * Serial numbers, per-kind rules, and container load/empty operations.
 */

export * from './serialNumbers';
export * from './containerBehaviors';
export * from './containerOperations';
