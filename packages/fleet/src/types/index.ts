/**
 * Container Fleet - Type Definitions
 */

export * from './fleetTypes';
