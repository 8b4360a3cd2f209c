/**
 * Container Fleet - Ship Module
 */

export * from './containerShip';
export * from './shipReport';
