export * from './fleetConfig';
