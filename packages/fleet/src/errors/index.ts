export * from './fleetErrors';
