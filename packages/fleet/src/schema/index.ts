export * from './fleetSchemas';
