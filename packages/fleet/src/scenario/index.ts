export * from './demoScenario';
