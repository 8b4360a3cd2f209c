/**
 * Container Fleet - Demo Scenario
 *
 * Two ships, three containers: load, replace, unload, transfer, then print
 * both ships. Replacement and transfer failures are logged and the run goes
 * on; on the initial loads only overfills are caught.
 */

import { ContainerShip, GasContainer, HazardListener, LiquidContainer } from '../types';
import { OverfillError } from '../errors';
import { FleetLogger } from '../logging/logger';
import {
  SerialNumberSource,
  createGasContainer,
  createLiquidContainer,
  createLoggingHazardListener,
  loadCargo
} from '../containers';
import {
  createContainerShip,
  loadContainer,
  printDetails,
  replaceContainer,
  transferContainer,
  unloadContainer
} from '../ship';

export interface DemoScenarioOptions {
  serials: SerialNumberSource;
  logger: FleetLogger;
  onHazard?: HazardListener;
}

export interface DemoScenarioResult {
  ships: { first: ContainerShip; second: ContainerShip };
  containers: { milk: LiquidContainer; helium: GasContainer; oil: LiquidContainer };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function runDemoScenario(options: DemoScenarioOptions): DemoScenarioResult {
  const { serials, logger } = options;
  const onHazard = options.onHazard ?? createLoggingHazardListener(logger);

  const first = createContainerShip({ max_speed_knots: 30, max_container_count: 100, max_weight_tons: 20000 });
  const second = createContainerShip({ max_speed_knots: 25, max_container_count: 50, max_weight_tons: 15000 });

  const milk = createLiquidContainer(
    { tare_weight_kg: 500, height_cm: 300, depth_cm: 200, max_payload_kg: 1000, is_hazardous: false },
    serials
  );
  loadCargo(milk, 800, { onHazard });

  const helium = createGasContainer(
    { tare_weight_kg: 750, height_cm: 250, depth_cm: 150, max_payload_kg: 1500, pressure_atm: 100 },
    serials
  );
  loadCargo(helium, 1400, { onHazard });

  try {
    loadContainer(first, milk);
    loadContainer(first, helium);
  } catch (error) {
    if (!(error instanceof OverfillError)) throw error;
    logger.error(error.message);
  }

  const oil = createLiquidContainer(
    { tare_weight_kg: 1000, height_cm: 400, depth_cm: 300, max_payload_kg: 2000, is_hazardous: true },
    serials
  );
  loadCargo(oil, 900, { onHazard });

  try {
    replaceContainer(first, milk, oil);
  } catch (error) {
    logger.error(`Error during replacement: ${errorMessage(error)}`);
  }

  unloadContainer(first, helium);

  try {
    transferContainer(first, oil, second);
  } catch (error) {
    logger.error(`Error during transfer: ${errorMessage(error)}`);
  }

  logger.info('Ship 1 Details:');
  printDetails(first, logger);
  logger.info('Ship 2 Details:');
  printDetails(second, logger);

  return { ships: { first, second }, containers: { milk, helium, oil } };
}
