#!/usr/bin/env node
import {
  createLogger,
  createRandomSerialSource,
  createSequentialSerialSource,
  isFleetError,
  loadFleetConfig,
  runDemoScenario
} from '../../packages/fleet/src';

const config = loadFleetConfig();
const logger = createLogger('fleet', { quiet: config.logQuiet });

const serials = config.serialMode === 'sequential'
  ? createSequentialSerialSource(config.serialStart)
  : createRandomSerialSource();

try {
  runDemoScenario({ serials, logger });
} catch (error) {
  if (isFleetError(error)) {
    logger.error(`Scenario aborted [${error.code}]: ${error.message}`);
  } else {
    logger.error(`Scenario aborted: ${error instanceof Error ? error.message : String(error)}`);
  }
  process.exitCode = 1;
}
