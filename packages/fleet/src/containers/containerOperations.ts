/**
 * Container Fleet - Container Operations
 *
 * Construction, loading and emptying of cargo containers. Loading sets the
 * cargo mass to the requested value (it does not accumulate) and is checked
 * against the per-kind limit before anything changes. Liquid and gas containers
 * raise a hazard notification before an overfill is reported; refrigerated
 * containers have no hazard capability.
 */

import {
  Container,
  GasContainer,
  HazardEvent,
  HazardListener,
  LiquidContainer,
  RefrigeratedContainer
} from '../types';
import {
  GasContainerSpec,
  LiquidContainerSpec,
  RefrigeratedContainerSpec,
  gasContainerSpecSchema,
  liquidContainerSpecSchema,
  parseSpec,
  refrigeratedContainerSpecSchema
} from '../schema';
import { InvalidSpecError, OverfillError } from '../errors';
import { FleetLogger, createLogger } from '../logging/logger';
import { SerialNumberSource } from './serialNumbers';
import {
  CONTAINER_KINDS,
  HazardCapableContainer,
  getEmptiedMass,
  getLoadLimit,
  isHazardCapable
} from './containerBehaviors';

// ============================================================================
// CONSTRUCTION
// ============================================================================

export function createLiquidContainer(spec: LiquidContainerSpec, serials: SerialNumberSource): LiquidContainer {
  const parsed = parseSpec(liquidContainerSpecSchema, spec, 'liquid container spec');
  return {
    kind: 'LIQUID',
    serial_number: serials.next(CONTAINER_KINDS.LIQUID.type_code),
    ...parsed,
    cargo_mass_kg: 0,
  };
}

export function createGasContainer(spec: GasContainerSpec, serials: SerialNumberSource): GasContainer {
  const parsed = parseSpec(gasContainerSpecSchema, spec, 'gas container spec');
  return {
    kind: 'GAS',
    serial_number: serials.next(CONTAINER_KINDS.GAS.type_code),
    ...parsed,
    cargo_mass_kg: 0,
  };
}

export function createRefrigeratedContainer(
  spec: RefrigeratedContainerSpec,
  serials: SerialNumberSource
): RefrigeratedContainer {
  const parsed = parseSpec(refrigeratedContainerSpecSchema, spec, 'refrigerated container spec');
  return {
    kind: 'REFRIGERATED',
    serial_number: serials.next(CONTAINER_KINDS.REFRIGERATED.type_code),
    ...parsed,
    cargo_mass_kg: 0,
  };
}

// ============================================================================
// HAZARD NOTIFICATION
// ============================================================================

export function createLoggingHazardListener(logger: FleetLogger): HazardListener {
  return (event) => logger.warn(event.message);
}

const defaultHazardListener = createLoggingHazardListener(createLogger('fleet'));

export function notifyHazard(
  container: HazardCapableContainer,
  listener: HazardListener = defaultHazardListener,
  requestedMassKg?: number
): HazardEvent {
  const event: HazardEvent = {
    serial_number: container.serial_number,
    kind: container.kind,
    limit_kg: getLoadLimit(container),
    message: `Hazardous condition detected in container ${container.serial_number}.`,
  };
  if (requestedMassKg !== undefined) {
    event.requested_mass_kg = requestedMassKg;
  }
  listener(event);
  return event;
}

// ============================================================================
// LOADING & EMPTYING
// ============================================================================

export interface LoadCargoOptions {
  onHazard?: HazardListener;
}

export function loadCargo(container: Container, massKg: number, options: LoadCargoOptions = {}): void {
  if (!Number.isFinite(massKg) || massKg < 0) {
    throw new InvalidSpecError('cargo mass', [`mass must be a finite number zero or greater, got ${massKg}`]);
  }

  const limit = getLoadLimit(container);
  if (massKg > limit) {
    if (isHazardCapable(container)) {
      notifyHazard(container, options.onHazard, massKg);
    }
    throw new OverfillError(CONTAINER_KINDS[container.kind].overfill_message, massKg, limit);
  }

  container.cargo_mass_kg = massKg;
}

export function emptyCargo(container: Container): void {
  container.cargo_mass_kg = getEmptiedMass(container);
}

export function grossWeight(container: Container): number {
  return container.tare_weight_kg + container.cargo_mass_kg;
}

export function setHazardous(container: LiquidContainer, isHazardous: boolean): void {
  container.is_hazardous = isHazardous;
}

export function setPressure(container: GasContainer, pressureAtm: number): void {
  if (!Number.isFinite(pressureAtm) || pressureAtm < 0) {
    throw new InvalidSpecError('gas pressure', [`pressure must be a finite number zero or greater, got ${pressureAtm}`]);
  }
  container.pressure_atm = pressureAtm;
}
