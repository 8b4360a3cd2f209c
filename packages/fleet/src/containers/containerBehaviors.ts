/**
 * Per-kind container rules: type codes, display names, fill limits and
 * hazard capability.
 */

import {
  Container,
  ContainerKind,
  ContainerTypeCode,
  GasContainer,
  LiquidContainer
} from '../types';

export const CONTAINER_LIMITS = {
  hazardous_liquid_fill_ratio: 0.5,
  liquid_fill_ratio: 0.9,
  gas_residual_ratio: 0.05,
} as const;

export interface ContainerKindInfo {
  type_code: ContainerTypeCode;
  display_name: string;
  overfill_message: string;
  hazard_capable: boolean;
}

export const CONTAINER_KINDS: Record<ContainerKind, ContainerKindInfo> = {
  LIQUID: {
    type_code: 'L',
    display_name: 'LiquidContainer',
    overfill_message: 'Exceeding safe cargo limit.',
    hazard_capable: true,
  },
  GAS: {
    type_code: 'G',
    display_name: 'GasContainer',
    overfill_message: 'Cargo exceeds max payload.',
    hazard_capable: true,
  },
  REFRIGERATED: {
    type_code: 'C',
    display_name: 'RefrigeratedContainer',
    overfill_message: 'Cargo exceeds max payload.',
    hazard_capable: false,
  },
};

export type HazardCapableContainer = LiquidContainer | GasContainer;

export function isHazardCapable(container: Container): container is HazardCapableContainer {
  return CONTAINER_KINDS[container.kind].hazard_capable;
}

export function describeContainerKind(container: Container): string {
  return CONTAINER_KINDS[container.kind].display_name;
}

/** Highest cargo mass the container accepts right now (inclusive). */
export function getLoadLimit(container: Container): number {
  switch (container.kind) {
    case 'LIQUID': {
      const ratio = container.is_hazardous
        ? CONTAINER_LIMITS.hazardous_liquid_fill_ratio
        : CONTAINER_LIMITS.liquid_fill_ratio;
      return container.max_payload_kg * ratio;
    }
    case 'GAS':
    case 'REFRIGERATED':
      return container.max_payload_kg;
  }
}

/** Cargo mass left behind after the container is emptied. */
export function getEmptiedMass(container: Container): number {
  switch (container.kind) {
    case 'GAS':
      return container.cargo_mass_kg * CONTAINER_LIMITS.gas_residual_ratio;
    case 'LIQUID':
    case 'REFRIGERATED':
      return 0;
  }
}
