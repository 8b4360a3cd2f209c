/**
 * Container Fleet - Data Types and Models
 *
 * Defines the cargo containers (liquid, gas, refrigerated), the container ship
 * aggregate that carries them, and the events and reports the model emits.
 */

// ============================================================================
// CONTAINERS
// ============================================================================

export type ContainerKind = 'LIQUID' | 'GAS' | 'REFRIGERATED';

export type ContainerTypeCode = 'L' | 'G' | 'C';

interface ContainerBase {
  readonly serial_number: string;
  readonly tare_weight_kg: number;
  readonly height_cm: number;
  readonly depth_cm: number;
  readonly max_payload_kg: number;
  cargo_mass_kg: number;
}

export interface LiquidContainer extends ContainerBase {
  kind: 'LIQUID';
  is_hazardous: boolean;
}

export interface GasContainer extends ContainerBase {
  kind: 'GAS';
  pressure_atm: number; // informational, not used by any limit
}

export interface RefrigeratedContainer extends ContainerBase {
  kind: 'REFRIGERATED';
  readonly product_type: string;
  readonly temperature_c: number;
}

export type Container = LiquidContainer | GasContainer | RefrigeratedContainer;

export type ContainerOfKind<K extends ContainerKind> = Extract<Container, { kind: K }>;

// ============================================================================
// SHIPS
// ============================================================================

export interface ContainerShip {
  readonly max_speed_knots: number;
  readonly max_container_count: number;
  readonly max_weight_tons: number;
  containers: Container[];
}

export interface LoadCheckResult {
  ok: boolean;
  reason?: 'CONTAINER_COUNT' | 'WEIGHT' | 'DUPLICATE';
  projected_count: number;
  projected_weight: number;
}

// ============================================================================
// ERRORS & EVENTS
// ============================================================================

export type FleetErrorCode =
  | 'ERR_OVERFILL'
  | 'ERR_CAPACITY'
  | 'ERR_NOT_FOUND'
  | 'ERR_DUPLICATE_CONTAINER'
  | 'ERR_INVALID_SPEC';

export interface HazardEvent {
  serial_number: string;
  kind: ContainerKind;
  requested_mass_kg?: number; // set when raised by an overfilled load
  limit_kg: number;
  message: string;
}

export type HazardListener = (event: HazardEvent) => void;

// ============================================================================
// REPORTING
// ============================================================================

export interface ShipReportLine {
  serial_number: string;
  cargo_mass_kg: number;
  type_name: string;
}

export interface ShipReport {
  max_speed_knots: number;
  max_container_count: number;
  max_weight_tons: number;
  container_count: number;
  total_weight: number;
  containers: ShipReportLine[];
}
