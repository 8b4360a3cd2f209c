/**
 * Container Fleet - Error Types
 *
 * Every failure raised by the model carries a stable code so callers can branch
 * on it without matching message text.
 */

import { FleetErrorCode } from '../types';

export class FleetError extends Error {
  readonly code: FleetErrorCode;

  constructor(code: FleetErrorCode, message: string) {
    super(message);
    this.name = 'FleetError';
    this.code = code;
  }
}

/** Cargo request above the container's applicable load limit. */
export class OverfillError extends FleetError {
  readonly requested_mass_kg: number;
  readonly limit_kg: number;

  constructor(message: string, requestedMassKg: number, limitKg: number) {
    super('ERR_OVERFILL', message);
    this.name = 'OverfillError';
    this.requested_mass_kg = requestedMassKg;
    this.limit_kg = limitKg;
  }
}

export class CapacityError extends FleetError {
  constructor(message = 'Cannot load more containers onto the ship.') {
    super('ERR_CAPACITY', message);
    this.name = 'CapacityError';
  }
}

export class NotFoundError extends FleetError {
  readonly serial_number: string;

  constructor(serialNumber: string, message = 'Container not found on the ship.') {
    super('ERR_NOT_FOUND', message);
    this.name = 'NotFoundError';
    this.serial_number = serialNumber;
  }
}

export class DuplicateContainerError extends FleetError {
  readonly serial_number: string;

  constructor(serialNumber: string) {
    super('ERR_DUPLICATE_CONTAINER', `Container ${serialNumber} is already on the ship.`);
    this.name = 'DuplicateContainerError';
    this.serial_number = serialNumber;
  }
}

export class InvalidSpecError extends FleetError {
  readonly issues: string[];

  constructor(subject: string, issues: string[]) {
    super('ERR_INVALID_SPEC', `Invalid ${subject}: ${issues.join('; ')}`);
    this.name = 'InvalidSpecError';
    this.issues = issues;
  }
}

export function isFleetError(value: unknown): value is FleetError {
  return value instanceof FleetError;
}
