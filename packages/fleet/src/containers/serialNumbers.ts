/**
 * Container serial numbers: KON-<type code>-<4 digits>.
 *
 * Neither source guarantees uniqueness across sources or, for the random one,
 * across draws.
 */

import { ContainerTypeCode } from '../types';
import { InvalidSpecError } from '../errors';

export interface SerialNumberSource {
  next(typeCode: ContainerTypeCode): string;
}

export interface SequentialSerialSource extends SerialNumberSource {
  reset(): void;
}

export const SERIAL_PREFIX = 'KON';
export const MAX_SERIAL_VALUE = 9999;

export function formatSerialNumber(typeCode: ContainerTypeCode, value: number): string {
  return `${SERIAL_PREFIX}-${typeCode}-${String(value).padStart(4, '0')}`;
}

/** Draws from 1000..9998 with the given generator (returns values in [0, 1)). */
export function createRandomSerialSource(random: () => number = Math.random): SerialNumberSource {
  return {
    next(typeCode) {
      return formatSerialNumber(typeCode, 1000 + Math.floor(random() * 8999));
    },
  };
}

/**
 * Counts up from `start` (1..9999); after 9999 the counter wraps back to `start`.
 */
export function createSequentialSerialSource(start = 1): SequentialSerialSource {
  if (!Number.isInteger(start) || start < 1 || start > MAX_SERIAL_VALUE) {
    throw new InvalidSpecError('serial start', [`start must be a whole number from 1 to ${MAX_SERIAL_VALUE}, got ${start}`]);
  }
  let counter = start;

  return {
    next(typeCode) {
      const serial = formatSerialNumber(typeCode, counter);
      counter = counter >= MAX_SERIAL_VALUE ? start : counter + 1;
      return serial;
    },
    reset() {
      counter = start;
    },
  };
}
