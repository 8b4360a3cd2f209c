/**
 * Container Fleet - Configuration
 *
 * All settings come from environment variables with safe defaults:
 *   FLEET_SERIAL_MODE   random | sequential (default: random)
 *   FLEET_SERIAL_START  first sequential serial number, 1..9999 (default: 1)
 *   FLEET_LOG_QUIET     true | false, hides info lines (default: false)
 *
 * A value that fails its schema is reported with a warning and replaced by the default.
 */

import { z } from 'zod';
import { MAX_SERIAL_VALUE } from '../containers/serialNumbers';

export const serialModeSchema = z.string().trim().toLowerCase().pipe(z.enum(['random', 'sequential']));

export const serialStartSchema = z.coerce.number().int().min(1).max(MAX_SERIAL_VALUE);

export const flagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', '1', 'false', '0']))
  .transform((value) => value === 'true' || value === '1');

export interface FleetConfig {
  serialMode: z.output<typeof serialModeSchema>;
  serialStart: number;
  logQuiet: boolean;
}

export const DEFAULT_FLEET_CONFIG: FleetConfig = {
  serialMode: 'random',
  serialStart: 1,
  logQuiet: false,
};

type Env = Record<string, string | undefined>;

function readSetting<S extends z.ZodTypeAny>(
  env: Env,
  name: string,
  schema: S,
  defaultValue: z.output<S>
): z.output<S> {
  const raw = env[name];
  if (!raw) return defaultValue;

  const result = schema.safeParse(raw);
  if (!result.success) {
    console.warn(`[fleet:CONFIG] Invalid ${name} "${raw}", using default: ${defaultValue}`);
    return defaultValue;
  }
  return result.data;
}

export function loadFleetConfig(env: Env = process.env): FleetConfig {
  return {
    serialMode: readSetting(env, 'FLEET_SERIAL_MODE', serialModeSchema, DEFAULT_FLEET_CONFIG.serialMode),
    serialStart: readSetting(env, 'FLEET_SERIAL_START', serialStartSchema, DEFAULT_FLEET_CONFIG.serialStart),
    logQuiet: readSetting(env, 'FLEET_LOG_QUIET', flagSchema, DEFAULT_FLEET_CONFIG.logQuiet),
  };
}
