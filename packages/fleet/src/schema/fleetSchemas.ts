/**
 * Container Fleet - Construction Schemas
 *
 * Zod schemas for everything callers hand to a constructor. Parsed values are
 * the only inputs the container and ship factories accept.
 */

import { z } from 'zod';
import { InvalidSpecError } from '../errors';

const finite = () => z.number({ invalid_type_error: 'must be a number' }).finite('must be finite');
const positive = () => finite().positive('must be greater than zero');
const nonNegative = () => finite().min(0, 'must be zero or greater');

const containerDimensionsSchema = z.object({
  tare_weight_kg: nonNegative(),
  height_cm: positive(),
  depth_cm: positive(),
  max_payload_kg: positive(),
});

export const liquidContainerSpecSchema = containerDimensionsSchema.extend({
  is_hazardous: z.boolean().default(false),
});

export const gasContainerSpecSchema = containerDimensionsSchema.extend({
  pressure_atm: nonNegative(),
});

export const refrigeratedContainerSpecSchema = containerDimensionsSchema.extend({
  product_type: z.string().trim().min(1, 'must not be empty'),
  temperature_c: finite(),
});

export const containerShipSpecSchema = z.object({
  max_speed_knots: nonNegative(),
  max_container_count: finite().int('must be a whole number').min(0, 'must be zero or greater'),
  max_weight_tons: nonNegative(),
});

export type LiquidContainerSpec = z.input<typeof liquidContainerSpecSchema>;
export type GasContainerSpec = z.input<typeof gasContainerSpecSchema>;
export type RefrigeratedContainerSpec = z.input<typeof refrigeratedContainerSpecSchema>;
export type ContainerShipSpec = z.input<typeof containerShipSpecSchema>;

/**
 * Parses `input` against `schema`, throwing an InvalidSpecError that lists every
 * issue as `path: message`.
 */
export function parseSpec<S extends z.ZodTypeAny>(schema: S, input: unknown, subject: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new InvalidSpecError(subject, issues);
  }
  return result.data;
}
