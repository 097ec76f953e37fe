/**
 * CYCLE — Request schemas
 */

import { z } from 'zod';
import { DEFAULT_CYCLE_CONFIG, MAX_CYCLE_LENGTH, MIN_CYCLE_LENGTH } from './cycle.constants.js';
import { parseIsoDate } from './cycle.dates.js';

const BOOLEAN_STRINGS = ['true', '1', 'yes', 'on', 'false', '0', 'no', 'off'] as const;
const TRUTHY = new Set<string>(['true', '1', 'yes', 'on']);

// Decimal digits only; rejects hex, exponents and surrounding whitespace
const INTEGER_RE = /^-?\d+$/;

const integerParam = (schema: z.ZodNumber) =>
  z.string().regex(INTEGER_RE, 'Expected an integer').pipe(schema);

const isoDateParam = z.string().transform((value, ctx) => {
  const date = parseIsoDate(value);
  if (date === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Expected a valid date in YYYY-MM-DD format',
    });
    return z.NEVER;
  }
  return date;
});

const booleanParam = z
  .string()
  .toLowerCase()
  .pipe(z.enum(BOOLEAN_STRINGS))
  .transform(value => TRUTHY.has(value));

export const dayInfoQuerySchema = z.object({
  query_date: isoDateParam.optional(),
  last_period_start_date: isoDateParam.optional(),
  cycle_length: integerParam(
    z.coerce.number().int().min(MIN_CYCLE_LENGTH).max(MAX_CYCLE_LENGTH)
  ).default(String(DEFAULT_CYCLE_CONFIG.cycleLength)),
  period_length: integerParam(
    z.coerce.number().int().min(1)
  ).default(String(DEFAULT_CYCLE_CONFIG.periodLength)),
  include_details: booleanParam.default('false'),
});

export type DayInfoQuery = z.output<typeof dayInfoQuerySchema>;
