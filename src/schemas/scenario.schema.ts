// ============================================
// RIDESIM - Scenario Directive Schemas
// ============================================

import { z } from 'zod';
import { parseLocation } from '../simulation/location.js';

const integerToken = z
  .string()
  .regex(/^\d+$/, 'Expected a non-negative integer')
  .transform(Number);

export const timestampSchema = integerToken;

export const identifierSchema = z.string().min(1);

export const locationSchema = z.string().transform((value, ctx) => {
  const location = parseLocation(value);
  if (!location) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Expected a location 'row,col', got '${value}'`,
    });
    return z.NEVER;
  }
  return location;
});

export const speedSchema = integerToken.pipe(z.number().int().positive());

export const patienceSchema = integerToken;

// <timestamp> DriverRequest <id> <row,col> <speed>
export const driverDirectiveSchema = z.tuple([
  timestampSchema,
  z.literal('DriverRequest'),
  identifierSchema,
  locationSchema,
  speedSchema,
]);

// <timestamp> RiderRequest <id> <row,col> <row,col> <patience>
export const riderDirectiveSchema = z.tuple([
  timestampSchema,
  z.literal('RiderRequest'),
  identifierSchema,
  locationSchema,
  locationSchema,
  patienceSchema,
]);

export const SCENARIO_EVENT_TYPES = ['DriverRequest', 'RiderRequest'] as const;

export type ScenarioEventType = (typeof SCENARIO_EVENT_TYPES)[number];
