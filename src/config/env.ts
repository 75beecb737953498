// ============================================
// RIDESIM - Environment Configuration
// ============================================

import { z } from 'zod';
import { DEFAULT_TRAVEL_TIME_ROUNDING, DEFAULT_WAITLIST_ORDER } from './simulation.js';

const coerceNumber = z.coerce.number();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Scenario
  SCENARIO_PATH: z.string().optional(),
  SIM_END_TIME: coerceNumber.pipe(z.number().int().nonnegative()).optional(),

  // Dispatch rules
  TRAVEL_TIME_ROUNDING: z.enum(['truncate', 'half-even']).default(DEFAULT_TRAVEL_TIME_ROUNDING),
  WAITLIST_ORDER: z.enum(['arrival', 'deadline']).default(DEFAULT_WAITLIST_ORDER),
});

export type Env = z.infer<typeof envSchema>;

function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error('❌ Invalid environment variables:');
    console.error(result.error.format());
    throw new Error('Invalid environment configuration');
  }

  return result.data;
}

export const env = parseEnv(process.env);

export function isDevelopment(): boolean {
  return env.NODE_ENV === 'development';
}
