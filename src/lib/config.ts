// src/lib/config.ts
import { z } from 'zod';
import { ConfigurationError } from '@/lib/errors';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const EnvSchema = z.object({
  GATE_TABLE_PATH: z.string().trim().min(1).optional(),
  DESIGN_TOLERANCE_ARCSEC: z.coerce.number().positive().max(3600).default(1),
  DESIGN_MAX_ITERATIONS: z.coerce.number().int().min(1).max(1000).default(60),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type AppConfig = {
  gateTablePath: string | null;
  design: { toleranceDegrees: number; maxIterations: number };
  logLevel: LogLevel;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // empty strings from .env files count as "not set"
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== '')
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid environment configuration', parsed.error.flatten().fieldErrors);
  }
  const e = parsed.data;
  return {
    gateTablePath: e.GATE_TABLE_PATH ?? null,
    design: {
      toleranceDegrees: e.DESIGN_TOLERANCE_ARCSEC / 3600,
      maxIterations: e.DESIGN_MAX_ITERATIONS,
    },
    logLevel: e.LOG_LEVEL,
  };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig();
  return cached;
}
