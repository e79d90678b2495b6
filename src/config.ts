/**
 * Runtime configuration
 * Every value has a default; environment variables override them.
 * Location: src/config.ts
 */

import path from 'path';
import { z } from 'zod';
import type { Biome, UnitRates } from './types/satellite';

export const GIBS_WMS_BASE = 'https://gibs.earthdata.nasa.gov/wms/epsg4326/best/wms.cgi';
export const ANTHROPIC_API_BASE = 'https://api.anthropic.com/v1';

// ~0.1° at the equator
export const DEFAULT_WINDOW_KM = 11.1;

const BIOMES = ['tropical_forest', 'temperate_forest', 'boreal_forest', 'savanna'] as const;

// Blank variables (`FOO=`) count as unset so defaults still apply
function setting<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (typeof value === 'string' && value.trim() === '' ? undefined : value), schema);
}

const EnvSchema = z.object({
  GIBS_WMS_BASE: setting(z.string().url().default(GIBS_WMS_BASE)),
  SATELLITE_CACHE_DIR: setting(z.string().min(1).default(path.join('data', 'cache'))),
  SATELLITE_RESULTS_DIR: setting(z.string().min(1).default('results')),
  SATELLITE_CACHE_MAX_AGE_HOURS: setting(z.coerce.number().positive().optional()),
  SATELLITE_WINDOW_KM: setting(z.coerce.number().positive().default(DEFAULT_WINDOW_KM)),
  IMAGERY_TIMEOUT_MS: setting(z.coerce.number().int().positive().default(30000)),
  IMAGERY_MAX_RETRIES: setting(z.coerce.number().int().min(0).default(3)),
  IMAGERY_BACKOFF_MS: setting(z.coerce.number().int().min(0).default(500)),
  CLAUDE_API_KEY: setting(z.string().optional()),
  CLAUDE_API_BASE: setting(z.string().url().default(ANTHROPIC_API_BASE)),
  CLAUDE_MODEL: setting(z.string().min(1).default('claude-sonnet-4-20250514')),
  CLAUDE_MAX_TOKENS: setting(z.coerce.number().int().positive().default(4000)),
  VISION_TIMEOUT_MS: setting(z.coerce.number().int().positive().default(120000)),
  INPUT_COST_PER_1M: setting(z.coerce.number().min(0).default(3)),
  OUTPUT_COST_PER_1M: setting(z.coerce.number().min(0).default(15)),
  CARBON_BIOME: setting(z.enum(BIOMES).default('tropical_forest')),
});

export interface SatelliteConfig {
  wmsBaseUrl: string;
  cacheDir: string;
  resultsDir: string;
  cacheMaxAgeMs?: number;
  windowSizeKm: number;
  imagery: {
    timeoutMs: number;
    maxRetries: number;
    backoffMs: number;
  };
  vision: {
    apiKey?: string;
    baseURL: string;
    model: string;
    maxTokens: number;
    timeoutMs: number;
  };
  rates: UnitRates;
  biome: Biome;
}

/**
 * Build configuration from an environment map (defaults to `process.env`)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SatelliteConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const values = parsed.data;

  return {
    wmsBaseUrl: values.GIBS_WMS_BASE,
    cacheDir: values.SATELLITE_CACHE_DIR,
    resultsDir: values.SATELLITE_RESULTS_DIR,
    cacheMaxAgeMs:
      values.SATELLITE_CACHE_MAX_AGE_HOURS === undefined
        ? undefined
        : values.SATELLITE_CACHE_MAX_AGE_HOURS * 3_600_000,
    windowSizeKm: values.SATELLITE_WINDOW_KM,
    imagery: {
      timeoutMs: values.IMAGERY_TIMEOUT_MS,
      maxRetries: values.IMAGERY_MAX_RETRIES,
      backoffMs: values.IMAGERY_BACKOFF_MS,
    },
    vision: {
      apiKey: values.CLAUDE_API_KEY,
      baseURL: values.CLAUDE_API_BASE,
      model: values.CLAUDE_MODEL,
      maxTokens: values.CLAUDE_MAX_TOKENS,
      timeoutMs: values.VISION_TIMEOUT_MS,
    },
    rates: {
      inputPerMillion: values.INPUT_COST_PER_1M,
      outputPerMillion: values.OUTPUT_COST_PER_1M,
    },
    biome: values.CARBON_BIOME,
  };
}
