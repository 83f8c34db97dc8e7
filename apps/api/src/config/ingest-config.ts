/**
 * Service configuration, read from the environment.
 * Calibration offset and reserved tag ids can be changed without a rebuild.
 */

import { z } from 'zod';
import type { CalibrationOptions } from '../services/calibration/normalizer.js';

const blankAsUnset = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  DATABASE_URL: z.preprocess(blankAsUnset, z.string().optional()),
  CORS_ORIGIN: z.string().default('*'),
  CALIBRATION_OFFSET: z.coerce.number().finite().default(40),
  CALIBRATION_TAG_IDS: z.string().default('62'),
  FORWARD_URL: z.preprocess(blankAsUnset, z.string().url().optional()),
  FORWARD_TIMEOUT_MS: z.coerce.number().int().positive().default(3_000),
});

export interface IngestConfig {
  port: number;
  databaseUrl?: string;
  corsOrigin: string;
  calibration: CalibrationOptions;
  forwardUrl?: string;
  forwardTimeoutMs: number;
}

export function parseTagIdList(raw: string): Set<string> {
  return new Set(
    raw
      .split(',')
      .map((id) => id.trim())
      .filter((id) => id !== ''),
  );
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): IngestConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    corsOrigin: parsed.CORS_ORIGIN,
    calibration: {
      offset: parsed.CALIBRATION_OFFSET,
      calibrationTagIds: parseTagIdList(parsed.CALIBRATION_TAG_IDS),
    },
    forwardUrl: parsed.FORWARD_URL,
    forwardTimeoutMs: parsed.FORWARD_TIMEOUT_MS,
  };
}
