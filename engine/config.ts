// engine/config.ts
// Canonical config for the manifest import core.

import { z } from 'zod';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LimitsConfig {
  maxFileBytes: number;   // files above this are rejected before parsing
  maxRows: number;        // data rows (blank rows excluded)
}

export interface ValidationConfig {
  heavyLoadWarningKg: number;  // LastVægt above this raises a warning
  chunkSize: number;           // rows per validation task
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface ImportConfig {
  limits: LimitsConfig;
  validation: ValidationConfig;
  logging: LoggingConfig;
}

export const DEFAULT_IMPORT_CONFIG: ImportConfig = Object.freeze({
  limits: Object.freeze({
    maxFileBytes: 10 * 1024 * 1024,
    maxRows: 10_000
  }),
  validation: Object.freeze({
    heavyLoadWarningKg: 50_000,
    chunkSize: 500
  }),
  logging: Object.freeze({
    level: 'info' as const
  })
});

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly variable: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  MANIFEST_MAX_FILE_BYTES: positiveInt.optional(),
  MANIFEST_MAX_ROWS: positiveInt.optional(),
  MANIFEST_HEAVY_LOAD_KG: z.coerce.number().positive().optional(),
  MANIFEST_VALIDATION_CHUNK_SIZE: positiveInt.optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional()
});

type EnvInput = Record<string, string | undefined>;

/**
 * Build an ImportConfig from environment variables layered over the defaults.
 * Empty strings count as unset.
 */
export function loadImportConfig(
  env: EnvInput = process.env,
  base: ImportConfig = DEFAULT_IMPORT_CONFIG
): ImportConfig {
  const picked: EnvInput = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      picked[key] = value.trim();
    }
  }

  const parsed = envSchema.safeParse(picked);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue ? String(issue.path[0]) : 'unknown';
    throw new ConfigError(
      `Invalid configuration value for ${variable}: ${issue?.message ?? 'invalid value'}`,
      variable
    );
  }

  const v = parsed.data;

  return {
    limits: {
      maxFileBytes: v.MANIFEST_MAX_FILE_BYTES ?? base.limits.maxFileBytes,
      maxRows: v.MANIFEST_MAX_ROWS ?? base.limits.maxRows
    },
    validation: {
      heavyLoadWarningKg: v.MANIFEST_HEAVY_LOAD_KG ?? base.validation.heavyLoadWarningKg,
      chunkSize: v.MANIFEST_VALIDATION_CHUNK_SIZE ?? base.validation.chunkSize
    },
    logging: {
      level: v.LOG_LEVEL ?? base.logging.level
    }
  };
}
