// ============================================================================
// @tabula/core — Runtime Configuration
// ============================================================================
//
// Settings come from the environment once, on first use, and can be
// overridden programmatically. Environment values are validated with zod.
// ============================================================================

import process from 'node:process';
import { z } from 'zod';

/** Log levels understood by the logger. */
export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export type LogLevel = z.infer<typeof logLevelSchema>;

const envSchema = z.object({
  TABULA_DEBUG: z.string().optional(),
  TABULA_SCAN_BUFFER_THRESHOLD: z.coerce.number().int().positive().optional(),
});

/** Effective runtime configuration. */
export interface TabulaConfig {
  /** Initial log level. */
  logLevel: LogLevel;
  /**
   * Source length above which JSON finders scan a materialized code-unit
   * buffer instead of indexing the string.
   */
  scanBufferThreshold: number;
}

export const DEFAULT_SCAN_BUFFER_THRESHOLD = 1000;

const configSchema = z.object({
  logLevel: logLevelSchema,
  scanBufferThreshold: z.number().int().positive(),
});

/** Map TABULA_DEBUG onto a log level. */
function levelFromDebugFlag(flag: string | undefined): LogLevel {
  if (flag === '1' || flag === 'true') return 'debug';
  if (flag === 'warn') return 'warn';
  if (flag === 'error') return 'error';
  return 'info';
}

/**
 * Build a configuration from an environment map.
 *
 * @throws {z.ZodError} If a variable is present but malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TabulaConfig {
  const parsed = envSchema.parse(env);
  return {
    logLevel: levelFromDebugFlag(parsed.TABULA_DEBUG),
    scanBufferThreshold: parsed.TABULA_SCAN_BUFFER_THRESHOLD ?? DEFAULT_SCAN_BUFFER_THRESHOLD,
  };
}

let current: TabulaConfig | null = null;

/** Current configuration, loaded from the environment on first call. */
export function getConfig(): TabulaConfig {
  if (current === null) {
    current = loadConfig();
  }
  return current;
}

/**
 * Override part of the configuration.
 * @returns The new effective configuration
 */
export function configure(overrides: Partial<TabulaConfig>): TabulaConfig {
  current = configSchema.parse({ ...getConfig(), ...overrides });
  return current;
}

/** Drop overrides; the next `getConfig()` re-reads the environment. */
export function resetConfig(): void {
  current = null;
}
