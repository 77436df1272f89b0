/**
 * Library configuration - parse, don't validate.
 *
 * - Single source of truth for the config surface
 * - Zod validates at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedConfig } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/types.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type PatternCacheSize = Brand<number, 'PatternCacheSize'>;

export interface StrConfig {
  readonly logging: { readonly level: LogLevel };
  readonly patterns: { readonly cacheSize: PatternCacheSize };
}

export type ValidatedStrConfig = ValidatedConfig<StrConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

export const DEFAULT_PATTERN_CACHE_SIZE = 4096;
export const MAX_PATTERN_CACHE_SIZE = 65_536;

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

// Unset and blank variables both take the default.

const EnvSchema = z.object({
  IMMUTABLE_STR_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? undefined : v.trim().toLowerCase()))
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('silent')),

  IMMUTABLE_STR_PATTERN_CACHE_SIZE: z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int('Pattern cache size must be an integer')
        .min(0, 'Pattern cache size cannot be negative')
        .max(MAX_PATTERN_CACHE_SIZE, `Pattern cache size cannot exceed ${MAX_PATTERN_CACHE_SIZE}`)
        .default(DEFAULT_PATTERN_CACHE_SIZE)
    ),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedStrConfig, ConfigInvalidError>;

export function loadStrConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data) as ValidatedStrConfig);
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: { logLevel?: LogLevel; cacheSize?: number } = {}): ValidatedStrConfig {
  return {
    logging: { level: value.logLevel ?? 'silent' },
    patterns: { cacheSize: (value.cacheSize ?? DEFAULT_PATTERN_CACHE_SIZE) as PatternCacheSize },
  } as ValidatedStrConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): StrConfig {
  return {
    logging: { level: env.IMMUTABLE_STR_LOG_LEVEL },
    patterns: { cacheSize: env.IMMUTABLE_STR_PATTERN_CACHE_SIZE as PatternCacheSize },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
