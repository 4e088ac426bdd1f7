/**
 * Configuration Schemas
 *
 * Zod schemas for runtime validation of the bridge settings.
 * Programmatic options and environment variables both go through these
 * schemas for consistent validation and clear error messages.
 */

import { z } from 'zod';

// ============================================
// HELPER SCHEMAS
// ============================================

const TRUE_STRINGS = ['true', '1', 'yes'];

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 */
export const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return TRUE_STRINGS.includes(val.toLowerCase());
  });

/**
 * Like booleanStringSchema, but an unset or empty variable stays undefined
 * so the programmatic default applies.
 */
export const optionalBooleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (val === undefined || val === '') return undefined;
    return TRUE_STRINGS.includes(val.toLowerCase());
  });

/**
 * Integer from a string, undefined when the variable is unset or empty.
 * "0" parses to 0, which some settings treat differently from unset.
 */
export function optionalIntegerStringSchema(options?: { min?: number; max?: number }) {
  const { min, max } = options ?? {};
  let schema = z.coerce.number().int();

  if (min !== undefined) schema = schema.min(min);
  if (max !== undefined) schema = schema.max(max);

  return z.preprocess((val) => (val === '' ? undefined : val), schema.optional());
}

/**
 * Schema for a valid URL string.
 */
export const urlSchema = z.string().url();

/**
 * Schema for a valid WebSocket URL.
 */
export const websocketUrlSchema = z
  .string()
  .refine(
    (url) => url.startsWith('ws://') || url.startsWith('wss://'),
    { message: 'Must be a valid WebSocket URL starting with ws:// or wss://' }
  );

// ============================================
// LOG LEVEL SCHEMA
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema,
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// BROWSER BRIDGE SETTINGS
// ============================================

export const browserTypeSchema = z.enum(['chromium', 'firefox', 'webkit']);

export const DEFAULT_CONCURRENT_REQUESTS = 16;

/**
 * Scalar bridge settings. Object and function valued options (launch options,
 * header policy, abort predicate, startup contexts) are typed by the
 * ResourceConfig options interface instead.
 */
export const bridgeSettingsSchema = z.object({
  browserType: browserTypeSchema.default('chromium'),
  cdpUrl: urlSchema.nullable().default(null),
  connectUrl: websocketUrlSchema.nullable().default(null),
  concurrentRequests: z.number().int().min(1).default(DEFAULT_CONCURRENT_REQUESTS),
  // 0 and null fall back to concurrentRequests
  maxPagesPerContext: z.number().int().min(0).nullable().default(null),
  // 0 and null both mean "no ceiling"
  maxContexts: z.number().int().min(0).nullable().default(null),
  navigationTimeout: z.number().min(0).nullable().default(null),
  restartDisconnectedBrowser: z.boolean().default(true),
  targetClosedMaxRetries: z.number().int().min(0).default(3),
  contentRetrievalRetries: z.number().int().min(0).default(1),
  headless: z.boolean().optional(),
});

export type BridgeSettingsInput = z.input<typeof bridgeSettingsSchema>;
export type BridgeSettings = z.infer<typeof bridgeSettingsSchema>;

/**
 * Bridge settings as read from environment variables. Every field is optional;
 * unset variables are left out of the result.
 */
export const bridgeEnvSchema = z.object({
  browserType: browserTypeSchema.optional(),
  cdpUrl: urlSchema.optional(),
  connectUrl: websocketUrlSchema.optional(),
  concurrentRequests: optionalIntegerStringSchema({ min: 1 }),
  maxPagesPerContext: optionalIntegerStringSchema({ min: 0 }),
  maxContexts: optionalIntegerStringSchema({ min: 0 }),
  navigationTimeout: optionalIntegerStringSchema({ min: 0 }),
  restartDisconnectedBrowser: optionalBooleanStringSchema,
  targetClosedMaxRetries: optionalIntegerStringSchema({ min: 0 }),
  contentRetrievalRetries: optionalIntegerStringSchema({ min: 0 }),
  headless: optionalBooleanStringSchema,
});

export type BridgeEnvSettings = z.infer<typeof bridgeEnvSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Create a configuration validation error with helpful messages.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
      `Please check your environment variables or configuration options.`
    );
    this.name = 'ConfigValidationError';
  }
}
