/**
 * Configuration Schemas
 *
 * Zod schemas for runtime configuration. Environment variables arrive as
 * strings, so every numeric or boolean field goes through a coercing schema.
 */

import { z } from 'zod';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 */
export const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Schema for parsing a string as an integer with bounds.
 */
export function integerStringSchema(options: { min?: number; max?: number; default: number }) {
  let schema = z.coerce.number().int();
  if (options.min !== undefined) schema = schema.min(options.min);
  if (options.max !== undefined) schema = schema.max(options.max);
  return schema.default(options.default);
}

/**
 * Schema for a non-negative number of seconds, converted to milliseconds.
 */
export function secondsAsMsSchema(defaultSeconds: number) {
  return z.coerce
    .number()
    .min(0)
    .max(600)
    .default(defaultSeconds)
    .transform((seconds) => Math.round(seconds * 1000));
}

export const httpUrlSchema = z
  .string()
  .url()
  .refine((url) => url.startsWith('http://') || url.startsWith('https://'), {
    message: 'Must be an http:// or https:// URL',
  });

// ============================================
// LOG CONFIGURATION
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema,
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// CDP CONFIGURATION
// ============================================

export const cdpConfigSchema = z
  .object({
    host: z.string().min(1).default('localhost'),
    port: integerStringSchema({ min: 1, max: 65535, default: 9222 }),
    minDelayMs: secondsAsMsSchema(1.0),
    maxDelayMs: secondsAsMsSchema(3.0),
  })
  .refine((config) => config.maxDelayMs >= config.minDelayMs, {
    message: 'MAX_DELAY_SECONDS must be greater than or equal to MIN_DELAY_SECONDS',
    path: ['maxDelayMs'],
  });

export type CdpConfig = z.infer<typeof cdpConfigSchema>;

// ============================================
// SEARCH CONFIGURATION
// ============================================

export const networkFilterSchema = z.enum(['F', 'S', 'O']);

export const searchConfigSchema = z.object({
  baseUrl: httpUrlSchema.default('https://www.linkedin.com/search/results/people/'),
  networkFilter: networkFilterSchema.optional(),
});

export type SearchConfig = z.infer<typeof searchConfigSchema>;

// ============================================
// COMPLETE APPLICATION CONFIGURATION
// ============================================

export const appConfigSchema = z.object({
  log: logConfigSchema,
  cdp: cdpConfigSchema,
  search: searchConfigSchema,
});

export type AppConfig = z.infer<typeof appConfigSchema>;

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
      `Please check your environment variables.`
    );
    this.name = 'ConfigValidationError';
  }
}
