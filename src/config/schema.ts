/**
 * Zod schemas for user-facing configuration (config.json).
 *
 * Validates what users write in `~/.config/stepwright/config.json` or
 * `.stepwright/config.json`. Every field is optional here; defaults are
 * filled in by `resolveSettings()`.
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../integrations/utilities/logger.js';

// =============================================================================
// SECTION SCHEMAS
// =============================================================================

const ContextSchema = z
  .object({
    maxTokens: z.number().int().positive().optional(),
    warnThresholdPercent: z.number().gt(0).max(100).optional(),
    compactThresholdPercent: z.number().gt(0).max(100).optional(),
    keepRecent: z.number().int().nonnegative().optional(),
    autoCompact: z.boolean().optional(),
  })
  .strict();

const ExecutionSchema = z
  .object({
    commandTimeoutMs: z.number().int().positive().optional(),
    shell: z.string().min(1).optional(),
    autoConfirm: z.boolean().optional(),
  })
  .strict();

const ActionsSchema = z
  .object({
    reprocessUnstructured: z.boolean().optional(),
    structuredPrompt: z.boolean().optional(),
  })
  .strict();

const LoggingSchema = z
  .object({
    level: z.enum(LOG_LEVELS).optional(),
    file: z.string().optional(),
  })
  .strict();

const UpdatesSchema = z
  .object({
    enabled: z.boolean().optional(),
    intervalMinutes: z.number().positive().optional(),
  })
  .strict();

// =============================================================================
// TOP-LEVEL USER CONFIG SCHEMA
// =============================================================================

export const ProviderNameSchema = z.enum(['anthropic', 'mock']);

/**
 * Top level uses `.passthrough()` so unknown keys survive for forward
 * compatibility; sections are `.strict()` to catch typos.
 */
export const UserConfigSchema = z
  .object({
    model: z.string().optional(),
    provider: ProviderNameSchema.optional(),
    temperature: z.number().min(0).max(2).optional(),
    responseMaxTokens: z.number().int().positive().optional(),
    rootDir: z.string().optional(),

    context: ContextSchema.optional(),
    execution: ExecutionSchema.optional(),
    actions: ActionsSchema.optional(),
    logging: LoggingSchema.optional(),
    updates: UpdatesSchema.optional(),
  })
  .passthrough();

export type ValidatedUserConfig = z.infer<typeof UserConfigSchema>;

export type ProviderName = z.infer<typeof ProviderNameSchema>;
