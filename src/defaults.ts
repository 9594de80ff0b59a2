/**
 * Default Settings
 *
 * Every configurable value with its default, and the merge that turns a
 * validated (all-optional) user config into fully resolved settings.
 */

import type { LogLevel } from './integrations/utilities/logger.js';
import type { ProviderName, ValidatedUserConfig } from './config/schema.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ContextSettings {
  maxTokens: number;
  warnThresholdPercent: number;
  compactThresholdPercent: number;
  keepRecent: number;
  autoCompact: boolean;
}

export interface ExecutionSettings {
  commandTimeoutMs: number;
  shell: string;
  autoConfirm: boolean;
}

export interface ActionSettings {
  /** Ask the model to restate prose answers as action markup */
  reprocessUnstructured: boolean;
  /** Append the action contract to the system prompt */
  structuredPrompt: boolean;
}

export interface LoggingSettings {
  level: LogLevel;
  file?: string;
}

export interface UpdateSettings {
  enabled: boolean;
  intervalMinutes: number;
}

export interface ResolvedSettings {
  /** Undefined means the provider's default model */
  model?: string;
  /** Undefined means auto-detect */
  provider?: ProviderName;
  temperature: number;
  responseMaxTokens: number;
  rootDir: string;
  context: ContextSettings;
  execution: ExecutionSettings;
  actions: ActionSettings;
  logging: LoggingSettings;
  updates: UpdateSettings;
}

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_CONTEXT_SETTINGS: ContextSettings = {
  maxTokens: 128_000,
  warnThresholdPercent: 70,
  compactThresholdPercent: 80,
  keepRecent: 10,
  autoCompact: true,
};

export const DEFAULT_EXECUTION_SETTINGS: ExecutionSettings = {
  commandTimeoutMs: 30_000,
  shell: 'bash',
  autoConfirm: false,
};

export const DEFAULT_ACTION_SETTINGS: ActionSettings = {
  reprocessUnstructured: false,
  structuredPrompt: true,
};

export const DEFAULT_LOGGING_SETTINGS: LoggingSettings = {
  level: 'info',
};

export const DEFAULT_UPDATE_SETTINGS: UpdateSettings = {
  enabled: true,
  intervalMinutes: 30,
};

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_RESPONSE_MAX_TOKENS = 4096;

// =============================================================================
// MERGE
// =============================================================================

/**
 * Shallow-merge a section over its defaults, ignoring keys whose value is
 * undefined.
 */
export function mergeSection<T extends object>(defaults: T, section: Partial<T> | undefined): T {
  if (!section) {
    return { ...defaults };
  }
  const defined = Object.fromEntries(Object.entries(section).filter(([, value]) => value !== undefined));
  return { ...defaults, ...defined };
}

/**
 * Fill every unset value from the defaults. `rootDir` falls back to `cwd`.
 */
export function resolveSettings(config: ValidatedUserConfig, cwd: string = process.cwd()): ResolvedSettings {
  return {
    ...(config.model !== undefined && { model: config.model }),
    ...(config.provider !== undefined && { provider: config.provider }),
    temperature: config.temperature ?? DEFAULT_TEMPERATURE,
    responseMaxTokens: config.responseMaxTokens ?? DEFAULT_RESPONSE_MAX_TOKENS,
    rootDir: config.rootDir ?? cwd,
    context: mergeSection(DEFAULT_CONTEXT_SETTINGS, config.context),
    execution: mergeSection(DEFAULT_EXECUTION_SETTINGS, config.execution),
    actions: mergeSection(DEFAULT_ACTION_SETTINGS, config.actions),
    logging: mergeSection(DEFAULT_LOGGING_SETTINGS, config.logging),
    updates: mergeSection(DEFAULT_UPDATE_SETTINGS, config.updates),
  };
}
