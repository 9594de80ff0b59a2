/**
 * Unified Configuration Loader
 *
 * Loads, merges and validates configuration from the user file
 * (~/.config/stepwright/config.json), the project file
 * (.stepwright/config.json) and STEPWRIGHT_* environment variables.
 * Loading never throws: problems come back as warnings next to the
 * best-effort config.
 */

import { existsSync, readFileSync } from 'node:fs';
import { getConfigPath, getProjectConfigPath } from '../paths.js';
import { UserConfigSchema, type ValidatedUserConfig } from './schema.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ConfigLoadOptions {
  /** Working directory for locating project config (defaults to process.cwd()) */
  cwd?: string;
  /** Skip project-level config loading */
  skipProject?: boolean;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

export type ConfigSourceLevel = 'user' | 'project' | 'env';

export interface ConfigLoadResult {
  /** Merged and validated config */
  config: ValidatedUserConfig;
  /** Sources that were checked, lowest precedence first */
  sources: Array<{ path: string; level: ConfigSourceLevel; loaded: boolean }>;
  /** Non-fatal validation warnings */
  warnings: string[];
}

type RawConfig = Record<string, unknown>;

function isPlainObject(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// DEEP MERGE
// =============================================================================

/**
 * Shallow spread with a 1-level nested object merge; arrays replace.
 */
function deepMergeConfigs(base: RawConfig, override: RawConfig): RawConfig {
  const result = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const baseValue = result[key];
    result[key] = isPlainObject(value) && isPlainObject(baseValue) ? { ...baseValue, ...value } : value;
  }

  return result;
}

// =============================================================================
// SOURCES
// =============================================================================

function loadJsonFile(filePath: string, warnings: string[]): RawConfig | null {
  if (!existsSync(filePath)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
    if (!isPlainObject(parsed)) {
      warnings.push(`${filePath}: expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`);
      return null;
    }
    return parsed;
  } catch (err) {
    warnings.push(`${filePath}: failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

function parseBoolean(value: string): boolean | string {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  // left as a string so validation reports it
  return value;
}

/**
 * STEPWRIGHT_* variables as a partial raw config, or null when none are set.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): RawConfig | null {
  const raw: RawConfig = {};
  const set = (value: string | undefined): value is string => value !== undefined && value.trim() !== '';

  if (set(env.STEPWRIGHT_MODEL)) raw.model = env.STEPWRIGHT_MODEL.trim();
  if (set(env.STEPWRIGHT_PROVIDER)) raw.provider = env.STEPWRIGHT_PROVIDER.trim();
  if (set(env.STEPWRIGHT_ROOT)) raw.rootDir = env.STEPWRIGHT_ROOT.trim();
  if (set(env.STEPWRIGHT_MAX_TOKENS)) raw.context = { maxTokens: Number(env.STEPWRIGHT_MAX_TOKENS) };
  if (set(env.STEPWRIGHT_LOG_LEVEL)) raw.logging = { level: env.STEPWRIGHT_LOG_LEVEL.trim() };
  if (set(env.STEPWRIGHT_AUTO_CONFIRM)) raw.execution = { autoConfirm: parseBoolean(env.STEPWRIGHT_AUTO_CONFIRM) };

  return Object.keys(raw).length > 0 ? raw : null;
}

// =============================================================================
// PRUNING
// =============================================================================

/**
 * Copy of `config` without the value at `path` (or without `keys` under it).
 */
function omitAt(config: RawConfig, path: ReadonlyArray<string | number>, keys?: readonly string[]): RawConfig {
  const [head, ...rest] = path;
  if (head === undefined) {
    if (!keys) return {};
    return Object.fromEntries(Object.entries(config).filter(([key]) => !keys.includes(key)));
  }
  const key = String(head);
  if (rest.length === 0 && !keys) {
    const { [key]: _removed, ...remaining } = config;
    return remaining;
  }
  const child = config[key];
  if (!isPlainObject(child)) {
    const { [key]: _removed, ...remaining } = config;
    return remaining;
  }
  return { ...config, [key]: omitAt(child, rest, keys) };
}

// =============================================================================
// LOADER
// =============================================================================

/**
 * Load configuration. Priority: user ← project ← environment.
 *
 * Invalid values are reported as warnings and dropped, so the rest of the
 * file still applies.
 */
export function loadConfig(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const { cwd, skipProject = false, env = process.env } = options;
  const warnings: string[] = [];
  const sources: ConfigLoadResult['sources'] = [];

  const userConfigPath = getConfigPath();
  const userRaw = loadJsonFile(userConfigPath, warnings);
  sources.push({ path: userConfigPath, level: 'user', loaded: userRaw !== null });

  let projectRaw: RawConfig | null = null;
  if (!skipProject) {
    const projectConfigPath = getProjectConfigPath(cwd);
    projectRaw = loadJsonFile(projectConfigPath, warnings);
    sources.push({ path: projectConfigPath, level: 'project', loaded: projectRaw !== null });
  }

  const envRaw = configFromEnv(env);
  sources.push({ path: 'environment', level: 'env', loaded: envRaw !== null });

  let merged: RawConfig = {};
  for (const layer of [userRaw, projectRaw, envRaw]) {
    if (layer) merged = deepMergeConfigs(merged, layer);
  }

  let result = UserConfigSchema.safeParse(merged);
  if (result.success) {
    return { config: result.data, sources, warnings };
  }

  for (const issue of result.error.issues) {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    warnings.push(`config validation: ${path}: ${issue.message}`);
  }

  let pruned = merged;
  for (const issue of result.error.issues) {
    pruned = omitAt(pruned, issue.path, issue.code === 'unrecognized_keys' ? issue.keys : undefined);
  }
  result = UserConfigSchema.safeParse(pruned);

  return { config: result.success ? result.data : {}, sources, warnings };
}
