/**
 * Provider Registry
 *
 * Adapters register themselves on import with a detection function and a
 * factory. Selection honours an explicit name, otherwise the configured
 * provider with the lowest priority number wins.
 */

import { ProviderError } from '../errors/index.js';
import { logger as rootLogger } from '../integrations/utilities/logger.js';
import type { LLMProvider, ProviderCreateOptions } from './types.js';

// =============================================================================
// PROVIDER REGISTRY
// =============================================================================

export interface ProviderRegistration {
  detect: () => boolean;
  create: (options: ProviderCreateOptions) => LLMProvider;
  /** Lower = higher priority */
  priority: number;
}

const providers = new Map<string, ProviderRegistration>();

export function registerProvider(name: string, registration: ProviderRegistration): void {
  providers.set(name, registration);
}

// =============================================================================
// PROVIDER FACTORY
// =============================================================================

/**
 * Create the named provider, or auto-detect:
 * 1. Anthropic (if ANTHROPIC_API_KEY set)
 * 100. Mock (always available as fallback)
 */
export function getProvider(preferred?: string, options: ProviderCreateOptions = {}): LLMProvider {
  const log = options.logger ?? rootLogger;

  if (preferred) {
    const registration = providers.get(preferred);
    if (!registration) {
      throw new ProviderError(`Unknown provider "${preferred}"`, preferred, 'INVALID_REQUEST');
    }
    if (!registration.detect()) {
      throw new ProviderError(`Preferred provider "${preferred}" is not configured`, preferred, 'NOT_CONFIGURED');
    }
    return registration.create(options);
  }

  const sorted = [...providers.entries()].sort((a, b) => a[1].priority - b[1].priority);
  for (const [name, registration] of sorted) {
    if (registration.detect()) {
      log.info(`Using provider: ${name}`);
      return registration.create(options);
    }
  }

  throw new ProviderError('No LLM provider configured. Set ANTHROPIC_API_KEY.', 'none', 'NOT_CONFIGURED');
}

export function listProviders(): Array<{ name: string; configured: boolean; priority: number }> {
  return [...providers.entries()]
    .map(([name, registration]) => ({
      name,
      configured: registration.detect(),
      priority: registration.priority,
    }))
    .sort((a, b) => a.priority - b.priority);
}

// =============================================================================
// HELPERS FOR ADAPTER REGISTRATION
// =============================================================================

/**
 * Check if an environment variable is set and non-empty.
 */
export function hasEnv(key: string): boolean {
  const value = process.env[key];
  return value !== undefined && value.trim() !== '';
}

export function requireEnv(key: string, providerName: string): string {
  const value = process.env[key];
  if (!value) {
    throw new ProviderError(`Missing required environment variable: ${key}`, providerName, 'NOT_CONFIGURED');
  }
  return value;
}
