import { describe, expect, it } from 'vitest';
import {
  DEFAULT_CONTEXT_SETTINGS,
  DEFAULT_RESPONSE_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  mergeSection,
  resolveSettings,
} from '../src/defaults.js';

describe('resolveSettings', () => {
  it('should fill everything from defaults', () => {
    const settings = resolveSettings({}, '/work');

    expect(settings.model).toBeUndefined();
    expect(settings.provider).toBeUndefined();
    expect(settings.rootDir).toBe('/work');
    expect(settings.temperature).toBe(DEFAULT_TEMPERATURE);
    expect(settings.responseMaxTokens).toBe(DEFAULT_RESPONSE_MAX_TOKENS);
    expect(settings.context).toEqual({
      maxTokens: 128_000,
      warnThresholdPercent: 70,
      compactThresholdPercent: 80,
      keepRecent: 10,
      autoCompact: true,
    });
    expect(settings.execution).toEqual({ commandTimeoutMs: 30_000, shell: 'bash', autoConfirm: false });
    expect(settings.actions).toEqual({ reprocessUnstructured: false, structuredPrompt: true });
    expect(settings.logging).toEqual({ level: 'info' });
    expect(settings.updates).toEqual({ enabled: true, intervalMinutes: 30 });
  });

  it('should apply configured values over defaults', () => {
    const settings = resolveSettings(
      { model: 'm', provider: 'mock', rootDir: '/repo', context: { keepRecent: 4 }, logging: { level: 'debug' } },
      '/work'
    );

    expect(settings.model).toBe('m');
    expect(settings.provider).toBe('mock');
    expect(settings.rootDir).toBe('/repo');
    expect(settings.context.keepRecent).toBe(4);
    expect(settings.context.maxTokens).toBe(128_000);
    expect(settings.logging.level).toBe('debug');
  });
});

describe('mergeSection', () => {
  it('should ignore undefined values', () => {
    expect(mergeSection(DEFAULT_CONTEXT_SETTINGS, { maxTokens: undefined, autoCompact: false })).toEqual({
      ...DEFAULT_CONTEXT_SETTINGS,
      autoCompact: false,
    });
  });

  it('should copy the defaults rather than share them', () => {
    expect(mergeSection(DEFAULT_CONTEXT_SETTINGS, undefined)).not.toBe(DEFAULT_CONTEXT_SETTINGS);
  });
});
