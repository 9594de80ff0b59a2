/**
 * Update Checker
 *
 * Polls the npm registry for a newer release. Results are cached on disk
 * for the polling interval and reported through the NotificationQueue.
 * Every failure is logged at debug level and treated as "no update".
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { getUpdateCachePath } from '../paths.js';
import type { FetchLike } from '../providers/types.js';
import { createComponentLogger, type StructuredLogger } from './utilities/logger.js';
import type { NotificationQueue } from './notifications.js';

export const DEFAULT_CHECK_INTERVAL_MS = 30 * 60 * 1000;
const REQUEST_TIMEOUT_MS = 5000;

export interface UpdateInfo {
  currentVersion: string;
  latestVersion: string;
}

const RegistryResponseSchema = z.object({ version: z.string() });

const CacheSchema = z.object({
  updateAvailable: z.boolean(),
  latestVersion: z.string().optional(),
  checkedAt: z.string(),
});

type UpdateCache = z.infer<typeof CacheSchema>;

export interface UpdateCheckerOptions {
  currentVersion: string;
  packageName?: string;
  registryUrl?: string;
  cachePath?: string;
  intervalMs?: number;
  notifications?: NotificationQueue;
  fetchImpl?: FetchLike;
  now?: () => Date;
  logger?: StructuredLogger;
}

/**
 * Numeric comparison of dotted versions; a leading "v" and any
 * pre-release suffix are ignored. Negative when `a` is older.
 */
export function compareVersions(a: string, b: string): number {
  const parts = (version: string) =>
    version
      .replace(/^v/, '')
      .split(/[-+]/)[0]
      ?.split('.')
      .map((part) => Number.parseInt(part, 10) || 0) ?? [];

  const left = parts(a);
  const right = parts(b);
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

export class UpdateChecker {
  private readonly currentVersion: string;
  private readonly url: string;
  private readonly cachePath: string;
  private readonly intervalMs: number;
  private readonly notifications?: NotificationQueue;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;
  private readonly logger: StructuredLogger;
  private timer?: NodeJS.Timeout;
  private announced?: string;

  constructor(options: UpdateCheckerOptions) {
    this.currentVersion = options.currentVersion;
    const registry = options.registryUrl ?? 'https://registry.npmjs.org';
    this.url = `${registry}/${options.packageName ?? 'stepwright'}/latest`;
    this.cachePath = options.cachePath ?? getUpdateCachePath();
    this.intervalMs = options.intervalMs ?? DEFAULT_CHECK_INTERVAL_MS;
    this.notifications = options.notifications;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => new Date());
    this.logger = createComponentLogger('UpdateChecker', options.logger);
  }

  /**
   * Newer release, or null. A fresh cache entry answers without a request
   * unless `force` is set.
   */
  async check(force = false): Promise<UpdateInfo | null> {
    if (!force) {
      const cached = await this.readCache();
      if (cached && this.now().getTime() - Date.parse(cached.checkedAt) < this.intervalMs) {
        return cached.updateAvailable && cached.latestVersion
          ? { currentVersion: this.currentVersion, latestVersion: cached.latestVersion }
          : null;
      }
    }

    try {
      const response = await this.fetchImpl(this.url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
      if (response.status === 404) {
        await this.writeCache({ updateAvailable: false });
        return null;
      }
      if (!response.ok) {
        this.logger.debug('Update check failed', { status: response.status });
        return null;
      }

      const parsed = RegistryResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        this.logger.debug('Unexpected registry response');
        return null;
      }

      const latestVersion = parsed.data.version;
      const updateAvailable = compareVersions(latestVersion, this.currentVersion) > 0;
      this.logger.debug('Version check', { current: this.currentVersion, latest: latestVersion });
      await this.writeCache({ updateAvailable, latestVersion });
      return updateAvailable ? { currentVersion: this.currentVersion, latestVersion } : null;
    } catch (error) {
      this.logger.debug('Error checking for updates', {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  /**
   * Check now and then every interval. The timer does not keep the
   * process alive.
   */
  start(): void {
    if (this.timer) return;
    this.poll();
    this.timer = setInterval(() => this.poll(), this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  private poll(): void {
    this.check()
      .then((info) => {
        if (info && info.latestVersion !== this.announced) {
          this.announced = info.latestVersion;
          this.notifications?.post(
            'updates',
            `New version available: ${info.latestVersion} (current: ${info.currentVersion}). Run: npm install -g stepwright`
          );
        }
      })
      .catch((error: unknown) => {
        this.logger.debug('Update poll failed', { error: error instanceof Error ? error.message : String(error) });
      });
  }

  private async readCache(): Promise<UpdateCache | null> {
    try {
      const parsed = CacheSchema.safeParse(JSON.parse(await readFile(this.cachePath, 'utf-8')));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      this.logger.debug('No usable update cache', {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private async writeCache(data: Omit<UpdateCache, 'checkedAt'>): Promise<void> {
    const entry: UpdateCache = { ...data, checkedAt: this.now().toISOString() };
    try {
      await mkdir(dirname(this.cachePath), { recursive: true });
      await writeFile(this.cachePath, JSON.stringify(entry, null, 2), 'utf-8');
    } catch (error) {
      this.logger.debug('Could not write update cache', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
