/**
 * Notification Queue
 *
 * Background work (the update checker) posts here instead of writing to
 * the terminal. Only the REPL main loop drains the queue, between prompts,
 * so background output never interleaves with a running interaction.
 */

import type { LogEntry, LogSink } from './utilities/logger.js';

export type NotificationLevel = 'info' | 'warn';

export interface Notification {
  level: NotificationLevel;
  message: string;
  source: string;
  postedAt: Date;
}

export class NotificationQueue {
  private pending: Notification[] = [];

  constructor(private readonly maxPending = 50) {}

  post(source: string, message: string, level: NotificationLevel = 'info'): void {
    this.pending.push({ level, message, source, postedAt: new Date() });
    if (this.pending.length > this.maxPending) {
      this.pending.shift();
    }
  }

  /**
   * Remove and return everything posted so far, oldest first.
   */
  drain(): Notification[] {
    const drained = this.pending;
    this.pending = [];
    return drained;
  }

  get size(): number {
    return this.pending.length;
  }
}

/**
 * Log sink for background components: entries become notifications,
 * printed by the main loop like any other.
 */
export class NotificationSink implements LogSink {
  constructor(private readonly queue: NotificationQueue) {}

  write(entry: LogEntry): void {
    const { component, ...rest } = entry.data ?? {};
    const details = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
    const level: NotificationLevel = entry.level === 'warn' || entry.level === 'error' ? 'warn' : 'info';
    this.queue.post(typeof component === 'string' ? component : 'log', `${entry.message}${details}`, level);
  }
}
