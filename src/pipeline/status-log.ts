import type { LogLevel, StatusLogEntry } from '@/types/pipeline';
import { createLogger, type Logger } from '@/utils/logger';

export type StatusLogListener = (entry: StatusLogEntry) => void;

/**
 * Append-only progress log for one document. Entries are frozen once
 * appended; appends are synchronous, so concurrent page workers never
 * interleave a partial entry. Every append is mirrored to the logger.
 */
export class StatusLog {
  private readonly entries: StatusLogEntry[] = [];
  private readonly listeners = new Set<StatusLogListener>();
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: { logger?: Logger; now?: () => Date } = {}) {
    this.logger = options.logger ?? createLogger('status');
    this.now = options.now ?? (() => new Date());
  }

  append(level: LogLevel, message: string, pageIndex: number | null = null): StatusLogEntry {
    const entry: StatusLogEntry = Object.freeze({
      timestamp: this.now().toISOString(),
      pageIndex,
      level,
      message,
    });
    this.entries.push(entry);
    this.mirror(entry);

    for (const listener of this.listeners) {
      try {
        listener(entry);
      } catch (error) {
        this.logger.error('status listener failed', error);
      }
    }
    return entry;
  }

  info(message: string, pageIndex: number | null = null): StatusLogEntry {
    return this.append('info', message, pageIndex);
  }

  warn(message: string, pageIndex: number | null = null): StatusLogEntry {
    return this.append('warn', message, pageIndex);
  }

  error(message: string, pageIndex: number | null = null): StatusLogEntry {
    return this.append('error', message, pageIndex);
  }

  /** Snapshot; later appends do not show up in the returned array. */
  list(): StatusLogEntry[] {
    return [...this.entries];
  }

  forPage(pageIndex: number): StatusLogEntry[] {
    return this.entries.filter((entry) => entry.pageIndex === pageIndex);
  }

  get size(): number {
    return this.entries.length;
  }

  subscribe(listener: StatusLogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private mirror(entry: StatusLogEntry): void {
    const fields = { page: entry.pageIndex ?? undefined };
    if (entry.level === 'error') {
      this.logger.error(entry.message, undefined, fields);
    } else if (entry.level === 'warn') {
      this.logger.warn(entry.message, fields);
    } else {
      this.logger.info(entry.message, fields);
    }
  }
}
