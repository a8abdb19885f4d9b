/**
 * Tagged console logger. Lines look like `[panel:page] stage action k=v`.
 *
 * Usage: const logger = createLogger('pipeline')
 *        logger.info('page done', { page: 2, regions: 5 })
 */

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface LogSink {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface Logger {
  info(action: string, fields?: LogFields): void;
  warn(action: string, fields?: LogFields): void;
  error(action: string, error?: unknown, fields?: LogFields): void;
  child(tag: string): Logger;
}

export function formatLogLine(tag: string, action: string, fields?: LogFields): string {
  const parts = [`[panel:${tag}] ${action}`];
  if (fields) {
    const entries = Object.entries(fields)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}=${value}`)
      .join(' ');
    if (entries) parts.push(entries);
  }
  return parts.join(' ');
}

export function createLogger(tag: string, sink: LogSink = console): Logger {
  return {
    info: (action, fields) => sink.log(formatLogLine(tag, action, fields)),
    warn: (action, fields) => sink.warn(formatLogLine(tag, action, fields)),
    error: (action, error, fields) => {
      const detail = error === undefined ? action : `${action} ERROR: ${describeError(error)}`;
      sink.error(formatLogLine(tag, detail, fields));
    },
    child: (childTag) => createLogger(`${tag}:${childTag}`, sink),
  };
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/** Drops everything; handy default for tests and embedded use. */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
