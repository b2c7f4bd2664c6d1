import pino from 'pino';
import type { Level, LevelWithSilent, Logger } from 'pino';

export type { Logger } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/** Map a level name from config or the environment onto a pino level (default: `info`). */
export function resolveLevel(value: string | undefined): LevelWithSilent {
  return LEVELS.find((level) => level === value) ?? 'info';
}

let root: Logger = pino({ level: resolveLevel(process.env['LOG_LEVEL']) });

/** Root logger instance. Respects the `LOG_LEVEL` environment variable (default: `info`). */
export function rootLogger(): Logger {
  return root;
}

/**
 * Rebuild the root logger. With `file`, every entry is written to stdout and
 * appended to that file. Loggers created earlier keep their old destination,
 * so call this before constructing harness components.
 */
export function initLogger(opts: { level?: string; file?: string } = {}): Logger {
  const level = resolveLevel(opts.level ?? process.env['LOG_LEVEL']);
  if (opts.file) {
    const streamLevel: Level = level === 'silent' ? 'fatal' : level;
    root = pino(
      { level },
      pino.multistream([
        { level: streamLevel, stream: process.stdout },
        { level: streamLevel, stream: pino.destination({ dest: opts.file, mkdir: true, sync: false }) },
      ]),
    );
  } else {
    root = pino({ level });
  }
  return root;
}

/** Create a child logger tagged with `component`. */
export function createLogger(name: string): Logger {
  return root.child({ component: name });
}
