/**
 * Simple logger utility that writes to stderr
 * Keeps stdout free for CLI output
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let levelOverride: LogLevel | undefined;

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Set the minimum level; pass undefined to fall back to LOG_LEVEL
 */
export function setLogLevel(level: LogLevel | undefined): void {
  levelOverride = level;
}

function currentLevel(): LogLevel {
  if (levelOverride) return levelOverride;
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
}

function writeArgs(args: unknown[]): void {
  if (args.length > 0) {
    process.stderr.write(`${JSON.stringify(args, null, 2)}\n`);
  }
}

export const logger = {
  info: (message: string, ...args: unknown[]) => {
    if (!enabled('info')) return;
    process.stderr.write(`[INFO] ${message}\n`);
    writeArgs(args);
  },

  error: (message: string, error?: unknown) => {
    if (!enabled('error')) return;
    process.stderr.write(`[ERROR] ${message}\n`);
    if (error) {
      process.stderr.write(
        `${error instanceof Error ? error.stack : JSON.stringify(error, null, 2)}\n`
      );
    }
  },

  debug: (message: string, ...args: unknown[]) => {
    if (!enabled('debug')) return;
    process.stderr.write(`[DEBUG] ${message}\n`);
    writeArgs(args);
  },

  warn: (message: string, ...args: unknown[]) => {
    if (!enabled('warn')) return;
    process.stderr.write(`[WARN] ${message}\n`);
    writeArgs(args);
  },
};
