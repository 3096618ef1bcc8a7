/**
 * Step-by-step status log: `[INFO]`, `[SUCCESS]`, `[WARNING]`, `[ERROR]`.
 */

export type LogLevel = 'info' | 'success' | 'warning' | 'error';

const TAGS: Record<LogLevel, string> = {
  info: 'INFO',
  success: 'SUCCESS',
  warning: 'WARNING',
  error: 'ERROR',
};

const COLORS: Record<LogLevel, string> = {
  info: '\x1b[0;34m',
  success: '\x1b[0;32m',
  warning: '\x1b[1;33m',
  error: '\x1b[0;31m',
};

const RESET = '\x1b[0m';

export interface LogEntry {
  level: LogLevel;
  message: string;
}

export interface StepLogger {
  info(message: string): void;
  success(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  /** Unprefixed line (banners, blank lines) */
  plain(message: string): void;
}

export interface StepLoggerOptions {
  /** Where finished lines go. Defaults to stdout. */
  write?: (line: string) => void;
  color?: boolean;
}

/**
 * Whether colored output is appropriate for stdout.
 */
export function shouldColor(env: NodeJS.ProcessEnv = process.env, isTTY = Boolean(process.stdout.isTTY)): boolean {
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== '') return false;
  return isTTY;
}

export function formatLine(level: LogLevel, message: string, color: boolean): string {
  const tag = `[${TAGS[level]}]`;
  return color ? `${COLORS[level]}${tag}${RESET} ${message}` : `${tag} ${message}`;
}

export function createStepLogger(options: StepLoggerOptions = {}): StepLogger {
  const write = options.write ?? ((line: string) => process.stdout.write(`${line}\n`));
  const color = options.color ?? shouldColor();
  const emit = (level: LogLevel) => (message: string) => write(formatLine(level, message, color));
  return {
    info: emit('info'),
    success: emit('success'),
    warning: emit('warning'),
    error: emit('error'),
    plain: (message: string) => write(message),
  };
}

/**
 * Logger that records entries in memory. Used by `--json` output paths and tests.
 */
export function createMemoryLogger(): StepLogger & { entries: LogEntry[]; lines(): string[] } {
  const entries: LogEntry[] = [];
  const push = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };
  return {
    entries,
    info: push('info'),
    success: push('success'),
    warning: push('warning'),
    error: push('error'),
    plain: () => {},
    lines: () => entries.map((entry) => formatLine(entry.level, entry.message, false)),
  };
}
