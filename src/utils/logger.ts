// ANSI color codes
const COLORS = {
  reset: '\x1b[0m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  green: '\x1b[32m',
  red: '\x1b[31m',
  dim: '\x1b[2m',
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  category: string;
  message: string;
}

export interface LoggerOptions {
  verbose?: boolean;
  color?: boolean;
  maxEntries?: number;
  write?: (line: string) => void;
}

const LEVEL_STYLE: Record<LogLevel, { symbol: string; color: string }> = {
  debug: { symbol: '·', color: COLORS.dim },
  info: { symbol: 'ℹ', color: COLORS.cyan },
  warn: { symbol: '⚠', color: COLORS.yellow },
  error: { symbol: '✗', color: COLORS.red },
  success: { symbol: '✓', color: COLORS.green },
};

const DEFAULT_MAX_ENTRIES = 1000;

/**
 * Leveled console logger. Writes to stderr so stdout only ever carries the
 * rendered report. Debug lines are printed only in verbose mode, but every
 * entry is kept in a bounded buffer.
 */
export class Logger {
  private entries: LogEntry[] = [];
  private readonly verbose: boolean;
  private readonly color: boolean;
  private readonly maxEntries: number;
  private readonly write: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.color = options.color ?? Boolean(process.stderr.isTTY);
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.write = options.write ?? ((line) => process.stderr.write(`${line}\n`));
  }

  debug(message: string, category = 'General'): void {
    this.log('debug', message, category);
  }

  info(message: string, category = 'General'): void {
    this.log('info', message, category);
  }

  warn(message: string, category = 'General'): void {
    this.log('warn', message, category);
  }

  error(message: string, category = 'General'): void {
    this.log('error', message, category);
  }

  success(message: string, category = 'General'): void {
    this.log('success', message, category);
  }

  getEntries(category?: string): LogEntry[] {
    if (!category) return [...this.entries];
    return this.entries.filter((entry) => entry.category === category);
  }

  clear(): void {
    this.entries = [];
  }

  private log(level: LogLevel, message: string, category: string): void {
    this.entries.push({ timestamp: new Date(), level, category, message });
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }

    if (level === 'debug' && !this.verbose) return;
    this.write(this.format(level, message, category));
  }

  private format(level: LogLevel, message: string, category: string): string {
    const { symbol, color } = LEVEL_STYLE[level];
    const line = `${symbol} [${category}] ${message}`;
    return this.color ? `${color}${line}${COLORS.reset}` : line;
  }
}

/** Logger that records entries but prints nothing. */
export function createSilentLogger(): Logger {
  return new Logger({ write: () => undefined });
}
