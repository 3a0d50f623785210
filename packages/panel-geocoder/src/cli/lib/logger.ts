/**
 * Command-line logging
 *
 * One JSON object per line with `--json`, colored lines otherwise. Once
 * `commandStart` has run, JSON entries carry the command name.
 *
 * @module cli/lib/logger
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMetadata = Readonly<Record<string, unknown>>;

export interface CLILoggerConfig {
  readonly level: LogLevel;
  readonly json: boolean;
  readonly service: string;
}

export interface ProgressOptions {
  readonly current: number;
  readonly total: number;
  readonly label?: string;
}

interface LevelStyle {
  readonly rank: number;
  readonly tag: string;
  readonly color: string;
  readonly write: (line: string) => void;
}

// ============================================================================
// Constants
// ============================================================================

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const BAR_WIDTH = 24;

const LEVELS: Record<LogLevel, LevelStyle> = {
  debug: { rank: 10, tag: 'dbg', color: '\x1b[90m', write: (line) => console.debug(line) },
  info: { rank: 20, tag: 'inf', color: '\x1b[36m', write: (line) => console.info(line) },
  warn: { rank: 30, tag: 'wrn', color: '\x1b[33m', write: (line) => console.warn(line) },
  error: { rank: 40, tag: 'err', color: '\x1b[31m', write: (line) => console.error(line) },
};

// ============================================================================
// Logger
// ============================================================================

export class CLILogger {
  private command: string | null = null;
  private commandStartedAt = Date.now();

  constructor(private readonly config: CLILoggerConfig) {}

  debug(message: string, metadata?: LogMetadata): void {
    this.emit('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.emit('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.emit('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.emit('error', message, metadata);
  }

  commandStart(command: string, metadata?: LogMetadata): void {
    this.command = command;
    this.commandStartedAt = Date.now();
    this.info(`${command} started`, metadata);
  }

  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const elapsed = formatDuration(Date.now() - this.commandStartedAt);
    const details = { duration: elapsed, ...metadata };
    if (success) {
      this.info(`${this.command ?? 'command'} finished`, details);
    } else {
      this.error(`${this.command ?? 'command'} failed`, details);
    }
  }

  /**
   * Draws a bar on a terminal. JSON mode logs a debug entry instead, and
   * piped human output gets nothing.
   */
  progress({ current, total, label }: ProgressOptions): void {
    const ratio = total > 0 ? Math.min(current / total, 1) : 1;

    if (this.config.json) {
      this.debug('progress', { current, total, label });
      return;
    }
    if (!process.stdout.isTTY) return;

    const filled = Math.round(ratio * BAR_WIDTH);
    const bar = '#'.repeat(filled).padEnd(BAR_WIDTH, '.');
    const suffix = label === undefined ? '' : ` ${label}`;
    process.stdout.write(`\r${DIM}${bar}${RESET} ${current}/${total}${suffix}`);
    if (current >= total) process.stdout.write('\n');
  }

  /**
   * Rows as an aligned text table, or a single JSON array in JSON mode.
   */
  table(rows: readonly Record<string, unknown>[], columns?: readonly string[]): void {
    if (this.config.json) {
      console.log(JSON.stringify(rows));
      return;
    }

    const first = rows[0];
    if (first === undefined) {
      this.info('Nothing to show');
      return;
    }

    const keys = columns ?? Object.keys(first);
    const cell = (row: Record<string, unknown>, key: string): string => String(row[key] ?? '');
    const widths = keys.map((key) => rows.reduce((w, row) => Math.max(w, cell(row, key).length), key.length));
    const line = (values: readonly string[]): string =>
      values.map((value, i) => value.padEnd(widths[i] ?? 0)).join(' | ');

    console.log(line(keys));
    console.log(widths.map((w) => '-'.repeat(w)).join('-+-'));
    for (const row of rows) {
      console.log(line(keys.map((key) => cell(row, key))));
    }
  }

  private emit(level: LogLevel, message: string, metadata: LogMetadata = {}): void {
    const style = LEVELS[level];
    if (style.rank < LEVELS[this.config.level].rank) return;

    style.write(
      this.config.json
        ? this.toJson(level, message, metadata)
        : this.toText(style, message, metadata)
    );
  }

  private toJson(level: LogLevel, message: string, metadata: LogMetadata): string {
    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.config.service,
    };
    if (this.command !== null) entry.command = this.command;
    return JSON.stringify({ ...entry, ...metadata });
  }

  private toText(style: LevelStyle, message: string, metadata: LogMetadata): string {
    const pairs = Object.entries(metadata)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}=${typeof value === 'object' ? JSON.stringify(value) : String(value)}`);
    const tail = pairs.length > 0 ? ` ${DIM}${pairs.join(' ')}${RESET}` : '';
    return `${style.color}${style.tag}${RESET} ${message}${tail}`;
  }
}

export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'info',
    json: config.json ?? false,
    service: config.service ?? 'panel-geocoder',
  });
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(2)}s`;
  const minutes = Math.floor(ms / 60_000);
  return `${minutes}m ${((ms % 60_000) / 1000).toFixed(1)}s`;
}
