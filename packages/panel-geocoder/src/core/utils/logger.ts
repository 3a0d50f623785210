/**
 * Library logger
 *
 * Writes JSON lines when NODE_ENV is production and single readable lines
 * otherwise. `LOG_LEVEL` sets the threshold. The CLI has its own logger in
 * cli/lib/logger.ts; this one is what the services log through.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMetadata = Readonly<Record<string, unknown>>;

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
  /** Fields attached to every entry */
  readonly bindings?: LogMetadata;
}

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export class Logger {
  constructor(private readonly config: LoggerConfig) {}

  /**
   * A logger that adds `bindings` to everything it writes.
   */
  child(bindings: LogMetadata): Logger {
    return new Logger({
      ...this.config,
      bindings: { ...this.config.bindings, ...bindings },
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.write('error', message, metadata);
  }

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (SEVERITY[level] < SEVERITY[this.config.level]) return;

    const fields = { ...this.config.bindings, ...metadata };
    const time = new Date().toISOString();

    if (!this.config.pretty) {
      WRITERS[level](
        JSON.stringify({ time, level, service: this.config.service, message, ...fields })
      );
      return;
    }

    const extra = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
    WRITERS[level](`${time} ${level.toUpperCase().padEnd(5)} [${this.config.service}] ${message}${extra}`);
  }
}

function levelFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' ? raw : 'info';
}

export const logger = new Logger({
  level: levelFromEnv(),
  service: 'panel-geocoder',
  pretty: process.env.NODE_ENV !== 'production',
});

export function createLogger(context: { readonly module: string }): Logger {
  return logger.child({ module: context.module });
}
