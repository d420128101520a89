import { ConsoleLogger, Injectable, LogLevel, Optional } from '@nestjs/common';

type JsonLevel = 'info' | 'warn' | 'error' | 'debug' | 'verbose';

// Ordered from most to least severe; a configured level enables itself and everything above it
const LEVELS_BY_THRESHOLD: readonly LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Nest log levels enabled for a threshold
 * @param threshold - Least severe level to keep
 */
export function logLevelsFrom(threshold: LogLevel): LogLevel[] {
  const index = LEVELS_BY_THRESHOLD.indexOf(threshold);
  return LEVELS_BY_THRESHOLD.slice(0, index < 0 ? LEVELS_BY_THRESHOLD.length : index + 1);
}

/**
 * JSON line logger.
 * Writes to stdout with {ts,level,context,msg,...meta} shape so log shippers need no parsing rules.
 */
@Injectable()
export class JsonLogger extends ConsoleLogger {
  constructor(@Optional() context?: string) {
    super(context ?? 'advisory-api');
  }

  private normalizeError(error: unknown): Record<string, unknown> {
    if (error instanceof Error) {
      return { name: error.name, message: error.message, stack: error.stack };
    }

    if (typeof error === 'object' && error !== null) {
      // Best-effort serialization for non-Error throwables (cycles fall back to String()).
      try {
        return { value: JSON.stringify(error) };
      } catch {
        return { value: String(error) };
      }
    }

    return { value: String(error) };
  }

  private normalizeMessage(message: unknown): Record<string, unknown> {
    if (message instanceof Error) {
      return { msg: message.message, error: this.normalizeError(message) };
    }
    return { msg: message };
  }

  /**
   * Serialize one entry
   * A string second argument is a Nest context name; an object is structured metadata
   */
  toJsonLine(level: JsonLevel, message: unknown, metaOrContext?: string | Record<string, unknown>): string {
    const context = typeof metaOrContext === 'string' ? metaOrContext : this.context;
    const meta = typeof metaOrContext === 'string' ? {} : (metaOrContext ?? {});
    return JSON.stringify({
      ts: new Date().toISOString(),
      level,
      context,
      ...this.normalizeMessage(message),
      ...meta
    });
  }

  log(message: unknown, context?: string): void;
  log(message: unknown, meta?: Record<string, unknown>): void;
  log(message: unknown, metaOrContext?: string | Record<string, unknown>) {
    super.log(this.toJsonLine('info', message, metaOrContext));
  }

  warn(message: unknown, context?: string): void;
  warn(message: unknown, meta?: Record<string, unknown>): void;
  warn(message: unknown, metaOrContext?: string | Record<string, unknown>) {
    super.warn(this.toJsonLine('warn', message, metaOrContext));
  }

  error(message: unknown, stack?: string, context?: string): void;
  error(message: unknown, meta?: Record<string, unknown>): void;
  error(message: unknown, stackOrMeta?: string | Record<string, unknown>, maybeContext?: string) {
    if (typeof stackOrMeta === 'string') {
      // Nest's own (message, stack, context) form
      super.error(this.toJsonLine('error', message, { stack: stackOrMeta, context: maybeContext ?? this.context }));
      return;
    }
    super.error(this.toJsonLine('error', message, stackOrMeta));
  }

  debug(message: unknown, context?: string): void;
  debug(message: unknown, meta?: Record<string, unknown>): void;
  debug(message: unknown, metaOrContext?: string | Record<string, unknown>) {
    super.debug(this.toJsonLine('debug', message, metaOrContext));
  }

  verbose(message: unknown, context?: string): void;
  verbose(message: unknown, meta?: Record<string, unknown>): void;
  verbose(message: unknown, metaOrContext?: string | Record<string, unknown>) {
    super.verbose(this.toJsonLine('verbose', message, metaOrContext));
  }

  /** Keeps Nest from downgrading log levels when bufferLogs=true. */
  setLogLevels(levels: LogLevel[]) {
    super.setLogLevels(levels);
  }
}
