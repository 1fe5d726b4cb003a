// Environment-aware logging levels
const LOG_LEVELS = {
  SILENT: 0,
  ERROR: 1,
  WARN: 2,
  INFO: 3,
  DEBUG: 4
} as const;

type LogLevel = keyof typeof LOG_LEVELS;

export type LogMeta = Record<string, unknown>;

const isLogLevel = (value: string): value is LogLevel => value in LOG_LEVELS;

export const resolveLogLevel = (raw: string | undefined): number => {
  const name = (raw || 'info').toUpperCase();
  return isLogLevel(name) ? LOG_LEVELS[name] : LOG_LEVELS.INFO;
};

const currentLogLevel = resolveLogLevel(process.env.LOG_LEVEL);

export class SimpleLogger {
  private moduleName: string;
  private functionName: string;

  constructor(module: string, functionName?: string) {
    this.moduleName = module;
    this.functionName = functionName || '';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] <= currentLogLevel;
  }

  private prefix(): string {
    return this.functionName ? `[${this.moduleName}:${this.functionName}]` : `[${this.moduleName}]`;
  }

  error(message: string, error?: unknown, meta?: LogMeta) {
    if (this.shouldLog('ERROR')) {
      const detail = error instanceof Error ? error.message : error;
      console.error(`${this.prefix()} ${message}`, ...[detail, meta].filter(part => part !== undefined));
    }
  }

  warn(message: string, meta?: LogMeta) {
    if (this.shouldLog('WARN')) {
      console.warn(`${this.prefix()} ${message}`, ...(meta ? [meta] : []));
    }
  }

  info(message: string, meta?: LogMeta) {
    if (this.shouldLog('INFO')) {
      console.info(`${this.prefix()} ${message}`, ...(meta ? [meta] : []));
    }
  }

  // Per-request chatter, off unless LOG_LEVEL=debug
  debug(message: string, meta?: LogMeta) {
    if (this.shouldLog('DEBUG')) {
      console.debug(`${this.prefix()} ${message}`, ...(meta ? [meta] : []));
    }
  }
}

// Factory function for consistent logger creation
export const getLogger = (module: string, functionName?: string) => {
  return new SimpleLogger(module, functionName);
};
