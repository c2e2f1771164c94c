export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export type LogContext = Record<string, unknown>;

export class Logger {
  constructor(
    private readonly minLevel: LogLevel,
    private readonly bindings: LogContext = {}
  ) {}

  /** Returns a logger that adds `bindings` to the context of every line it writes. */
  child(bindings: LogContext): Logger {
    return new Logger(this.minLevel, { ...this.bindings, ...bindings });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return PRIORITY[level] >= PRIORITY[this.minLevel];
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const merged = { ...this.bindings, ...(context ?? {}) };
    const payload = {
      ts: new Date().toISOString(),
      level,
      message,
      ...(Object.keys(merged).length > 0 ? { context: merged } : {})
    };

    // stdout belongs to the stdio transport.
    process.stderr.write(`${JSON.stringify(payload)}\n`);
  }
}
