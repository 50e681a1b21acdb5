export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in SEVERITY;
}

/**
 * Prefixed, leveled lines on stderr, keeping stdout free for command output.
 * `LOG_LEVEL` overrides the threshold given to the root logger.
 */
class Logger {
  readonly prefix: string;
  readonly level: LogLevel;

  constructor(prefix: string = 'bench-extract', level: LogLevel = 'info') {
    const fromEnv = process.env.LOG_LEVEL;
    this.prefix = prefix;
    this.level = isLogLevel(fromEnv) ? fromEnv : level;
  }

  isEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  /** Logger for one component, e.g. `bench-extract:locator`. */
  child(component: string): Logger {
    return new Logger(`${this.prefix}:${component}`, this.level);
  }

  private write(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) {
      return;
    }
    console.error(`[${new Date().toISOString()}] [${this.prefix}] [${level.toUpperCase()}] ${message}`);
  }
}

export const logger = new Logger();
export { Logger };
