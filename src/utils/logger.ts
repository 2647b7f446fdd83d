/* Simple structured logger helper so we can swap implementations later if needed */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

class Logger {
  private level: LogLevel = 'info';

  setLevel(level: LogLevel) {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(message: string, meta?: Record<string, unknown>) {
    if (!this.enabled('debug')) return;
    console.debug(`[DEBUG] ${new Date().toISOString()} - ${message}`, meta ?? '');
  }

  info(message: string, meta?: Record<string, unknown>) {
    if (!this.enabled('info')) return;
    console.log(`[INFO] ${new Date().toISOString()} - ${message}`, meta ?? '');
  }

  warn(message: string, meta?: Record<string, unknown>) {
    if (!this.enabled('warn')) return;
    console.warn(`[WARN] ${new Date().toISOString()} - ${message}`, meta ?? '');
  }

  error(message: string, meta?: unknown) {
    if (!this.enabled('error')) return;
    console.error(`[ERROR] ${new Date().toISOString()} - ${message}`, meta ?? '');
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.level];
  }
}

export const logger = new Logger();

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
