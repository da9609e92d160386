export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

function levelFromEnv(): LogLevel {
  const raw = process.env.DECKFIT_LOG_LEVEL?.toLowerCase();
  if (raw && raw in LEVEL_NAMES) {
    return LEVEL_NAMES[raw] ?? LogLevel.INFO;
  }
  return process.env.NODE_ENV === "test" ? LogLevel.WARN : LogLevel.INFO;
}

export class Logger {
  private level: LogLevel;

  constructor(private readonly context?: string) {
    this.level = levelFromEnv();
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) this.log("DEBUG", message, args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) this.log("INFO", message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) this.log("WARN", message, args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.level > LogLevel.ERROR) return;
    const first = args[0];
    if (first instanceof Error) {
      this.log("ERROR", message, [{ errorMessage: first.message, stack: first.stack }, ...args.slice(1)]);
    } else {
      this.log("ERROR", message, args);
    }
  }

  /** Logger for a sub-component, sharing this logger's level */
  child(context: string): Logger {
    const child = new Logger(this.context ? `${this.context}:${context}` : context);
    child.setLevel(this.level);
    return child;
  }

  private log(level: string, message: string, args: unknown[]): void {
    const timestamp = new Date().toISOString();
    const ctx = this.context ? `[${this.context}]` : "";
    // stdout is reserved for CLI output
    const logFn = level === "ERROR" ? console.error : level === "WARN" ? console.warn : console.error;
    if (args.length > 0) {
      logFn(`${timestamp} ${level} ${ctx} ${message}`, ...args);
    } else {
      logFn(`${timestamp} ${level} ${ctx} ${message}`);
    }
  }
}

/** Create a logger tagged with a component name */
export function createLogger(context: string): Logger {
  return new Logger(context);
}
