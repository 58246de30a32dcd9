export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  [key: string]: unknown;
}

export class Logger {
  constructor(
    private prefix: string,
    private context: LogContext = {},
  ) {}

  debug(message: string, context?: LogContext) {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext) {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext) {
    this.log("warn", message, context);
  }

  error(message: string, error?: Error, context?: LogContext) {
    const errorContext = error
      ? {
          error: error.message,
          ...context,
        }
      : context;
    this.log("error", message, errorContext);
  }

  child(context: LogContext): Logger {
    return new Logger(this.prefix, { ...this.context, ...context });
  }

  private log(level: LogLevel, message: string, context?: LogContext) {
    if (!shouldLog(level)) return;

    const fullContext = { ...this.context, ...context };
    const contextStr =
      Object.keys(fullContext).length > 0
        ? ` ${JSON.stringify(fullContext)}`
        : "";

    const formattedMessage = `[${this.prefix}] ${message}${contextStr}`;

    switch (level) {
      case "debug":
        console.debug(formattedMessage);
        break;
      case "info":
        console.log(formattedMessage);
        break;
      case "warn":
        console.warn(formattedMessage);
        break;
      case "error":
        console.error(formattedMessage);
        break;
    }
  }
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

// LOG_LEVEL is read per call, not cached
function shouldLog(level: LogLevel): boolean {
  const configured = (process.env.LOG_LEVEL || "info").toLowerCase();
  const threshold = isLogLevel(configured) ? configured : "info";
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export function createLogger(prefix: string, context?: LogContext): Logger {
  return new Logger(prefix, context);
}

export const loggers = {
  config: createLogger("Config"),
  export: createLogger("Export"),
  batch: createLogger("Batch"),
  db: createLogger("DB"),
  cli: createLogger("CLI"),
};
