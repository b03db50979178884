export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export const isLogLevel = (value: string): value is LogLevel => Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);

const toStructuredLogArgs = (message: string, context?: Record<string, unknown>): [string, Record<string, unknown>] => {
  if (context && Object.keys(context).length > 0) {
    return [message, context];
  }
  return [message, {}];
};

export const createConsoleLogger = (options: { level?: LogLevel } = {}): Logger => {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= threshold;
  return {
    debug(message, context) {
      if (!enabled("debug")) {
        return;
      }
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.debug(msg, ctx);
    },
    info(message, context) {
      if (!enabled("info")) {
        return;
      }
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.info(msg, ctx);
    },
    warn(message, context) {
      if (!enabled("warn")) {
        return;
      }
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.warn(msg, ctx);
    },
    error(message, context) {
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.error(msg, ctx);
    }
  };
};

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : "unknown");
