import env from "./env-vars";

// Console logger. Timestamps and debug output only outside production.

const isDev = env.NODE_ENV !== "production";

export type LogContext = Record<string, string | number | boolean | undefined>;

function formatArg(arg: unknown) {
  if (arg instanceof Error) {
    return arg.stack ?? `${arg.name}: ${arg.message}`;
  }
  if (typeof arg === "object" && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

// Context renders as `key=value` pairs ahead of the message, e.g. `[INFO] sessionId=abc Added claim group`
export function formatLine(level: string, context: LogContext, args: unknown[], time = new Date()) {
  const parts = [
    ...Object.entries(context)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}=${value}`),
    ...args.map(formatArg),
  ];
  const prefix = isDev ? `[${time.toISOString()}] [${level}]` : `[${level}]`;
  return parts.length ? `${prefix} ${parts.join(" ")}` : prefix;
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  /** Logger that prefixes every line with the given context. */
  child: (context: LogContext) => Logger;
}

export function createLogger(context: LogContext = {}): Logger {
  return {
    debug: (...args) => {
      if (isDev) console.debug(formatLine("DEBUG", context, args));
    },
    info: (...args) => {
      console.info(formatLine("INFO", context, args));
    },
    warn: (...args) => {
      console.warn(formatLine("WARN", context, args));
    },
    error: (...args) => {
      console.error(formatLine("ERROR", context, args));
    },
    child: (extra) => createLogger({ ...context, ...extra }),
  };
}

export const logger = createLogger();
