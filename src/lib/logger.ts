type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

/**
 * Console logger tagged with `[scope]`. Only errors are written in
 * production builds.
 */
export function createLogger(scope: string): Logger {
  const log = (level: LogLevel, msg: string, ...args: unknown[]) => {
    if (process.env.NODE_ENV !== "production" || level === "error") {
      console[level](`[${scope}]`, msg, ...args);
    }
  };

  return {
    debug: (msg, ...args) => log("debug", msg, ...args),
    info: (msg, ...args) => log("info", msg, ...args),
    warn: (msg, ...args) => log("warn", msg, ...args),
    error: (msg, ...args) => log("error", msg, ...args),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
