import pino, { type Level, type Logger } from "pino";

const LEVELS: ReadonlySet<string> = new Set<Level>(["fatal", "error", "warn", "info", "debug", "trace"]);

// Determine if the environment is silent (e.g., CI, testing, or specific env var)
const isSilentMode = (): boolean =>
  process.env.CI === "true" ||
  process.env.NODE_ENV === "test" ||
  process.env.NULLMASK_SILENT === "true";

function isLevel(value: string): value is Level {
  return LEVELS.has(value);
}

function initialLevel(): Level {
  const fromEnv = process.env.NULLMASK_LOG_LEVEL?.toLowerCase();
  return fromEnv && isLevel(fromEnv) ? fromEnv : "info";
}

let baseLogger: Logger | null = null;

/**
 * The pino instance behind the wrapper, created on first use.
 *
 * Output always goes to stderr: stdout is reserved for datasets and
 * machine-readable summaries.
 */
function getBaseLogger(): Logger {
  if (baseLogger) {
    return baseLogger;
  }

  // In tests, we don't want the pretty transport, as it adds noise.
  const pretty = process.env.NODE_ENV !== "test" && process.stderr.isTTY === true;

  baseLogger = pretty
    ? pino({
        name: "nullmask",
        level: initialLevel(),
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            destination: 2,
            ignore: "pid,hostname",
            translateTime: "SYS:standard",
          },
        },
      })
    : pino({ name: "nullmask", level: initialLevel() }, pino.destination(2));

  return baseLogger;
}

/**
 * Set the minimum level written by the shared logger
 */
export function setLogLevel(level: Level): void {
  getBaseLogger().level = level;
}

export function getLogLevel(): string {
  return getBaseLogger().level;
}

// Wrapper to dynamically check silent mode on each call
export const logger = {
  info: (obj: object | string, message?: string): void => {
    if (!isSilentMode()) {
      write(getBaseLogger(), "info", obj, message);
    }
  },
  warn: (obj: object | string, message?: string): void => {
    if (!isSilentMode()) {
      write(getBaseLogger(), "warn", obj, message);
    }
  },
  error: (obj: object | string, message?: string): void => {
    if (!isSilentMode()) {
      write(getBaseLogger(), "error", obj, message);
    }
  },
  debug: (obj: object | string, message?: string): void => {
    if (!isSilentMode()) {
      write(getBaseLogger(), "debug", obj, message);
    }
  },
  isLevelEnabled: (level: Level): boolean => {
    if (isSilentMode()) {
      return false;
    }
    return getBaseLogger().isLevelEnabled(level);
  },
};

function write(target: Logger, level: Level, obj: object | string, message?: string): void {
  if (typeof obj === "string") {
    target[level](obj);
  } else if (message !== undefined) {
    target[level](obj, message);
  } else {
    target[level](obj);
  }
}

export type { Level as LogLevel };
