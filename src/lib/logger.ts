import pino, {
  type LevelWithSilent,
  type Logger,
  type LoggerOptions,
  type TransportTargetOptions,
} from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

// Names accepted for compatibility with syslog-style level names
const LEVEL_ALIASES: Record<string, LevelWithSilent> = {
  warning: "warn",
  critical: "fatal",
};

/**
 * Map a user-supplied level name onto a pino level, or undefined if unknown
 */
export function normalizeLogLevel(raw: string | undefined): LevelWithSilent | undefined {
  if (!raw) return undefined;
  const name = raw.trim().toLowerCase();
  const alias = LEVEL_ALIASES[name];
  if (alias) return alias;
  return LOG_LEVELS.find((level) => level === name);
}

const isDev = (process.env.NODE_ENV || "development") === "development";
const logLevel = normalizeLogLevel(process.env.LOG_LEVEL) ?? (isDev ? "debug" : "info");
const logFile = process.env.LOG_FILE;

/**
 * Call sites log failures as `{ error }`, so that key gets the same
 * serializer pino applies to `err`
 */
export function createLoggerOptions(level: LevelWithSilent): LoggerOptions {
  return {
    level,
    serializers: { error: pino.stdSerializers.err },
  };
}

function createLogger(): Logger {
  if (!isDev && !logFile) {
    return pino(createLoggerOptions(logLevel));
  }

  const targets: TransportTargetOptions[] = [
    isDev
      ? {
          target: "pino-pretty",
          level: "trace",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : { target: "pino/file", level: "trace", options: { destination: 1 } },
  ];

  if (logFile) {
    targets.push({
      target: "pino/file",
      level: "trace",
      options: { destination: logFile, mkdir: true },
    });
  }

  return pino(createLoggerOptions(logLevel), pino.transport({ targets }));
}

export const logger = createLogger();

export default logger;
