import pino from "pino";

const LEVELS: pino.Level[] = ["fatal", "error", "warn", "info", "debug", "trace"];

function initialLevel(): pino.Level {
  const requested = process.env["LOG_LEVEL"]?.toLowerCase();
  return LEVELS.find((level) => level === requested) ?? "info";
}

// stdout is reserved for command output
const destination: pino.DestinationStream = process.stderr.isTTY
  ? pino.transport({
      target: "pino-pretty",
      options: {
        colorize: true,
        destination: 2,
        ignore: "pid,hostname,time",
      },
    })
  : pino.destination({ dest: 2, sync: true });

export const logger = pino(
  {
    level: initialLevel(),
    base: undefined,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  destination,
);

function join(parts: unknown[]): string {
  return parts.map((part) => String(part)).join(" ");
}

export function setVerbose(verbose: boolean): void {
  logger.level = verbose ? "debug" : initialLevel();
}

export function isVerbose(): boolean {
  return logger.isLevelEnabled("debug");
}

export function debug(...parts: unknown[]): void {
  logger.debug(join(parts));
}

export function warn(...parts: unknown[]): void {
  logger.warn(join(parts));
}

export function error(...parts: unknown[]): void {
  logger.error(join(parts));
}
