import pino from "pino";
import type { Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";
export type LogFormat = "pretty" | "json";

export interface ResolvedLogConfig {
  level: LogLevel;
  format: LogFormat;
}

const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  const normalized = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

function parseLogFormat(raw: string | undefined): LogFormat | undefined {
  const normalized = raw?.trim().toLowerCase();
  return normalized === "pretty" || normalized === "json" ? normalized : undefined;
}

export function resolveLogConfig(overrides: Partial<ResolvedLogConfig> = {}): ResolvedLogConfig {
  const envLevel = parseLogLevel(process.env.DICEDB_LOG);
  const envFormat = parseLogFormat(process.env.DICEDB_LOG_FORMAT);

  const level: LogLevel = envLevel ?? overrides.level ?? "warn";
  const format: LogFormat = envFormat ?? overrides.format ?? "json";

  return { level, format };
}

export function createRootLogger(overrides?: Partial<ResolvedLogConfig>): PinoLogger {
  const config = resolveLogConfig(overrides);

  const transport =
    config.format === "pretty"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            singleLine: true,
            ignore: "pid,hostname",
          },
        }
      : undefined;

  return pino({
    level: config.level,
    transport,
  });
}

export function createChildLogger(parent: PinoLogger, name: string): PinoLogger {
  return parent.child({ name });
}

let rootLogger: PinoLogger | null = null;

export function getRootLogger(): PinoLogger {
  if (!rootLogger) {
    rootLogger = createRootLogger();
  }
  return rootLogger;
}
