import { type ILogObj, Logger } from "tslog";

export type LogLevel = "silent" | "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export type ConsoleStyle = "pretty" | "json";

export type LoggerSettings = {
  level?: LogLevel;
  consoleStyle?: ConsoleStyle;
};

export type BotLogger = Logger<ILogObj>;

// tslog numbers its levels silly=0 .. fatal=6.
const LEVEL_IDS: Record<Exclude<LogLevel, "silent">, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

const DEFAULT_SETTINGS: Required<LoggerSettings> = {
  level: "info",
  consoleStyle: "pretty",
};

let configuredSettings: LoggerSettings = {};
let overrideSettings: LoggerSettings | null = null;
let cachedLogger: BotLogger | null = null;

export const LOG_LEVELS: readonly LogLevel[] = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

export function normalizeLogLevel(raw?: string): LogLevel | undefined {
  const lowered = raw?.trim().toLowerCase();
  if (!lowered) return undefined;
  return LOG_LEVELS.find((level) => level === lowered);
}

export function getResolvedLoggerSettings(): Required<LoggerSettings> {
  const envLevel = normalizeLogLevel(process.env.WEBEX_BOT_LOG_LEVEL);
  return {
    level:
      overrideSettings?.level ?? envLevel ?? configuredSettings.level ?? DEFAULT_SETTINGS.level,
    consoleStyle:
      overrideSettings?.consoleStyle ??
      configuredSettings.consoleStyle ??
      DEFAULT_SETTINGS.consoleStyle,
  };
}

function buildLogger(settings: Required<LoggerSettings>): BotLogger {
  if (settings.level === "silent") {
    return new Logger<ILogObj>({ name: "webex-bot", type: "hidden" });
  }
  return new Logger<ILogObj>({
    name: "webex-bot",
    type: settings.consoleStyle,
    minLevel: LEVEL_IDS[settings.level],
  });
}

export function getLogger(): BotLogger {
  if (!cachedLogger) {
    cachedLogger = buildLogger(getResolvedLoggerSettings());
  }
  return cachedLogger;
}

export function getChildLogger(bindings: { module: string } & Record<string, unknown>): BotLogger {
  const { module, ...rest } = bindings;
  return getLogger().getSubLogger({ name: module }, rest);
}

/** Applies settings from the config file; overrides still win. */
export function configureLogger(settings: LoggerSettings) {
  configuredSettings = { ...settings };
  cachedLogger = null;
}

export function setLoggerOverride(settings: LoggerSettings | null) {
  overrideSettings = settings;
  cachedLogger = null;
}

export function resetLogger() {
  overrideSettings = null;
  configuredSettings = {};
  cachedLogger = null;
}
