import type { ConsoleStyle, LogLevel } from "../logging.js";

export type BotMode = "websocket" | "webhook";

export type ApiConfig = {
  /** REST base URL. Default: https://webexapis.com/v1 */
  baseUrl?: string;
  /** Device registry (WDM) base URL. Default: https://wdm-a.wbx2.com/wdm/api/v1 */
  deviceUrl?: string;
};

export type DeviceConfig = {
  /** Reuse a device registered under the same name. Default: true */
  preferExisting?: boolean;
  name?: string;
  deviceName?: string;
};

export type TransportConfig = {
  connectTimeoutMs?: number;
  closeTimeoutMs?: number;
};

export type WebhookConfig = {
  host?: string;
  port?: number;
  path?: string;
  /** Shared secret used to verify X-Spark-Signature. */
  secret?: string;
};

export type CommandsConfig = {
  /** Module specifiers loaded at startup; each registers commands on the bot. */
  modules?: string[];
};

export type LoggingConfig = {
  level?: LogLevel;
  consoleStyle?: ConsoleStyle;
};

export type BotConfig = {
  token?: string;
  mode?: BotMode;
  api?: ApiConfig;
  device?: DeviceConfig;
  transport?: TransportConfig;
  webhook?: WebhookConfig;
  commands?: CommandsConfig;
  logging?: LoggingConfig;
};

export type ConfigValidationIssue = {
  path: string;
  message: string;
};

export type ConfigFileSnapshot = {
  path: string;
  exists: boolean;
  raw: string | null;
  parsed: unknown;
  valid: boolean;
  config: BotConfig;
  issues: ConfigValidationIssue[];
};
