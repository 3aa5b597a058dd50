export { createWebexBot } from "./bot/bot.js";
export type {
  CardActionHandler,
  CreateWebexBotOptions,
  MonitorWebsocketOpts,
  WebexBot,
  WebhookDisposition,
} from "./bot/bot.js";
export { loadCommandModules, resolveCommandModule } from "./bot/plugins.js";
export type { CommandModule } from "./bot/plugins.js";
export { startWebhookServer } from "./bot/webhook-server.js";
export type { StartWebhookServerOpts, WebhookServer } from "./bot/webhook-server.js";
export { computeWebexSignature, verifyWebexSignature } from "./bot/webhook-security.js";
export {
  CommandParseError,
  CommandRegistry,
  optionalArg,
  requiredArg,
} from "./commands/commands-registry.js";
export type {
  CommandArgBinding,
  CommandArgDefinition,
  CommandCallback,
  CommandHandler,
  CommandInvocation,
  ParsedCommand,
} from "./commands/commands-registry.js";
export { ConfigError, loadConfig, resolveBotToken } from "./config/config.js";
export type { BotConfig } from "./config/config.js";
export { parseActivityFrame } from "./webex/activity.js";
export type { Activity } from "./webex/activity.js";
export { createWebexClient } from "./webex/api.js";
export type { WebexClient, WebexClientOptions } from "./webex/api.js";
export {
  addCardActions,
  addCardBody,
  cardAttachment,
  createAdaptiveCard,
} from "./webex/cards.js";
export type { AdaptiveCard, CardAction, CardElement } from "./webex/cards.js";
export { resolveOrCreateDevice } from "./webex/devices.js";
export { ProvisionFailure, RelayError, TransportError, WebexApiError } from "./webex/errors.js";
export { RelayClient } from "./webex/relay.js";
export type { RelayClientOptions, RelayServerConfig } from "./webex/relay.js";
export { RealtimeTransport } from "./webex/transport.js";
export type { ConnectionState, RealtimeTransportOptions } from "./webex/transport.js";
export type { AttachmentAction, MessageOut, WebexMessage } from "./webex/types.js";
