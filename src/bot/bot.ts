import {
  type CommandArgDefinition,
  type CommandCallback,
  type CommandHandler,
  CommandRegistry,
  type CommandTableEntry,
} from "../commands/commands-registry.js";
import type { BotConfig } from "../config/config.js";
import { danger, logVerbose } from "../globals.js";
import { getChildLogger } from "../logging.js";
import type { RuntimeEnv } from "../runtime.js";
import {
  type Activity,
  buildAckFrame,
  isCreatedMessage,
  parseActivityFrame,
  toRestAttachmentActionId,
  toRestMessageId,
} from "../webex/activity.js";
import { createWebexClient, type WebexClient } from "../webex/api.js";
import { resolveDeviceDescriptor, resolveOrCreateDevice } from "../webex/devices.js";
import { ProvisionFailure } from "../webex/errors.js";
import { type ConnectionState, RealtimeTransport } from "../webex/transport.js";
import {
  type AttachmentAction,
  type WebexMessage,
  WebhookEnvelopeSchema,
} from "../webex/types.js";

export type CardActionHandler = (params: {
  client: WebexClient;
  action: AttachmentAction;
}) => void | Promise<void>;

export type CreateWebexBotOptions = {
  token: string;
  client?: WebexClient;
  config?: BotConfig;
  runtime?: RuntimeEnv;
  onCardAction?: CardActionHandler;
};

export type MonitorWebsocketOpts = {
  abortSignal?: AbortSignal;
  /** Overrides `device.preferExisting` from config. */
  preferExisting?: boolean;
  onStateChange?: (next: ConnectionState, prev: ConnectionState) => void;
};

export type WebhookDisposition = "accepted" | "ignored" | "invalid";

export type WebexBot = {
  readonly client: WebexClient;
  readonly commands: CommandRegistry;
  addCommand: (
    keyword: string,
    args: readonly CommandArgDefinition[],
    handler: CommandHandler | CommandCallback,
  ) => CommandTableEntry;
  setCardActionHandler: (handler: CardActionHandler | undefined) => void;
  /** Parses and schedules the matching handler. Returns false when the message was dropped. */
  dispatchMessage: (message: WebexMessage) => boolean;
  handleWebhookEvent: (payload: unknown) => WebhookDisposition;
  monitorWebsocket: (opts?: MonitorWebsocketOpts) => Promise<void>;
  /** Resolves once every scheduled handler and fetch has settled. */
  waitForIdle: () => Promise<void>;
};

export function createWebexBot(options: CreateWebexBotOptions): WebexBot {
  const cfg = options.config ?? {};
  const runtime: RuntimeEnv = options.runtime ?? {
    log: console.log,
    error: console.error,
    exit: (code: number): never => {
      throw new Error(`exit ${code}`);
    },
  };
  const log = getChildLogger({ module: "webex-bot" });
  const client =
    options.client ??
    createWebexClient({
      token: options.token,
      baseUrl: cfg.api?.baseUrl,
      deviceUrl: cfg.api?.deviceUrl,
    });
  const commands = new CommandRegistry();
  const inFlight = new Set<Promise<void>>();
  let onCardAction = options.onCardAction;
  let selfId: string | null = null;
  let selfLookup: Promise<string | null> | null = null;

  const track = (label: string, work: () => void | Promise<void>) => {
    const task: Promise<void> = Promise.resolve()
      .then(work)
      .catch((err: unknown) => {
        log.error({ task: label, error: String(err) }, "webex task failed");
        runtime.error(danger(`webex ${label} failed: ${String(err)}`));
      })
      .finally(() => {
        inFlight.delete(task);
      });
    inFlight.add(task);
  };

  // The cloud echoes the bot's own posts back; knowing our person id lets us drop them.
  const resolveSelf = (): Promise<string | null> => {
    if (!selfLookup) {
      selfLookup = client.getMe().then(
        (me) => {
          selfId = me.id;
          return selfId;
        },
        (err: unknown) => {
          log.warn({ error: String(err) }, "could not resolve bot identity; own messages are not filtered");
          selfLookup = null;
          return null;
        },
      );
    }
    return selfLookup;
  };

  const dispatchMessage = (message: WebexMessage): boolean => {
    if (selfId && message.personId === selfId) {
      logVerbose(`webex: skipping own message ${message.id ?? "<unknown>"}`);
      return false;
    }
    const result = commands.parse(message.text ?? "");
    if (!result.ok) {
      logVerbose(`webex: dropped message ${message.id ?? "<unknown>"}: ${result.error.message}`);
      return false;
    }
    const { command, required, optional, handler } = result.command;
    logVerbose(`webex: dispatching "${command}" from ${message.personEmail ?? "unknown sender"}`);
    track(`command "${command}"`, () =>
      handler.handle({ client, message, command, required, optional }),
    );
    return true;
  };

  const runCardAction = async (actionId: string) => {
    const handler = onCardAction;
    if (!handler) {
      logVerbose(`webex: no card action handler; ignoring ${actionId}`);
      return;
    }
    const action = await client.getAttachmentAction(actionId);
    await handler({ client, action });
  };

  const fetchAndDispatch = async (messageId: string) => {
    await resolveSelf();
    const message = await client.getMessage(messageId);
    dispatchMessage(message);
  };

  const handleWebhookEvent = (payload: unknown): WebhookDisposition => {
    const parsed = WebhookEnvelopeSchema.safeParse(payload);
    if (!parsed.success) {
      log.warn({ issues: parsed.error.issues.length }, "invalid webhook envelope");
      return "invalid";
    }
    const envelope = parsed.data;
    if (envelope.resource === "messages" && envelope.event === "created") {
      track("webhook message", () => fetchAndDispatch(envelope.data.id));
      return "accepted";
    }
    if (envelope.resource === "attachmentActions" && envelope.event === "created") {
      track("webhook card action", () => runCardAction(envelope.data.id));
      return "accepted";
    }
    logVerbose(`webex: ignoring webhook ${envelope.resource}/${envelope.event}`);
    return "ignored";
  };

  const handleActivity = (activity: Activity) => {
    switch (activity.kind) {
      case "message":
        if (!isCreatedMessage(activity)) {
          logVerbose(`webex: ignoring message activity (${activity.verb})`);
          return;
        }
        track("realtime message", () => fetchAndDispatch(toRestMessageId(activity.activityId)));
        return;
      case "card-action":
        track("realtime card action", () =>
          runCardAction(toRestAttachmentActionId(activity.activityId)),
        );
        return;
      case "space":
        logVerbose(`webex: space activity ${activity.verb} in ${activity.targetId ?? "?"}`);
        return;
      case "start-typing":
        return;
      case "unknown":
        logVerbose(`webex: ignoring ${activity.type} event`);
        return;
    }
  };

  const monitorWebsocket = async (opts: MonitorWebsocketOpts = {}): Promise<void> => {
    const device = await resolveOrCreateDevice({
      client,
      preferExisting: opts.preferExisting ?? cfg.device?.preferExisting,
      descriptor: resolveDeviceDescriptor(cfg.device),
    });
    if (!device.webSocketUrl) {
      throw new ProvisionFailure(`Webex device "${device.name}" has no websocket URL`);
    }
    await resolveSelf();

    const transport = new RealtimeTransport({
      token: options.token,
      abortSignal: opts.abortSignal,
      connectTimeoutMs: cfg.transport?.connectTimeoutMs,
      closeTimeoutMs: cfg.transport?.closeTimeoutMs,
      onStateChange: opts.onStateChange,
    });
    await transport.connect(device.webSocketUrl);
    runtime.log(`webex: listening as device ${device.name}`);

    try {
      await transport.listenForMessages(async (text) => {
        const frame = parseActivityFrame(text);
        if (!frame) {
          log.debug("ignoring non-activity frame");
          return;
        }
        if (frame.frameId) {
          await transport.send(JSON.stringify(buildAckFrame(frame.frameId)));
        }
        handleActivity(frame.activity);
      });
    } finally {
      await transport.close();
    }
  };

  const waitForIdle = async () => {
    while (inFlight.size > 0) {
      await Promise.allSettled([...inFlight]);
    }
  };

  return {
    client,
    commands,
    addCommand: (keyword, args, handler) => commands.add(keyword, args, handler),
    setCardActionHandler: (handler) => {
      onCardAction = handler;
    },
    dispatchMessage,
    handleWebhookEvent,
    monitorWebsocket,
    waitForIdle,
  };
}
