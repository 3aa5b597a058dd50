import type { RuntimeEnv } from "../runtime.js";
import type { MessageOut } from "../webex/types.js";
import type { CliDeps } from "./deps.js";
import { prepareCli } from "./shared.js";

export type SendCommandOpts = {
  config?: string;
  token?: string;
  room?: string;
  person?: string;
  email?: string;
  text?: string;
  markdown?: string;
  parent?: string;
  dryRun?: boolean;
  json?: boolean;
  verbose?: boolean;
};

export function buildOutgoingMessage(opts: SendCommandOpts): MessageOut {
  const message: MessageOut = {};
  if (opts.room) message.roomId = opts.room;
  if (opts.person) message.toPersonId = opts.person;
  if (opts.email) message.toPersonEmail = opts.email;
  if (opts.parent) message.parentId = opts.parent;
  if (opts.text) message.text = opts.text;
  if (opts.markdown) message.markdown = opts.markdown;
  return message;
}

export async function sendCommand(
  opts: SendCommandOpts,
  deps: CliDeps,
  runtime: RuntimeEnv,
): Promise<void> {
  const message = buildOutgoingMessage(opts);
  if (opts.dryRun) {
    runtime.log(`[dry-run] would send: ${JSON.stringify(message)}`);
    return;
  }
  const { client } = prepareCli(opts, deps);
  const sent = await client.sendMessage(message);
  if (opts.json) {
    runtime.log(JSON.stringify(sent, null, 2));
    return;
  }
  runtime.log(`Sent message ${sent.id ?? "(no id)"}`);
}
