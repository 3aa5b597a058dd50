import chalk from "chalk";
import { Command } from "commander";

import { danger } from "../globals.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { VERSION } from "../version.js";
import { type CliDeps, createDefaultDeps } from "./deps.js";
import { type DevicesCommandOpts, devicesCommand } from "./devices.js";
import { type RunCommandOpts, runCommand } from "./run.js";
import { type SendCommandOpts, sendCommand } from "./send.js";

export type BuildProgramOpts = {
  deps?: CliDeps;
  runtime?: RuntimeEnv;
  /** Aborts `run`; the entry point wires it to SIGINT/SIGTERM. */
  abortSignal?: AbortSignal;
};

const TAGLINE = "Command bots for Webex over websocket or webhooks.";

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function buildProgram(opts: BuildProgramOpts = {}) {
  const deps = opts.deps ?? createDefaultDeps();
  const runtime = opts.runtime ?? defaultRuntime;
  const abortSignal = opts.abortSignal ?? new AbortController().signal;
  const program = new Command();

  program.name("webex-bot").description(TAGLINE).version(VERSION);

  program.configureHelp({
    optionTerm: (option) => chalk.yellow(option.flags),
    subcommandTerm: (cmd) => chalk.green(cmd.name()),
  });

  program.configureOutput({
    writeOut: (str) => {
      const colored = str
        .replace(/^Usage:/gm, chalk.bold.cyan("Usage:"))
        .replace(/^Options:/gm, chalk.bold.cyan("Options:"))
        .replace(/^Commands:/gm, chalk.bold.cyan("Commands:"));
      process.stdout.write(colored);
    },
    writeErr: (str) => process.stderr.write(str),
    outputError: (str, write) => write(chalk.red(str)),
  });

  const examples = [
    ["webex-bot run --commands ./commands/roll.js", "Listen over the realtime websocket."],
    ["webex-bot run --mode webhook --port 8080", "Serve webhook deliveries on :8080/webhook."],
    ["webex-bot devices --resolve", "Show (or register) the bot's device."],
    ['webex-bot send --room <roomId> --text "Hi"', "Post a message as the bot."],
  ] as const;
  const fmtExamples = examples
    .map(([cmd, desc]) => `  ${chalk.green(cmd)}\n    ${chalk.gray(desc)}`)
    .join("\n");
  program.addHelpText("afterAll", `\n${chalk.bold.cyan("Examples:")}\n${fmtExamples}\n`);

  program
    .command("run")
    .description("Start the bot and dispatch commands until interrupted")
    .option("-c, --config <path>", "Config file (default: ~/.webex-bot/config.json5)")
    .option("--token <token>", "Bot access token (default: WEBEX_BOT_TOKEN or config)")
    .option("--mode <mode>", "Delivery mode: websocket | webhook")
    .option("--host <host>", "Webhook bind host")
    .option("--port <port>", "Webhook port")
    .option("--path <path>", "Webhook path (default: /webhook)")
    .option("--secret <secret>", "Webhook secret used to verify X-Spark-Signature")
    .option("--commands <module>", "Command module to load (repeatable)", collect)
    .option("--no-prefer-existing", "Always register a new device")
    .option("--verbose", "Verbose logging", false)
    .action(async (cmdOpts: RunCommandOpts) => {
      try {
        await runCommand(cmdOpts, deps, runtime, abortSignal);
      } catch (err) {
        runtime.error(danger(`Bot failed: ${String(err)}`));
        runtime.exit(1);
      }
    });

  program
    .command("devices")
    .description("List the devices registered for the token")
    .option("-c, --config <path>", "Config file")
    .option("--token <token>", "Bot access token")
    .option("--resolve", "Resolve the bot's device, registering it when missing", false)
    .option("--json", "Output JSON", false)
    .option("--verbose", "Verbose logging", false)
    .action(async (cmdOpts: DevicesCommandOpts) => {
      try {
        await devicesCommand(cmdOpts, deps, runtime);
      } catch (err) {
        runtime.error(danger(`Device lookup failed: ${String(err)}`));
        runtime.exit(1);
      }
    });

  program
    .command("send")
    .description("Send a message as the bot")
    .option("-c, --config <path>", "Config file")
    .option("--token <token>", "Bot access token")
    .option("--room <roomId>", "Target room id")
    .option("--person <personId>", "Target person id (direct message)")
    .option("--email <email>", "Target person email (direct message)")
    .option("--text <text>", "Plain text body")
    .option("--markdown <markdown>", "Markdown body")
    .option("--parent <messageId>", "Reply in the thread of this message")
    .option("--dry-run", "Print the payload and skip sending", false)
    .option("--json", "Output the sent message as JSON", false)
    .option("--verbose", "Verbose logging", false)
    .action(async (cmdOpts: SendCommandOpts) => {
      try {
        await sendCommand(cmdOpts, deps, runtime);
      } catch (err) {
        runtime.error(danger(`Send failed: ${String(err)}`));
        runtime.exit(1);
      }
    });

  return program;
}
