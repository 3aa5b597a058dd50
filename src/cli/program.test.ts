import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { BotConfig } from "../config/config.js";
import type { RuntimeEnv } from "../runtime.js";
import type { WebexClient, WebexClientOptions } from "../webex/api.js";
import { DEFAULT_DEVICE } from "../webex/devices.js";
import type { MessageOut } from "../webex/types.js";
import type { CliDeps } from "./deps.js";
import { buildProgram } from "./program.js";
import { parseBotMode, runCommand } from "./run.js";
import { buildOutgoingMessage } from "./send.js";

function createRuntime(): RuntimeEnv {
  return {
    log: vi.fn(),
    error: vi.fn(),
    exit: (code: number): never => {
      throw new Error(`exit ${code}`);
    },
  };
}

function createDeps(cfg: BotConfig = {}) {
  const sendMessage = vi.fn(async (message: MessageOut) => ({ id: "sent-1", ...message }));
  const listDevices = vi.fn(async () => [{ ...DEFAULT_DEVICE, url: "https://wdm.example.test/d/1" }]);
  const createClient = vi.fn((options: WebexClientOptions): WebexClient => {
    const unused = async (): Promise<never> => {
      throw new Error(`not stubbed for ${options.token}`);
    };
    return {
      baseUrl: "https://api.example.test/v1",
      deviceUrl: "https://wdm.example.test/wdm/api/v1",
      getMessage: unused,
      sendMessage,
      getAttachmentAction: unused,
      getRoom: unused,
      getPerson: unused,
      getMe: unused,
      listDevices,
      createDevice: unused,
    };
  });
  const deps: CliDeps = { loadConfig: vi.fn(() => cfg), createClient };
  return { deps, createClient, sendMessage, listDevices };
}

beforeEach(() => {
  vi.stubEnv("WEBEX_BOT_TOKEN", "");
  vi.stubEnv("WEBEX_ACCESS_TOKEN", "");
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("webex-bot send", () => {
  it("sends through the REST client built from the token", async () => {
    const { deps, createClient, sendMessage } = createDeps();
    const runtime = createRuntime();
    const program = buildProgram({ deps, runtime });

    await program.parseAsync(
      ["send", "--token", "test-secret", "--room", "room-1", "--text", "hello"],
      { from: "user" },
    );

    expect(createClient).toHaveBeenCalledWith({
      token: "test-secret",
      baseUrl: undefined,
      deviceUrl: undefined,
    });
    expect(sendMessage).toHaveBeenCalledWith({ roomId: "room-1", text: "hello" });
    expect(runtime.log).toHaveBeenCalledWith("Sent message sent-1");
  });

  it("prints the payload on --dry-run without a client", async () => {
    const { deps, createClient } = createDeps();
    const runtime = createRuntime();

    await buildProgram({ deps, runtime }).parseAsync(
      ["send", "--email", "ada@example.test", "--markdown", "*hi*", "--dry-run"],
      { from: "user" },
    );

    expect(createClient).not.toHaveBeenCalled();
    expect(runtime.log).toHaveBeenCalledWith(
      '[dry-run] would send: {"toPersonEmail":"ada@example.test","markdown":"*hi*"}',
    );
  });

  it("exits 1 when no token is available", async () => {
    const { deps } = createDeps();
    const runtime = createRuntime();

    await expect(
      buildProgram({ deps, runtime }).parseAsync(["send", "--room", "r", "--text", "t"], {
        from: "user",
      }),
    ).rejects.toThrow("exit 1");
    expect(String(vi.mocked(runtime.error).mock.calls[0]?.[0])).toContain("Webex token missing");
  });

  it("falls back to the token from the environment", async () => {
    vi.stubEnv("WEBEX_BOT_TOKEN", "env-token");
    const { deps, createClient } = createDeps({ token: "config-token" });

    await buildProgram({ deps, runtime: createRuntime() }).parseAsync(
      ["send", "--room", "r", "--text", "t"],
      { from: "user" },
    );

    expect(createClient.mock.calls[0]?.[0].token).toBe("env-token");
  });
});

describe("webex-bot devices", () => {
  it("lists registered devices", async () => {
    const { deps } = createDeps({ token: "config-token" });
    const runtime = createRuntime();

    await buildProgram({ deps, runtime }).parseAsync(["devices"], { from: "user" });

    expect(runtime.log).toHaveBeenCalledWith(
      "webex-bot-runtime-client\tDESKTOP\thttps://wdm.example.test/d/1",
    );
  });
});

describe("runCommand", () => {
  it("serves webhooks until aborted", async () => {
    const { deps } = createDeps({ token: "config-token", webhook: { host: "127.0.0.1" } });
    const runtime = createRuntime();
    const controller = new AbortController();

    const running = runCommand({ mode: "webhook", port: "0" }, deps, runtime, controller.signal);
    await vi.waitFor(() => {
      expect(runtime.log).toHaveBeenCalledWith(
        expect.stringContaining("Webhook server listening on port"),
      );
    });
    controller.abort();

    await expect(running).resolves.toBeUndefined();
    expect(runtime.log).toHaveBeenCalledWith(
      expect.stringContaining("No commands registered; every message will be dropped."),
    );
  });

  it("rejects unknown modes", async () => {
    const { deps } = createDeps({ token: "config-token" });

    await expect(
      runCommand({ mode: "polling" }, deps, createRuntime(), new AbortController().signal),
    ).rejects.toThrow('Invalid --mode "polling" (expected websocket or webhook)');
  });
});

describe("parseBotMode", () => {
  it("normalises case and leaves blanks undefined", () => {
    expect(parseBotMode(" WebHook ")).toBe("webhook");
    expect(parseBotMode(undefined)).toBeUndefined();
    expect(parseBotMode("")).toBeUndefined();
  });
});

describe("buildOutgoingMessage", () => {
  it("copies only the provided fields", () => {
    expect(buildOutgoingMessage({ room: "r", parent: "p", text: "t" })).toEqual({
      roomId: "r",
      parentId: "p",
      text: "t",
    });
  });
});
