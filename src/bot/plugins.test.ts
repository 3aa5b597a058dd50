import path from "node:path";
import { pathToFileURL } from "node:url";

import { describe, expect, it, vi } from "vitest";

import type { RuntimeEnv } from "../runtime.js";
import type { WebexClient } from "../webex/api.js";
import { createWebexBot, type WebexBot } from "./bot.js";
import { loadCommandModules, resolveCommandModule } from "./plugins.js";

function createBot(): WebexBot {
  const runtime: RuntimeEnv = {
    log: vi.fn(),
    error: vi.fn(),
    exit: (code: number): never => {
      throw new Error(`exit ${code}`);
    },
  };
  const unused = async (): Promise<never> => {
    throw new Error("not stubbed");
  };
  const client: WebexClient = {
    baseUrl: "https://api.example.test/v1",
    deviceUrl: "https://wdm.example.test/wdm/api/v1",
    getMessage: unused,
    sendMessage: unused,
    getAttachmentAction: unused,
    getRoom: unused,
    getPerson: unused,
    getMe: unused,
    listDevices: unused,
    createDevice: unused,
  };
  return createWebexBot({ token: "test-secret", client, runtime });
}

describe("resolveCommandModule", () => {
  it("accepts a default-exported module object", () => {
    const register = vi.fn();
    const mod = resolveCommandModule("./roll.js", { default: { id: "dice", register } });
    expect(mod.id).toBe("dice");
    expect(mod.register).toBe(register);
  });

  it("accepts a default-exported function and names it after the specifier", () => {
    const mod = resolveCommandModule("./roll.js", { default: () => {} });
    expect(mod.id).toBe("./roll.js");
  });

  it("accepts a named register export", () => {
    const register = vi.fn();
    const mod = resolveCommandModule("pkg-commands", { register });
    expect(mod.register).toBe(register);
  });

  it("rejects modules without a register function", () => {
    expect(() => resolveCommandModule("./empty.js", { default: { id: "x" } })).toThrow(
      'Command module "./empty.js" exports no register function',
    );
  });
});

describe("loadCommandModules", () => {
  it("imports each module and lets it register commands", async () => {
    const bot = createBot();
    const importModule = vi.fn(async (specifier: string) => ({
      default: {
        register: (target: WebexBot) => {
          target.addCommand(specifier.endsWith("roll.js") ? "roll" : "poll", [], () => {});
        },
      },
    }));

    const loaded = await loadCommandModules(bot, ["./commands/roll.js", "@acme/poll"], {
      cwd: "/srv/bot",
      importModule,
    });

    expect(loaded.map((mod) => mod.id)).toEqual(["./commands/roll.js", "@acme/poll"]);
    expect(importModule).toHaveBeenNthCalledWith(
      1,
      pathToFileURL(path.resolve("/srv/bot", "./commands/roll.js")).href,
    );
    expect(importModule).toHaveBeenNthCalledWith(2, "@acme/poll");
    expect(bot.commands.list().map((entry) => entry.keyword)).toEqual(["roll", "poll"]);
  });
});
