import type { RuntimeEnv } from "../runtime.js";
import { resolveDeviceDescriptor, resolveOrCreateDevice } from "../webex/devices.js";
import type { CliDeps } from "./deps.js";
import { prepareCli } from "./shared.js";

export type DevicesCommandOpts = {
  config?: string;
  token?: string;
  /** Resolve (and register when missing) the bot's device instead of listing. */
  resolve?: boolean;
  json?: boolean;
  verbose?: boolean;
};

export async function devicesCommand(
  opts: DevicesCommandOpts,
  deps: CliDeps,
  runtime: RuntimeEnv,
): Promise<void> {
  const { cfg, client } = prepareCli(opts, deps);

  if (opts.resolve) {
    const device = await resolveOrCreateDevice({
      client,
      preferExisting: cfg.device?.preferExisting,
      descriptor: resolveDeviceDescriptor(cfg.device),
    });
    if (opts.json) {
      runtime.log(JSON.stringify(device, null, 2));
      return;
    }
    runtime.log(`${device.name}\t${device.webSocketUrl ?? "(no websocket url)"}`);
    return;
  }

  const devices = (await client.listDevices()) ?? [];
  if (opts.json) {
    runtime.log(JSON.stringify(devices, null, 2));
    return;
  }
  if (devices.length === 0) {
    runtime.log("No devices registered for this token.");
    return;
  }
  for (const device of devices) {
    runtime.log(`${device.name}\t${device.deviceType}\t${device.url ?? "-"}`);
  }
}
