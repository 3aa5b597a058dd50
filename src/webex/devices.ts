import { logVerbose } from "../globals.js";
import { getChildLogger } from "../logging.js";
import type { WebexClient } from "./api.js";
import { ProvisionFailure } from "./errors.js";
import type { DeviceDescriptor, DeviceRecord } from "./types.js";

export const DEFAULT_DEVICE: DeviceDescriptor = {
  deviceName: "webex-bot-runtime",
  deviceType: "DESKTOP",
  localizedModel: "nodejs",
  model: "nodejs",
  name: "webex-bot-runtime-client",
  systemName: "webex-bot-runtime-client",
  systemVersion: "0.1",
};

export type DeviceRegistryClient = Pick<WebexClient, "listDevices" | "createDevice">;

export function resolveDeviceDescriptor(overrides?: {
  name?: string;
  deviceName?: string;
}): DeviceDescriptor {
  const name = overrides?.name?.trim();
  const deviceName = overrides?.deviceName?.trim();
  return {
    ...DEFAULT_DEVICE,
    ...(name ? { name, systemName: name } : {}),
    ...(deviceName ? { deviceName } : {}),
  };
}

async function findExistingDevice(
  client: DeviceRegistryClient,
  name: string,
): Promise<DeviceRecord | undefined> {
  let devices: DeviceRecord[] | null;
  try {
    devices = await client.listDevices();
  } catch (err) {
    throw new ProvisionFailure("Failed to list registered Webex devices", { cause: err });
  }
  if (!devices) {
    logVerbose("device registry: no devices registered for this token");
    return undefined;
  }
  return devices.find((device) => device.name === name);
}

/**
 * Finds the device registered under the descriptor's name, or registers a new
 * one. Nothing is cached locally: every start resolves again.
 */
export async function resolveOrCreateDevice(params: {
  client: DeviceRegistryClient;
  preferExisting?: boolean;
  descriptor?: DeviceDescriptor;
}): Promise<DeviceRecord> {
  const log = getChildLogger({ module: "device-registry" });
  const descriptor = params.descriptor ?? DEFAULT_DEVICE;

  if (params.preferExisting !== false) {
    const existing = await findExistingDevice(params.client, descriptor.name);
    if (existing) {
      log.debug({ name: existing.name, url: existing.url }, "reusing registered device");
      return existing;
    }
  }

  log.info({ name: descriptor.name }, "registering device");
  let created: DeviceRecord;
  try {
    created = await params.client.createDevice(descriptor);
  } catch (err) {
    throw new ProvisionFailure(`Failed to register Webex device "${descriptor.name}"`, {
      cause: err,
    });
  }
  log.info({ name: created.name, url: created.url }, "registered device");
  return created;
}
