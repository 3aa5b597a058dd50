import type { z } from "zod";

import { resolveFetch, withRequestTimeout } from "../infra/fetch.js";
import { WebexApiError } from "./errors.js";
import {
  type AttachmentAction,
  AttachmentActionSchema,
  type DeviceDescriptor,
  DeviceListSchema,
  type DeviceRecord,
  DeviceRecordSchema,
  type MessageOut,
  type Person,
  PersonSchema,
  type Room,
  RoomSchema,
  type WebexMessage,
  WebexMessageSchema,
} from "./types.js";

export const DEFAULT_API_BASE_URL = "https://webexapis.com/v1";
export const DEFAULT_DEVICE_URL = "https://wdm-a.wbx2.com/wdm/api/v1";

export type WebexClientOptions = {
  token: string;
  baseUrl?: string;
  deviceUrl?: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
};

export type WebexClient = {
  readonly baseUrl: string;
  readonly deviceUrl: string;
  getMessage: (messageId: string) => Promise<WebexMessage>;
  sendMessage: (message: MessageOut) => Promise<WebexMessage>;
  getAttachmentAction: (actionId: string) => Promise<AttachmentAction>;
  getRoom: (roomId: string) => Promise<Room>;
  getPerson: (personId: string) => Promise<Person>;
  getMe: () => Promise<Person>;
  /** Returns null when the registry answers 404 (no devices for this token). */
  listDevices: () => Promise<DeviceRecord[] | null>;
  createDevice: (descriptor: DeviceDescriptor) => Promise<DeviceRecord>;
};

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((iss) => `${iss.path.join(".") || "<root>"}: ${iss.message}`).join("; ");
}

function assertMessageTarget(message: MessageOut) {
  const targets = [message.roomId, message.toPersonId, message.toPersonEmail].filter(Boolean);
  if (targets.length !== 1) {
    throw new Error("Webex message needs exactly one of roomId, toPersonId or toPersonEmail");
  }
  if (!message.text && !message.markdown && !message.files?.length && !message.attachments?.length) {
    throw new Error("Webex message needs text, markdown, files or attachments");
  }
}

export function createWebexClient(options: WebexClientOptions): WebexClient {
  const token = options.token.trim();
  if (!token) {
    throw new Error("Webex access token is required");
  }
  const baseUrl = trimTrailingSlash(options.baseUrl?.trim() || DEFAULT_API_BASE_URL);
  const deviceUrl = trimTrailingSlash(options.deviceUrl?.trim() || DEFAULT_DEVICE_URL);
  const fetchImpl = resolveFetch(options.fetchImpl);
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    Accept: "application/json",
    Authorization: `Bearer ${token}`,
  };

  const request = async (
    method: "GET" | "POST",
    url: string,
    body?: unknown,
  ): Promise<{ status: number; payload: unknown }> => {
    const init: RequestInit = { method, headers };
    if (body !== undefined) init.body = JSON.stringify(body);
    const res = await fetchImpl(url, withRequestTimeout(init, options.timeoutMs));
    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new WebexApiError({ method, url, status: res.status, body: text });
    }
    return { status: res.status, payload: (await res.json()) as unknown };
  };

  const parseWith = <S extends z.ZodTypeAny>(
    schema: S,
    payload: unknown,
    what: string,
  ): z.output<S> => {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new Error(`Webex returned a malformed ${what}: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
  };

  const getMessage = async (messageId: string) => {
    const { payload } = await request("GET", `${baseUrl}/messages/${encodeURIComponent(messageId)}`);
    return parseWith(WebexMessageSchema, payload, "message");
  };

  const sendMessage = async (message: MessageOut) => {
    assertMessageTarget(message);
    const { payload } = await request("POST", `${baseUrl}/messages`, message);
    return parseWith(WebexMessageSchema, payload, "message");
  };

  const getAttachmentAction = async (actionId: string) => {
    const { payload } = await request(
      "GET",
      `${baseUrl}/attachment/actions/${encodeURIComponent(actionId)}`,
    );
    return parseWith(AttachmentActionSchema, payload, "attachment action");
  };

  const getRoom = async (roomId: string) => {
    const { payload } = await request("GET", `${baseUrl}/rooms/${encodeURIComponent(roomId)}`);
    return parseWith(RoomSchema, payload, "room");
  };

  const getPerson = async (personId: string) => {
    const { payload } = await request("GET", `${baseUrl}/people/${encodeURIComponent(personId)}`);
    return parseWith(PersonSchema, payload, "person");
  };

  const getMe = async () => {
    const { payload } = await request("GET", `${baseUrl}/people/me`);
    return parseWith(PersonSchema, payload, "person");
  };

  const listDevices = async () => {
    try {
      const { payload } = await request("GET", `${deviceUrl}/devices`);
      return parseWith(DeviceListSchema, payload, "device list").devices;
    } catch (err) {
      if (err instanceof WebexApiError && err.status === 404) return null;
      throw err;
    }
  };

  const createDevice = async (descriptor: DeviceDescriptor) => {
    const { payload } = await request("POST", `${deviceUrl}/devices`, descriptor);
    return parseWith(DeviceRecordSchema, payload, "device");
  };

  return {
    baseUrl,
    deviceUrl,
    getMessage,
    sendMessage,
    getAttachmentAction,
    getRoom,
    getPerson,
    getMe,
    listDevices,
    createDevice,
  };
}
