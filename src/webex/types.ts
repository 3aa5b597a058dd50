import { z } from "zod";

import type { AdaptiveCard } from "./cards.js";

export type CardAttachment = {
  contentType: string;
  content: AdaptiveCard;
};

/** Outgoing message. Exactly one of roomId, toPersonId or toPersonEmail addresses it. */
export type MessageOut = {
  parentId?: string;
  roomId?: string;
  toPersonId?: string;
  toPersonEmail?: string;
  text?: string;
  markdown?: string;
  files?: string[];
  attachments?: CardAttachment[];
};

export const RoomSchema = z.object({
  id: z.string(),
  title: z.string().optional(),
  type: z.enum(["direct", "group"]).optional(),
  isLocked: z.boolean().optional(),
  teamId: z.string().optional(),
  lastActivity: z.string().optional(),
  creatorId: z.string().optional(),
  created: z.string().optional(),
});

export type Room = z.infer<typeof RoomSchema>;

const PhoneNumberSchema = z.object({
  type: z.string(),
  value: z.string(),
});

export const PersonSchema = z.object({
  id: z.string(),
  emails: z.array(z.string()).default([]),
  phoneNumbers: z.array(PhoneNumberSchema).optional(),
  displayName: z.string().optional(),
  nickName: z.string().optional(),
  firstName: z.string().optional(),
  lastName: z.string().optional(),
  avatar: z.string().optional(),
  orgId: z.string().optional(),
  created: z.string().optional(),
  lastActivity: z.string().optional(),
  status: z.string().optional(),
  /** person | bot | appuser */
  type: z.string().optional(),
});

export type Person = z.infer<typeof PersonSchema>;

export type DeviceDescriptor = {
  deviceName: string;
  deviceType: string;
  localizedModel: string;
  model: string;
  name: string;
  systemName: string;
  systemVersion: string;
};

export const DeviceRecordSchema = z.object({
  /** Device resource URL assigned by the cloud. */
  url: z.string().optional(),
  deviceName: z.string(),
  deviceType: z.string(),
  localizedModel: z.string(),
  model: z.string(),
  name: z.string(),
  systemName: z.string(),
  systemVersion: z.string(),
  webSocketUrl: z.string().optional(),
});

export type DeviceRecord = z.infer<typeof DeviceRecordSchema>;

export const DeviceListSchema = z.object({
  devices: z.array(DeviceRecordSchema).default([]),
});

const CardAttachmentSchema = z.object({
  contentType: z.string(),
  content: z.custom<AdaptiveCard>(
    (value) => typeof value === "object" && value !== null && !Array.isArray(value),
  ),
});

export const WebexMessageSchema = z.object({
  id: z.string().optional(),
  roomId: z.string().optional(),
  roomType: z.enum(["direct", "group"]).optional(),
  toPersonId: z.string().optional(),
  toPersonEmail: z.string().optional(),
  /** Plain text; alternate text when markdown is also present. */
  text: z.string().optional(),
  markdown: z.string().optional(),
  /** Read-only HTML rendering used by the Webex clients. */
  html: z.string().optional(),
  files: z.array(z.string()).optional(),
  personId: z.string().optional(),
  personEmail: z.string().optional(),
  mentionedPeople: z.array(z.string()).optional(),
  mentionedGroups: z.array(z.string()).optional(),
  attachments: z.array(CardAttachmentSchema).optional(),
  created: z.string().optional(),
  updated: z.string().optional(),
  parentId: z.string().optional(),
});

export type WebexMessage = z.infer<typeof WebexMessageSchema>;

export const AttachmentActionSchema = z.object({
  id: z.string(),
  type: z.string().optional(),
  messageId: z.string().optional(),
  inputs: z.record(z.string(), z.unknown()).optional(),
  personId: z.string().optional(),
  roomId: z.string().optional(),
  created: z.string().optional(),
});

export type AttachmentAction = z.infer<typeof AttachmentActionSchema>;

export const WebhookEnvelopeSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  targetUrl: z.string().optional(),
  resource: z.string(),
  event: z.string(),
  created: z.string().optional(),
  actorId: z.string().optional(),
  data: z.object({
    id: z.string().min(1),
    roomId: z.string().optional(),
    roomType: z.string().optional(),
    personId: z.string().optional(),
    personEmail: z.string().optional(),
    messageId: z.string().optional(),
    created: z.string().optional(),
  }),
});

export type WebhookEnvelope = z.infer<typeof WebhookEnvelopeSchema>;
