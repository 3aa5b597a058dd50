import { z } from "zod";

export type MessageActivityVerb = "posted" | "shared" | "acknowledged" | "deleted";

export type SpaceActivityVerb =
  | "created"
  | "joined"
  | "left"
  | "changed"
  | "meeting-scheduled"
  | "locked"
  | "unlocked"
  | "moderator-assigned"
  | "moderator-unassigned";

export type ActivityActor = {
  id: string;
  displayName?: string;
  emailAddress?: string;
  type?: string;
};

type ActivityBase = {
  activityId: string;
  actor?: ActivityActor;
  targetId?: string;
};

export type Activity =
  | (ActivityBase & { kind: "message"; verb: MessageActivityVerb })
  | (ActivityBase & { kind: "card-action" })
  | (ActivityBase & { kind: "space"; verb: SpaceActivityVerb })
  | { kind: "start-typing" }
  | { kind: "unknown"; type: string };

export type ActivityFrame = {
  /** Frame id used to acknowledge delivery. */
  frameId?: string;
  activity: Activity;
};

const MESSAGE_VERBS = new Map<string, MessageActivityVerb>([
  ["post", "posted"],
  ["share", "shared"],
  ["acknowledge", "acknowledged"],
  ["delete", "deleted"],
]);

const SPACE_VERBS = new Map<string, SpaceActivityVerb>([
  ["create", "created"],
  ["add", "joined"],
  ["leave", "left"],
  ["lock", "locked"],
  ["unlock", "unlocked"],
  ["update", "changed"],
  ["assign", "changed"],
  ["unassign", "changed"],
  ["schedule", "meeting-scheduled"],
  ["assignModerator", "moderator-assigned"],
  ["unassignModerator", "moderator-unassigned"],
]);

const ActivityFrameSchema = z.object({
  id: z.string().optional(),
  data: z
    .object({
      eventType: z.string().optional(),
      activity: z
        .object({
          id: z.string(),
          verb: z.string(),
          actor: z
            .object({
              id: z.string(),
              displayName: z.string().optional(),
              emailAddress: z.string().optional(),
              type: z.string().optional(),
            })
            .optional(),
          target: z.object({ id: z.string().optional() }).optional(),
        })
        .optional(),
    })
    .optional(),
});

/** Decodes a realtime text frame. Returns null for payloads that are not activity frames. */
export function parseActivityFrame(text: string): ActivityFrame | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = ActivityFrameSchema.safeParse(raw);
  if (!parsed.success) return null;
  const frameId = parsed.data.id;
  const eventType = parsed.data.data?.eventType;
  if (!eventType) return null;

  if (eventType === "status.start_typing") {
    return { frameId, activity: { kind: "start-typing" } };
  }
  const activity = parsed.data.data?.activity;
  if (eventType !== "conversation.activity" || !activity) {
    return { frameId, activity: { kind: "unknown", type: eventType } };
  }

  const base: ActivityBase = {
    activityId: activity.id,
    actor: activity.actor,
    targetId: activity.target?.id,
  };
  const messageVerb = MESSAGE_VERBS.get(activity.verb);
  if (messageVerb) {
    return { frameId, activity: { ...base, kind: "message", verb: messageVerb } };
  }
  if (activity.verb === "cardAction") {
    return { frameId, activity: { ...base, kind: "card-action" } };
  }
  const spaceVerb = SPACE_VERBS.get(activity.verb);
  if (spaceVerb) {
    return { frameId, activity: { ...base, kind: "space", verb: spaceVerb } };
  }
  return {
    frameId,
    activity: { kind: "unknown", type: `conversation.activity.${activity.verb}` },
  };
}

export function isCreatedMessage(activity: Activity): boolean {
  return activity.kind === "message" && (activity.verb === "posted" || activity.verb === "shared");
}

function encodeResourceId(kind: "MESSAGE" | "ATTACHMENT_ACTION", uuid: string, cluster: string) {
  return Buffer.from(`ciscospark://${cluster}/${kind}/${uuid}`, "utf8")
    .toString("base64")
    .replace(/=+$/, "");
}

/** Realtime activities carry raw UUIDs; the REST API addresses resources by encoded ids. */
export function toRestMessageId(activityId: string, cluster = "us"): string {
  return encodeResourceId("MESSAGE", activityId, cluster);
}

export function toRestAttachmentActionId(activityId: string, cluster = "us"): string {
  return encodeResourceId("ATTACHMENT_ACTION", activityId, cluster);
}

export function buildAckFrame(frameId: string) {
  return { type: "ack", messageId: frameId };
}
