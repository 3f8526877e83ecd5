import type { z } from "zod";
import { DecodeError, describeError, type DecodeErrorKind } from "../errors.js";
import {
  isEventType,
  type BotEvent,
  type CallbackQueryEvent,
  type ChatInfo,
  type MessagePart,
  type NewMessageEvent,
  type UserInfo,
} from "../types/event.js";
import {
  callbackQueryPayloadSchema,
  changedChatInfoPayloadSchema,
  leftMembersPayloadSchema,
  messagePayloadSchema,
  msgRefPayloadSchema,
  newMembersPayloadSchema,
  rawUpdateSchema,
  type MessagePayload,
} from "./schemas.js";

/**
 * Raw update → typed `BotEvent`.
 *
 * 关键点（中文）
 * - 解码失败不抛异常，返回 `{ ok: false, error }`，由 dispatcher 记录并跳过该条
 * - 错误分三类：未知类型 / 缺字段 / 字段形状不对
 */

export type DecodeResult =
  | { ok: true; event: BotEvent }
  | { ok: false; error: DecodeError };

type Chat = z.infer<typeof messagePayloadSchema>["chat"];
type User = NonNullable<z.infer<typeof messagePayloadSchema>["from"]>;

export function decodeEvent(raw: unknown): DecodeResult {
  try {
    return decodeUpdate(raw);
  } catch (error) {
    const eventId = isRecord(raw) ? readEventId(raw) : undefined;
    return fail("MalformedValue", "", `Update could not be decoded: ${describeError(error)}`, eventId);
  }
}

function decodeUpdate(raw: unknown): DecodeResult {
  if (!isRecord(raw)) {
    return fail("MalformedValue", "", "Update is not an object");
  }

  const eventId = readEventId(raw);
  const type: unknown = raw.type;

  if (type === undefined || type === null) {
    return fail("MissingField", "type", "Update has no type", eventId);
  }
  if (typeof type !== "string") {
    return fail("MalformedValue", "type", "Update type is not a string", eventId);
  }
  if (!isEventType(type)) {
    return fail("UnknownType", "type", `Unknown event type "${type}"`, eventId);
  }

  const envelope = rawUpdateSchema.safeParse(raw);
  if (!envelope.success) {
    return fromZodError(envelope.error, raw, [], eventId);
  }

  const id = envelope.data.eventId;
  const payload = envelope.data.payload;
  const frozenRaw = deepFreeze(toPlainRecord(payload));

  switch (type) {
    case "newMessage":
    case "editedMessage":
    case "pinnedMessage": {
      const parsed = messagePayloadSchema.safeParse(payload);
      if (!parsed.success) return fromZodError(parsed.error, payload, ["payload"], id);
      const fields = messageFields(parsed.data);
      const base = eventBase(id, parsed.data.chat, parsed.data.timestamp, frozenRaw);
      if (type === "newMessage") {
        return ok({ type: "newMessage", ...base, ...fields });
      }
      if (type === "editedMessage") {
        return ok({ type: "editedMessage", ...base, ...fields });
      }
      return ok({ type: "pinnedMessage", ...base, ...fields });
    }

    case "deletedMessage":
    case "unpinnedMessage": {
      const parsed = msgRefPayloadSchema.safeParse(payload);
      if (!parsed.success) return fromZodError(parsed.error, payload, ["payload"], id);
      const base = eventBase(id, parsed.data.chat, parsed.data.timestamp, frozenRaw);
      const msgId = parsed.data.msgId;
      if (type === "deletedMessage") {
        return ok({ type: "deletedMessage", ...base, msgId });
      }
      return ok({ type: "unpinnedMessage", ...base, msgId });
    }

    case "newChatMembers": {
      const parsed = newMembersPayloadSchema.safeParse(payload);
      if (!parsed.success) return fromZodError(parsed.error, payload, ["payload"], id);
      return ok({
        type: "newChatMembers",
        ...eventBase(id, parsed.data.chat, undefined, frozenRaw),
        members: Object.freeze((parsed.data.newMembers ?? []).map(toUserInfo)),
        addedBy: parsed.data.addedBy ? toUserInfo(parsed.data.addedBy) : undefined,
      });
    }

    case "leftChatMembers": {
      const parsed = leftMembersPayloadSchema.safeParse(payload);
      if (!parsed.success) return fromZodError(parsed.error, payload, ["payload"], id);
      return ok({
        type: "leftChatMembers",
        ...eventBase(id, parsed.data.chat, undefined, frozenRaw),
        members: Object.freeze((parsed.data.leftMembers ?? []).map(toUserInfo)),
        removedBy: parsed.data.removedBy
          ? toUserInfo(parsed.data.removedBy)
          : undefined,
      });
    }

    case "changedChatInfo": {
      const parsed = changedChatInfoPayloadSchema.safeParse(payload);
      if (!parsed.success) return fromZodError(parsed.error, payload, ["payload"], id);
      return ok({
        type: "changedChatInfo",
        ...eventBase(id, parsed.data.chat, undefined, frozenRaw),
        title: parsed.data.title,
        about: parsed.data.about,
        rules: parsed.data.rules,
      });
    }

    case "callbackQuery": {
      const parsed = callbackQueryPayloadSchema.safeParse(payload);
      if (!parsed.success) return fromZodError(parsed.error, payload, ["payload"], id);
      const messageRaw = isRecord(frozenRaw.message) ? frozenRaw.message : {};
      const message: NewMessageEvent = Object.freeze({
        type: "newMessage",
        ...eventBase(
          id,
          parsed.data.message.chat,
          parsed.data.message.timestamp,
          messageRaw,
        ),
        ...messageFields(parsed.data.message),
      });
      const event: CallbackQueryEvent = {
        type: "callbackQuery",
        // 回调事件的 chat 取自按钮所在的消息
        ...eventBase(id, parsed.data.message.chat, undefined, frozenRaw),
        queryId: parsed.data.queryId,
        from: toUserInfo(parsed.data.from),
        callbackData: parsed.data.callbackData,
        message,
      };
      return ok(event);
    }
  }
}

function ok(event: BotEvent): DecodeResult {
  return { ok: true, event: Object.freeze(event) };
}

function fail(
  kind: DecodeErrorKind,
  path: string,
  message: string,
  eventId?: string,
): DecodeResult {
  return { ok: false, error: new DecodeError({ kind, path, message, eventId }) };
}

function eventBase(
  eventId: string,
  chat: Chat,
  timestamp: number | undefined,
  raw: Readonly<Record<string, unknown>>,
) {
  return {
    eventId,
    chat: toChatInfo(chat),
    timestamp,
    raw,
    middlewareData: new Map<string, unknown>(),
  };
}

function messageFields(payload: MessagePayload) {
  const parts: MessagePart[] = (payload.parts ?? []).map((part) =>
    Object.freeze({ type: part.type, payload: Object.freeze({ ...part.payload }) }),
  );
  return {
    msgId: payload.msgId,
    text: payload.text,
    from: payload.from ? toUserInfo(payload.from) : undefined,
    parts: Object.freeze(parts),
    format: payload.format ? deepFreeze(toPlainRecord(payload.format)) : undefined,
  };
}

function toChatInfo(chat: Chat): ChatInfo {
  return Object.freeze({ chatId: chat.chatId, type: chat.type, title: chat.title });
}

function toUserInfo(user: User): UserInfo {
  return Object.freeze({
    userId: user.userId,
    firstName: user.firstName,
    lastName: user.lastName,
    nick: user.nick,
  });
}

/**
 * Maps the first zod issue onto the decode taxonomy. A field counts as
 * missing when nothing is present at the issue path of the input.
 */
function fromZodError(
  error: z.ZodError,
  input: unknown,
  prefix: string[],
  eventId?: string,
): DecodeResult {
  const issue = error.issues[0];
  if (!issue) {
    return fail("MalformedValue", prefix.join("."), error.message, eventId);
  }
  const issuePath = issue.path.map(String);
  const path = [...prefix, ...issuePath].join(".");
  const missing = valueAtPath(input, issuePath) === undefined;
  return fail(
    missing ? "MissingField" : "MalformedValue",
    path,
    missing ? `Missing required field "${path}"` : `Malformed field "${path}": ${issue.message}`,
    eventId,
  );
}

function valueAtPath(root: unknown, path: string[]): unknown {
  let current: unknown = root;
  for (const key of path) {
    if (Array.isArray(current)) {
      current = current[Number(key)];
    } else if (isRecord(current)) {
      current = current[key];
    } else {
      return undefined;
    }
  }
  return current;
}

function readEventId(raw: Record<string, unknown>): string | undefined {
  const value = raw.eventId;
  if (typeof value === "string" || typeof value === "number") return String(value);
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * JSON-shaped copy of a payload: functions, symbols and bigints are dropped,
 * a cycle throws.
 */
function toPlainRecord(value: Record<string, unknown>): Record<string, unknown> {
  return copyRecord(value, new Set<object>());
}

function copyRecord(value: Record<string, unknown>, ancestors: Set<object>): Record<string, unknown> {
  ancestors.add(value);
  const out: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    const copied = copyPlain(child, ancestors);
    if (copied !== undefined) out[key] = copied;
  }
  ancestors.delete(value);
  return out;
}

function copyPlain(value: unknown, ancestors: Set<object>): unknown {
  if (value === null || typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "object") return undefined;
  if (ancestors.has(value)) throw new TypeError("payload contains a cycle");
  if (Array.isArray(value)) {
    ancestors.add(value);
    const items = value.map((item) => {
      const copied = copyPlain(item, ancestors);
      return copied === undefined ? null : copied;
    });
    ancestors.delete(value);
    return items;
  }
  if (isRecord(value)) return copyRecord(value, ancestors);
  return undefined;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
