/**
 * Typed inbound events.
 *
 * 关键点（中文）
 * - BotEvent 是按 `type` 区分的联合类型，解码后整体冻结（只读）
 * - 唯一可变的是 `middlewareData`：每个事件实例独享，仅在一次 dispatch 内有效
 */

export const EVENT_TYPES = [
  "newMessage",
  "editedMessage",
  "deletedMessage",
  "pinnedMessage",
  "unpinnedMessage",
  "newChatMembers",
  "leftChatMembers",
  "changedChatInfo",
  "callbackQuery",
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export type ChatType = "private" | "group" | "channel";

export type ChatInfo = {
  readonly chatId: string;
  /** Usually one of `ChatType`; kept open for types the server adds later. */
  readonly type: string;
  readonly title?: string;
};

export type UserInfo = {
  readonly userId: string;
  readonly firstName?: string;
  readonly lastName?: string;
  readonly nick?: string;
};

export type MessagePartType =
  | "file"
  | "sticker"
  | "mention"
  | "voice"
  | "forward"
  | "reply";

export type MessagePart = {
  readonly type: string;
  readonly payload: Readonly<Record<string, unknown>>;
};

type EventBase<T extends EventType> = {
  readonly type: T;
  /** Server event id as a string. Used for logging/dedup, not for delivery. */
  readonly eventId: string;
  readonly chat: ChatInfo;
  /** Unix seconds, when the server provides it. */
  readonly timestamp?: number;
  /** The original payload, frozen. */
  readonly raw: Readonly<Record<string, unknown>>;
  /** Side channel for middleware annotations, scoped to one dispatch. */
  readonly middlewareData: Map<string, unknown>;
};

type MessageFields = {
  readonly msgId: string;
  readonly text?: string;
  readonly from?: UserInfo;
  readonly parts: readonly MessagePart[];
  readonly format?: Readonly<Record<string, unknown>>;
};

export type NewMessageEvent = EventBase<"newMessage"> & MessageFields;
export type EditedMessageEvent = EventBase<"editedMessage"> & MessageFields;
export type PinnedMessageEvent = EventBase<"pinnedMessage"> & MessageFields;

export type DeletedMessageEvent = EventBase<"deletedMessage"> & {
  readonly msgId: string;
};

export type UnpinnedMessageEvent = EventBase<"unpinnedMessage"> & {
  readonly msgId: string;
};

export type NewChatMembersEvent = EventBase<"newChatMembers"> & {
  readonly members: readonly UserInfo[];
  readonly addedBy?: UserInfo;
};

export type LeftChatMembersEvent = EventBase<"leftChatMembers"> & {
  readonly members: readonly UserInfo[];
  readonly removedBy?: UserInfo;
};

export type ChangedChatInfoEvent = EventBase<"changedChatInfo"> & {
  readonly title?: string;
  readonly about?: string;
  readonly rules?: string;
};

export type CallbackQueryEvent = EventBase<"callbackQuery"> & {
  readonly queryId: string;
  readonly from: UserInfo;
  readonly callbackData: string;
  /** The message carrying the pressed button. */
  readonly message: NewMessageEvent;
};

export type BotEvent =
  | NewMessageEvent
  | EditedMessageEvent
  | DeletedMessageEvent
  | PinnedMessageEvent
  | UnpinnedMessageEvent
  | NewChatMembersEvent
  | LeftChatMembersEvent
  | ChangedChatInfoEvent
  | CallbackQueryEvent;

export type EventOf<T extends EventType> = Extract<BotEvent, { type: T }>;

export type MessageEvent = NewMessageEvent | EditedMessageEvent | PinnedMessageEvent;

export function isEventOf<T extends EventType>(
  event: BotEvent,
  type: T,
): event is EventOf<T> {
  return event.type === type;
}

export function isMessageEvent(event: BotEvent): event is MessageEvent {
  return (
    event.type === "newMessage" ||
    event.type === "editedMessage" ||
    event.type === "pinnedMessage"
  );
}

export function isEventType(value: string): value is EventType {
  return EVENT_TYPES.some((type) => type === value);
}
