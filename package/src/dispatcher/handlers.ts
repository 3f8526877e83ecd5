import {
  and,
  command as commandFilter,
  eventType,
  type Filter,
} from "../filters/filter.js";
import {
  isEventOf,
  type BotEvent,
  type CallbackQueryEvent,
  type EventOf,
  type EventType,
  type NewMessageEvent,
} from "../types/event.js";
import type { HandlerCallback, HandlerDefinition } from "./handler-registry.js";

/**
 * Typed handler constructors.
 *
 * Each one pairs an event-type filter with a callback that only ever sees
 * that variant, so callbacks need no narrowing of their own.
 */

export function onEvent<T extends EventType>(
  type: T,
  callback: HandlerCallback<EventOf<T>>,
  filter?: Filter,
  name?: string,
): HandlerDefinition {
  const typeFilter = eventType(type);
  return {
    filter: filter ? and(typeFilter, filter) : typeFilter,
    callback: narrow(type, callback),
    name: name ?? callback.name,
  };
}

export function onMessage(
  callback: HandlerCallback<NewMessageEvent>,
  filter?: Filter,
): HandlerDefinition {
  return onEvent("newMessage", callback, filter);
}

/** `name` with or without the leading slash. */
export function onCommand(
  name: string,
  callback: HandlerCallback<NewMessageEvent>,
): HandlerDefinition {
  return onEvent("newMessage", callback, commandFilter(name));
}

export function onCallbackQuery(
  callback: HandlerCallback<CallbackQueryEvent>,
  filter?: Filter,
): HandlerDefinition {
  return onEvent("callbackQuery", callback, filter);
}

function narrow<T extends EventType>(
  type: T,
  callback: HandlerCallback<EventOf<T>>,
): HandlerCallback<BotEvent> {
  return (event, ctx) => {
    if (!isEventOf(event, type)) return;
    return callback(event, ctx);
  };
}
