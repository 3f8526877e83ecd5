import {
  isMessageEvent,
  type BotEvent,
  type EventType,
  type MessagePartType,
} from "../types/event.js";
import type { UserStateReader } from "../state/user-state.js";

/**
 * Routing predicates.
 *
 * 关键点（中文）
 * - Filter 是不可变的数据（tagged union），`matchesFilter` 是唯一的求值入口
 * - 组合子 and/or/not 返回新对象，不修改操作数
 * - 求值是纯函数：无 I/O、不抛异常（state filter 只读内存中的 store）
 */

export type Filter =
  | { readonly kind: "any" }
  | { readonly kind: "message" }
  | { readonly kind: "command"; readonly command: string }
  | {
      readonly kind: "textContains";
      readonly needle: string;
      readonly ignoreCase: boolean;
    }
  | { readonly kind: "regexp"; readonly pattern: RegExp }
  | { readonly kind: "tag"; readonly values: readonly string[] }
  | { readonly kind: "chatIn"; readonly chatIds: ReadonlySet<string> }
  | { readonly kind: "eventType"; readonly types: readonly EventType[] }
  | { readonly kind: "callbackData"; readonly value: string }
  | { readonly kind: "callbackDataRegexp"; readonly pattern: RegExp }
  | { readonly kind: "part"; readonly partType: MessagePartType }
  | {
      readonly kind: "state";
      readonly store: UserStateReader;
      readonly state: string;
    }
  | { readonly kind: "and"; readonly left: Filter; readonly right: Filter }
  | { readonly kind: "or"; readonly left: Filter; readonly right: Filter }
  | { readonly kind: "not"; readonly filter: Filter };

export const COMMAND_PREFIX = "/";

export function matchesFilter(filter: Filter, event: BotEvent): boolean {
  switch (filter.kind) {
    case "any":
      return true;
    case "message":
      return event.type === "newMessage";
    case "command":
      return (
        event.type === "newMessage" &&
        extractCommand(event.text) === filter.command
      );
    case "textContains": {
      if (event.type !== "newMessage" || typeof event.text !== "string") {
        return false;
      }
      if (!filter.ignoreCase) return event.text.includes(filter.needle);
      return event.text.toLowerCase().includes(filter.needle.toLowerCase());
    }
    case "regexp":
      return (
        event.type === "newMessage" &&
        filter.pattern.test((event.text ?? "").trim())
      );
    case "tag":
      return (
        event.type === "newMessage" &&
        typeof event.text === "string" &&
        filter.values.includes(event.text)
      );
    case "chatIn":
      return filter.chatIds.has(event.chat.chatId);
    case "eventType":
      return filter.types.includes(event.type);
    case "callbackData":
      return (
        event.type === "callbackQuery" && event.callbackData === filter.value
      );
    case "callbackDataRegexp":
      return (
        event.type === "callbackQuery" && filter.pattern.test(event.callbackData)
      );
    case "part":
      return (
        isMessageEvent(event) &&
        event.parts.some((part) => part.type === filter.partType)
      );
    case "state":
      return (
        event.type === "newMessage" &&
        filter.store.getState(event.chat.chatId) === filter.state
      );
    case "and":
      return matchesFilter(filter.left, event) && matchesFilter(filter.right, event);
    case "or":
      return matchesFilter(filter.left, event) || matchesFilter(filter.right, event);
    case "not":
      return !matchesFilter(filter.filter, event);
  }
}

/**
 * First token of a command message with any `@botnick` suffix removed,
 * e.g. `"/start@my_bot payload"` → `"/start"`. Non-commands yield undefined.
 */
export function extractCommand(text: string | undefined): string | undefined {
  const trimmed = (text ?? "").trim();
  if (!trimmed.startsWith(COMMAND_PREFIX)) return undefined;
  const [token] = trimmed.split(/\s+/);
  const command = (token ?? "").split("@")[0];
  return command && command.length > COMMAND_PREFIX.length ? command : undefined;
}

function normalizeCommand(command: string): string {
  const trimmed = command.trim();
  return trimmed.startsWith(COMMAND_PREFIX) ? trimmed : `${COMMAND_PREFIX}${trimmed}`;
}

// `g`/`y` make RegExp#test stateful through lastIndex.
function statelessPattern(pattern: RegExp | string): RegExp {
  if (typeof pattern === "string") return new RegExp(pattern);
  const flags = pattern.flags.replace(/[gy]/g, "");
  return new RegExp(pattern.source, flags);
}

export function any(): Filter {
  return { kind: "any" };
}

/** Any new message (text or not). */
export function text(): Filter {
  return { kind: "message" };
}

export function command(name: string): Filter {
  return { kind: "command", command: normalizeCommand(name) };
}

export function textContains(
  needle: string,
  options?: { ignoreCase?: boolean },
): Filter {
  return { kind: "textContains", needle, ignoreCase: options?.ignoreCase ?? false };
}

export function regexp(pattern: RegExp | string): Filter {
  return { kind: "regexp", pattern: statelessPattern(pattern) };
}

export function tag(values: readonly string[]): Filter {
  return { kind: "tag", values: Object.freeze([...values]) };
}

export function chatIn(chatIds: Iterable<string>): Filter {
  return { kind: "chatIn", chatIds: new Set(chatIds) };
}

export function eventType(...types: EventType[]): Filter {
  return { kind: "eventType", types: Object.freeze([...types]) };
}

export function callbackData(value: string): Filter {
  return { kind: "callbackData", value };
}

export function callbackDataRegexp(pattern: RegExp | string): Filter {
  return { kind: "callbackDataRegexp", pattern: statelessPattern(pattern) };
}

export function file(): Filter {
  return { kind: "part", partType: "file" };
}

export function reply(): Filter {
  return { kind: "part", partType: "reply" };
}

export function forward(): Filter {
  return { kind: "part", partType: "forward" };
}

export function state(store: UserStateReader, value: string): Filter {
  return { kind: "state", store, state: value };
}

export function and(left: Filter, right: Filter): Filter {
  return { kind: "and", left, right };
}

export function or(left: Filter, right: Filter): Filter {
  return { kind: "or", left, right };
}

export function not(filter: Filter): Filter {
  return { kind: "not", filter };
}

/** Constructor namespace, e.g. `Filters.and(Filters.command("/start"), Filters.chatIn(["c1"]))`. */
export const Filters = {
  any,
  text,
  command,
  textContains,
  regexp,
  tag,
  chatIn,
  eventType,
  callbackData,
  callbackDataRegexp,
  file,
  reply,
  forward,
  state,
  and,
  or,
  not,
} as const;
