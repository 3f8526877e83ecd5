import { describe, expect, it } from "vitest";

import { UserStateStore } from "../../state/user-state.js";
import type { BotEvent } from "../../types/event.js";
import {
  Filters,
  and,
  extractCommand,
  matchesFilter,
  not,
  or,
  type Filter,
} from "../filter.js";
import {
  callbackEvent,
  decodeOrThrow,
  messageEvent,
  rawMessage,
} from "../../__tests__/fixtures.js";

describe("extractCommand", () => {
  it("returns the first token of a command message", () => {
    expect(extractCommand("/start")).toBe("/start");
    expect(extractCommand("  /start payload  ")).toBe("/start");
    expect(extractCommand("/start@my_bot go")).toBe("/start");
  });

  it("ignores text that is not a command", () => {
    expect(extractCommand("start")).toBeUndefined();
    expect(extractCommand("/")).toBeUndefined();
    expect(extractCommand(undefined)).toBeUndefined();
  });
});

describe("matchesFilter", () => {
  it("matches commands exactly", () => {
    const start = Filters.command("/start");

    expect(matchesFilter(start, messageEvent("/start"))).toBe(true);
    expect(matchesFilter(start, messageEvent("/start now"))).toBe(true);
    expect(matchesFilter(start, messageEvent("/started"))).toBe(false);
    expect(matchesFilter(start, messageEvent("hello /start"))).toBe(false);
    expect(matchesFilter(Filters.command("help"), messageEvent("/help"))).toBe(true);
  });

  it("matches text, regexp and tags on new messages only", () => {
    const hello = messageEvent("Hello world");

    expect(matchesFilter(Filters.text(), hello)).toBe(true);
    expect(matchesFilter(Filters.textContains("world"), hello)).toBe(true);
    expect(matchesFilter(Filters.textContains("WORLD"), hello)).toBe(false);
    expect(matchesFilter(Filters.textContains("WORLD", { ignoreCase: true }), hello)).toBe(true);
    expect(matchesFilter(Filters.regexp(/^hello/i), hello)).toBe(true);
    expect(matchesFilter(Filters.tag(["Hello world", "bye"]), hello)).toBe(true);
    expect(matchesFilter(Filters.tag(["Hello"]), hello)).toBe(false);
    expect(matchesFilter(Filters.text(), callbackEvent("x"))).toBe(false);
  });

  it("keeps global regexps stateless across calls", () => {
    const filter = Filters.regexp(/yes/g);
    const event = messageEvent("yes");

    expect(matchesFilter(filter, event)).toBe(true);
    expect(matchesFilter(filter, event)).toBe(true);
  });

  it("matches chats and event types", () => {
    const event = messageEvent("hi", "c2");

    expect(matchesFilter(Filters.chatIn(["c1", "c2"]), event)).toBe(true);
    expect(matchesFilter(Filters.chatIn(["c1"]), event)).toBe(false);
    expect(matchesFilter(Filters.eventType("newMessage", "editedMessage"), event)).toBe(true);
    expect(matchesFilter(Filters.eventType("callbackQuery"), event)).toBe(false);
  });

  it("matches callback data", () => {
    const event = callbackEvent("page:2");

    expect(matchesFilter(Filters.callbackData("page:2"), event)).toBe(true);
    expect(matchesFilter(Filters.callbackData("page"), event)).toBe(false);
    expect(matchesFilter(Filters.callbackDataRegexp(/^page:\d+$/), event)).toBe(true);
    expect(matchesFilter(Filters.callbackData("page:2"), messageEvent("page:2"))).toBe(false);
  });

  it("matches message parts", () => {
    const withFile = decodeOrThrow(
      rawMessage({ text: "doc", parts: [{ type: "file", payload: { fileId: "f1" } }] }),
    );

    expect(matchesFilter(Filters.file(), withFile)).toBe(true);
    expect(matchesFilter(Filters.reply(), withFile)).toBe(false);
    expect(matchesFilter(Filters.forward(), messageEvent("plain"))).toBe(false);
  });

  it("matches the sender's conversation state", () => {
    const store = new UserStateStore();
    store.set({ user: "c1", state: "awaiting_name" });
    const filter = Filters.state(store, "awaiting_name");

    expect(matchesFilter(filter, messageEvent("Ann", "c1"))).toBe(true);
    expect(matchesFilter(filter, messageEvent("Bob", "c2"))).toBe(false);
    store.updateState("c1", "done");
    expect(matchesFilter(filter, messageEvent("Ann", "c1"))).toBe(false);
  });

  it("combines filters with and/or/not", () => {
    const start = Filters.command("/start");
    const inC1 = Filters.chatIn(["c1"]);

    expect(matchesFilter(and(start, inC1), messageEvent("/start", "c1"))).toBe(true);
    expect(matchesFilter(and(start, inC1), messageEvent("/start", "c2"))).toBe(false);
    expect(matchesFilter(or(start, inC1), messageEvent("hi", "c1"))).toBe(true);
    expect(matchesFilter(or(start, inC1), messageEvent("hi", "c2"))).toBe(false);
    expect(matchesFilter(not(start), messageEvent("hi"))).toBe(true);
  });

  it("returns new filter objects without touching the operands", () => {
    const start = Filters.command("/start");
    const combined = and(start, Filters.any());

    expect(combined).not.toBe(start);
    expect(start).toEqual({ kind: "command", command: "/start" });
  });

  describe("combinator idempotence", () => {
    const filters: Filter[] = [
      Filters.any(),
      Filters.command("/start"),
      Filters.textContains("hi"),
      Filters.chatIn(["c1"]),
      Filters.callbackData("x"),
      or(Filters.command("/help"), Filters.chatIn(["c2"])),
    ];
    const events: BotEvent[] = [
      messageEvent("/start", "c1"),
      messageEvent("/help", "c2"),
      messageEvent("hi there", "c3"),
      messageEvent(undefined, "c1"),
      callbackEvent("x", "c2"),
    ];

    it("and(f, f) behaves like f", () => {
      for (const filter of filters) {
        for (const event of events) {
          expect(matchesFilter(and(filter, filter), event)).toBe(matchesFilter(filter, event));
        }
      }
    });

    it("not(not(f)) behaves like f", () => {
      for (const filter of filters) {
        for (const event of events) {
          expect(matchesFilter(not(not(filter)), event)).toBe(matchesFilter(filter, event));
        }
      }
    });
  });
});
