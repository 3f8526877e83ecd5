import { describe, expect, it, vi } from "vitest";

import { TransportError } from "../../errors.js";
import {
  HttpTransport,
  computeNextCursor,
  joinBaseUrl,
  parseRetryAfter,
  type HttpTransportOptions,
} from "../http-transport.js";
import { silentLogger } from "../../__tests__/fixtures.js";

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "content-type": "application/json" },
    ...init,
  });
}

function createTransport(
  respond: (...args: FetchArgs) => Promise<Response>,
  options: Partial<HttpTransportOptions> = {},
) {
  const fetchMock = vi.fn(respond);
  const transport = new HttpTransport({
    token: "test-secret",
    url: "https://bots.example.com",
    fetch: fetchMock,
    logger: silentLogger(),
    sendRetryDelayMs: 0,
    ...options,
  });
  return { transport, fetchMock };
}

function stalledBody(onCancel?: () => void): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    cancel: () => onCancel?.(),
  });
}

function requestedUrl(fetchMock: { mock: { calls: unknown[][] } }, call: number = 0): URL {
  const input: unknown = fetchMock.mock.calls[call]?.[0];
  if (typeof input !== "string") throw new Error("expected a string URL");
  return new URL(input);
}

describe("HttpTransport.poll", () => {
  it("requests events/get with the cursor and poll time", async () => {
    const { transport, fetchMock } = createTransport(async () =>
      jsonResponse({ ok: true, events: [] }),
    );

    const result = await transport.poll(12, 15);

    const url = requestedUrl(fetchMock);
    expect(url.origin + url.pathname).toBe("https://bots.example.com/bot/v1/events/get");
    expect(url.searchParams.get("token")).toBe("test-secret");
    expect(url.searchParams.get("lastEventId")).toBe("12");
    expect(url.searchParams.get("pollTime")).toBe("15");
    expect(result).toEqual({ updates: [], nextCursor: 12 });
  });

  it("advances the cursor to the largest event id", async () => {
    const events = [
      { eventId: 14, type: "newMessage", payload: {} },
      { eventId: 13, type: "newMessage", payload: {} },
    ];
    const { transport } = createTransport(async () => jsonResponse({ ok: true, events }));

    const result = await transport.poll(12, 0);

    expect(result.updates).toEqual(events);
    expect(result.nextCursor).toBe(14);
  });

  it("maps 429 to RateLimited with the retry-after hint", async () => {
    const { transport } = createTransport(async () =>
      jsonResponse({ ok: false }, { status: 429, headers: { "retry-after": "2" } }),
    );

    await expect(transport.poll(0, 0)).rejects.toMatchObject({
      kind: "RateLimited",
      status: 429,
      retryAfterMs: 2000,
    });
  });

  it("maps other non-2xx responses to ServerError", async () => {
    const { transport } = createTransport(async () => new Response("oops", { status: 503 }));

    const error = await transport.poll(0, 0).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ kind: "ServerError", status: 503 });
  });

  it("rejects malformed envelopes and explicit failures", async () => {
    const malformed = createTransport(async () => jsonResponse({ ok: true, events: "nope" }));
    await expect(malformed.transport.poll(0, 0)).rejects.toThrow(
      "events/get returned a malformed batch",
    );

    const rejected = createTransport(async () =>
      jsonResponse({ ok: false, description: "bad token", events: [] }),
    );
    await expect(rejected.transport.poll(0, 0)).rejects.toThrow("events/get rejected: bad token");

    const notJson = createTransport(async () => new Response("<html>", { status: 200 }));
    await expect(notJson.transport.poll(0, 0)).rejects.toThrow("events/get returned invalid JSON");
  });

  it("maps fetch failures to Network", async () => {
    const { transport } = createTransport(async () => {
      throw new TypeError("fetch failed");
    });

    await expect(transport.poll(0, 0)).rejects.toMatchObject({
      kind: "Network",
      message: "Request failed: fetch failed",
    });
  });

  it("aborts the request when the caller's signal aborts", async () => {
    const { transport } = createTransport(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")), {
            once: true,
          });
        }),
    );
    const controller = new AbortController();

    const pending = transport.poll(0, 30, controller.signal);
    controller.abort();

    await expect(pending).rejects.toMatchObject({ kind: "Network", message: "Request aborted" });
  });

  it("stops waiting for a stalled body when the caller's signal aborts", async () => {
    const { transport } = createTransport(async () => new Response(stalledBody(), { status: 200 }), {
      requestTimeoutMs: 50,
    });
    const controller = new AbortController();

    const pending = transport.poll(0, 0, controller.signal);
    setTimeout(() => controller.abort(), 20);

    await expect(pending).rejects.toMatchObject({ kind: "Network", message: "Request aborted" });
  });
});

describe("HttpTransport.send", () => {
  it("encodes params into the query string", async () => {
    const { transport, fetchMock } = createTransport(async () =>
      jsonResponse({ ok: true, msgId: "m9" }),
    );

    const response = await transport.send("messages/sendText", {
      chatId: "c1",
      text: "hi there",
      inlineKeyboardMarkup: [[{ text: "Yes", callbackData: "yes" }]],
      replyMsgId: undefined,
      forwardChatId: null,
    });

    const url = requestedUrl(fetchMock);
    expect(url.pathname).toBe("/bot/v1/messages/sendText");
    expect(url.searchParams.get("chatId")).toBe("c1");
    expect(url.searchParams.get("text")).toBe("hi there");
    expect(url.searchParams.get("inlineKeyboardMarkup")).toBe(
      '[[{"text":"Yes","callbackData":"yes"}]]',
    );
    expect(url.searchParams.has("replyMsgId")).toBe(false);
    expect(url.searchParams.has("forwardChatId")).toBe(false);
    expect(response).toEqual({ ok: true, msgId: "m9" });
  });

  it("returns unsuccessful API responses to the caller", async () => {
    const { transport } = createTransport(async () =>
      jsonResponse({ ok: false, description: "chat not found" }),
    );

    expect(await transport.send("messages/sendText", { chatId: "x" })).toEqual({
      ok: false,
      description: "chat not found",
    });
  });

  it("retries 5xx responses before succeeding", async () => {
    let calls = 0;
    const { transport, fetchMock } = createTransport(async () => {
      calls += 1;
      return calls === 1 ? new Response("down", { status: 502 }) : jsonResponse({ ok: true });
    });

    expect(await transport.send("self/get")).toEqual({ ok: true });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("gives up after the configured send retries", async () => {
    const { transport, fetchMock } = createTransport(
      async () => new Response("down", { status: 500 }),
      { sendRetries: 2 },
    );

    await expect(transport.send("self/get")).rejects.toMatchObject({
      kind: "ServerError",
      status: 500,
    });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("does not retry client errors", async () => {
    const { transport, fetchMock } = createTransport(
      async () => new Response("bad", { status: 400 }),
    );

    await expect(transport.send("self/get")).rejects.toMatchObject({ kind: "ServerError", status: 400 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("times out a response whose body never completes", async () => {
    const { transport } = createTransport(
      async () => new Response(stalledBody(), { status: 200 }),
      { requestTimeoutMs: 20 },
    );

    await expect(transport.send("self/get")).rejects.toMatchObject({
      kind: "Timeout",
      message: "Request timed out after 20ms",
    });
  });

  it("releases the body of a failed response before retrying", async () => {
    let cancelled = 0;
    let calls = 0;
    const { transport } = createTransport(
      async () => {
        calls += 1;
        return calls === 1
          ? new Response(stalledBody(() => (cancelled += 1)), { status: 503 })
          : jsonResponse({ ok: true });
      },
      { sendRetries: 1 },
    );

    expect(await transport.send("self/get")).toEqual({ ok: true });
    expect(calls).toBe(2);
    expect(cancelled).toBe(1);
  });

  it("times out slow requests", async () => {
    const { transport } = createTransport(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")), {
            once: true,
          });
        }),
      { requestTimeoutMs: 20 },
    );

    await expect(transport.send("self/get")).rejects.toMatchObject({
      kind: "Timeout",
      message: "Request timed out after 20ms",
    });
  });
});

describe("helpers", () => {
  it("joins the api url and base path", () => {
    expect(joinBaseUrl("https://bots.example.com/", "/bot/v1/")).toBe(
      "https://bots.example.com/bot/v1/",
    );
    expect(joinBaseUrl("https://bots.example.com", "api")).toBe("https://bots.example.com/api/");
    expect(joinBaseUrl("https://bots.example.com", "")).toBe("https://bots.example.com/");
  });

  it("computes the next cursor", () => {
    expect(computeNextCursor(3, [])).toBe(3);
    expect(computeNextCursor(3, [{ eventId: "7" }, { eventId: 5 }, { nope: true }])).toBe(7);
    expect(computeNextCursor(10, [{ eventId: 4 }])).toBe(10);
    expect(computeNextCursor("start", [{ eventId: 2 }])).toBe(2);
  });

  it("parses retry-after seconds and dates", () => {
    const now = Date.parse("2026-01-01T00:00:00Z");
    expect(parseRetryAfter("3", now)).toBe(3000);
    expect(parseRetryAfter("Thu, 01 Jan 2026 00:00:05 GMT", now)).toBe(5000);
    expect(parseRetryAfter(null, now)).toBeUndefined();
    expect(parseRetryAfter("soon", now)).toBeUndefined();
  });
});
