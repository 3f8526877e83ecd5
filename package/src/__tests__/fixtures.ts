import { DependencyScope } from "../dispatcher/dependencies.js";
import { TransportError } from "../errors.js";
import { decodeEvent } from "../events/decoder.js";
import { createLogger, type Logger } from "../telemetry/index.js";
import type { DispatchContext } from "../types/dispatcher.js";
import type {
  BotEvent,
  CallbackQueryEvent,
  NewMessageEvent,
} from "../types/event.js";
import type {
  Cursor,
  PollResult,
  SendParams,
  Transport,
  TransportResponse,
} from "../types/transport.js";

export function silentLogger(): Logger {
  return createLogger({ console: false });
}

export function fakeContext(overrides: Partial<DispatchContext> = {}): DispatchContext {
  const logger = silentLogger();
  const scope = new DependencyScope(logger);
  const ctx: DispatchContext = {
    dispatchId: "dispatch-1",
    send: async () => ({ ok: true }),
    logger,
    signal: new AbortController().signal,
    use: (dependency) => dependency.resolveIn(scope, ctx),
    ...overrides,
  };
  return ctx;
}

export function rawMessage(params: {
  eventId?: number | string;
  msgId?: number | string;
  chatId?: string;
  text?: string;
  type?: string;
  parts?: Array<{ type: string; payload?: Record<string, unknown> }>;
} = {}): Record<string, unknown> {
  return {
    eventId: params.eventId ?? 1,
    type: params.type ?? "newMessage",
    payload: {
      msgId: params.msgId ?? `m${params.eventId ?? 1}`,
      chat: { chatId: params.chatId ?? "c1", type: "private" },
      from: { userId: "u1", firstName: "Ann" },
      text: params.text,
      timestamp: 1_700_000_000,
      ...(params.parts ? { parts: params.parts } : {}),
    },
  };
}

export function rawCallback(params: {
  eventId?: number;
  chatId?: string;
  callbackData?: string;
} = {}): Record<string, unknown> {
  return {
    eventId: params.eventId ?? 1,
    type: "callbackQuery",
    payload: {
      queryId: "q1",
      from: { userId: "u1" },
      callbackData: params.callbackData ?? "survey",
      message: {
        msgId: "m0",
        chat: { chatId: params.chatId ?? "c1", type: "private" },
        text: "Pick one",
      },
    },
  };
}

export function decodeOrThrow(raw: unknown): BotEvent {
  const result = decodeEvent(raw);
  if (!result.ok) throw result.error;
  return result.event;
}

export function messageEvent(text: string | undefined, chatId: string = "c1"): NewMessageEvent {
  const event = decodeOrThrow(rawMessage({ text, chatId }));
  if (event.type !== "newMessage") throw new Error("expected newMessage");
  return event;
}

export function callbackEvent(callbackData: string, chatId: string = "c1"): CallbackQueryEvent {
  const event = decodeOrThrow(rawCallback({ callbackData, chatId }));
  if (event.type !== "callbackQuery") throw new Error("expected callbackQuery");
  return event;
}

export type PollStep = PollResult | Error;

/**
 * Scripted in-process transport. Each poll consumes one step; once the
 * script is used up, `onDrained` fires and the poll blocks until aborted.
 */
export class FakeTransport implements Transport {
  readonly polls: Array<{ cursor: Cursor; timeoutSeconds: number }> = [];
  readonly sends: Array<{ method: string; params?: SendParams }> = [];
  onDrained?: () => void;

  constructor(private readonly steps: PollStep[]) {}

  async poll(
    cursor: Cursor,
    timeoutSeconds: number,
    signal?: AbortSignal,
  ): Promise<PollResult> {
    this.polls.push({ cursor, timeoutSeconds });
    const step = this.steps.shift();
    if (step instanceof Error) throw step;
    if (step) return step;

    this.onDrained?.();
    return new Promise<PollResult>((_resolve, reject) => {
      const aborted = () => reject(new TransportError("Network", "aborted"));
      if (signal?.aborted) {
        aborted();
        return;
      }
      signal?.addEventListener("abort", aborted, { once: true });
    });
  }

  async send(method: string, params?: SendParams): Promise<TransportResponse> {
    this.sends.push({ method, params });
    return { ok: true };
  }
}

export function deferred<T = void>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
