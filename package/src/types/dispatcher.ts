import type { Logger } from "../telemetry/index.js";
import type {
  EventError,
  TransportError,
  TransportExhaustedError,
} from "../errors.js";
import type { Dependency } from "../dispatcher/dependencies.js";
import type { BotEvent } from "./event.js";
import type {
  Cursor,
  SendParams,
  Transport,
  TransportResponse,
} from "./transport.js";

export type DispatcherState = "idle" | "polling" | "processing" | "stopped";

/**
 * Per-event context handed to middleware, filters-adjacent helpers and handlers.
 *
 * 关键点（中文）
 * - 每个事件一次 dispatch 一个 context，`use()` 的依赖缓存也只在这一次 dispatch 内有效
 * - `signal` 在 dispatcher stop() 时 abort，长任务应自行响应
 */
export type DispatchContext = {
  /** Unique per dispatch, for log correlation. */
  dispatchId: string;
  send: (method: string, params?: SendParams) => Promise<TransportResponse>;
  logger: Logger;
  signal: AbortSignal;
  /** Resolves a dependency once per dispatch; disposers run after the handler. */
  use: <T>(dependency: Dependency<T>) => Promise<T>;
};

export type RetryPolicy = {
  /**
   * Consecutive poll failures tolerated before giving up.
   * `Infinity` keeps retrying until `stop()`.
   */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
};

export type DispatcherHooks = {
  /** Per-event decode/middleware/handler failure. The loop keeps going. */
  onEventError?: (error: EventError, event?: BotEvent) => void | Promise<void>;
  /** Called before each backoff sleep. */
  onTransportError?: (
    error: TransportError,
    attempt: number,
    delayMs: number,
  ) => void | Promise<void>;
  onFatalError?: (error: TransportExhaustedError) => void | Promise<void>;
  /** Called after the cursor moves; apps may persist it here. */
  onCursorAdvance?: (cursor: Cursor, previous: Cursor) => void | Promise<void>;
  onStateChange?: (
    state: DispatcherState,
    previous: DispatcherState,
  ) => void | Promise<void>;
};

export type DispatcherOptions = {
  transport: Transport;
  /** Long-poll wait passed to `Transport.poll`. Default 15. */
  pollTimeSeconds?: number;
  /** Default 0. */
  initialCursor?: Cursor;
  /**
   * Worker slots for event processing. Default 1.
   *
   * With 1, events run strictly in arrival order. With more, events of a
   * batch start in order but may complete in any order.
   */
  concurrency?: number;
  retry?: Partial<RetryPolicy>;
  logger?: Logger;
  hooks?: DispatcherHooks;
};
