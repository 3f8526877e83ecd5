import {
  BotwireError,
  DecodeError,
  HandlerError,
  RegistryLockedError,
  TransportExhaustedError,
  describeError,
  toTransportError,
  type EventError,
} from "../errors.js";
import { decodeEvent, type DecodeResult } from "../events/decoder.js";
import type { Filter } from "../filters/filter.js";
import { logger as defaultLogger, type Logger } from "../telemetry/index.js";
import { generateId } from "../process/utils/id.js";
import { computeBackoffDelay, formatDuration, sleep } from "../process/utils/time.js";
import type { BotEvent } from "../types/event.js";
import type {
  DispatchContext,
  DispatcherHooks,
  DispatcherOptions,
  DispatcherState,
  RetryPolicy,
} from "../types/dispatcher.js";
import type {
  Cursor,
  PollResult,
  SendParams,
  Transport,
  TransportResponse,
} from "../types/transport.js";
import { DependencyScope } from "./dependencies.js";
import {
  HandlerRegistry,
  type HandlerCallback,
  type HandlerDefinition,
  type HandlerRegistration,
} from "./handler-registry.js";
import {
  runMiddlewareChain,
  type Middleware,
  type MiddlewareFn,
} from "./middleware.js";
import { WorkerPool } from "./worker-pool.js";

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  factor: 2,
};

/**
 * Dispatcher：长轮询 + 事件分发。
 *
 * 状态机：idle → polling → processing → polling … → stopped
 *
 * 关键点（中文）
 * - cursor 只在整批事件都已提交给 worker pool 之后推进（不等 handler 完成）
 * - 单个事件的解码 / middleware / handler 失败只影响该事件
 * - 轮询失败按指数退避重试；连续失败达到 maxAttempts 后 start() 以 TransportExhaustedError 结束
 * - stop() 在 poll、退避等待、每个事件提交前生效；已在运行的 handler 会跑完
 */
export class Dispatcher {
  readonly handlers: HandlerRegistry = new HandlerRegistry();

  private readonly transport: Transport;
  private readonly middlewares: Middleware[] = [];
  private readonly pollTimeSeconds: number;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;
  private readonly hooks: DispatcherHooks;
  private readonly pool: WorkerPool;
  private readonly abortController: AbortController = new AbortController();

  private currentState: DispatcherState = "idle";
  private currentCursor: Cursor;
  private started = false;

  constructor(options: DispatcherOptions) {
    this.transport = options.transport;
    this.pollTimeSeconds =
      typeof options.pollTimeSeconds === "number" && options.pollTimeSeconds >= 0
        ? options.pollTimeSeconds
        : 15;
    this.currentCursor = options.initialCursor ?? 0;
    this.retry = normalizeRetryPolicy(options.retry);
    this.logger = options.logger ?? defaultLogger;
    this.hooks = options.hooks ?? {};
    this.pool = new WorkerPool({
      concurrency: options.concurrency ?? 1,
      onTaskError: (error) => {
        this.logger.error("Event task failed", { error: describeError(error) });
      },
    });
  }

  get state(): DispatcherState {
    return this.currentState;
  }

  get cursor(): Cursor {
    return this.currentCursor;
  }

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  registerHandler(
    filter: Filter,
    callback: HandlerCallback,
    options?: { name?: string },
  ): HandlerRegistration {
    return this.handlers.register(filter, callback, options);
  }

  addHandler(definition: HandlerDefinition): HandlerRegistration {
    return this.handlers.add(definition);
  }

  registerMiddleware(middleware: Middleware | MiddlewareFn): void {
    if (this.started) throw new RegistryLockedError("middleware");
    this.middlewares.push(
      typeof middleware === "function"
        ? { name: middleware.name, handle: middleware }
        : middleware,
    );
  }

  send(method: string, params?: SendParams): Promise<TransportResponse> {
    return this.transport.send(method, params);
  }

  /**
   * Runs the poll loop. Resolves after `stop()`, rejects with
   * `TransportExhaustedError` once the retry budget is spent.
   */
  async start(): Promise<void> {
    if (this.started) {
      throw new BotwireError("Dispatcher has already been started");
    }
    this.started = true;
    this.handlers.lock();

    if (this.signal.aborted) {
      this.setState("stopped");
      return;
    }

    this.logger.info("Dispatcher started", {
      cursor: this.currentCursor,
      handlers: this.handlers.size(),
      middlewares: this.middlewares.length,
      concurrency: this.pool.concurrency,
    });

    try {
      await this.runLoop();
    } finally {
      await this.pool.drain();
      this.setState("stopped");
      this.logger.info("Dispatcher stopped", { cursor: this.currentCursor });
    }
  }

  /** Signals cancellation; `start()` settles once in-flight handlers finish. */
  stop(): void {
    if (this.signal.aborted) return;
    this.logger.info("Stopping dispatcher", { state: this.currentState });
    this.abortController.abort();
    if (!this.started) this.setState("stopped");
  }

  private async runLoop(): Promise<void> {
    const signal = this.signal;
    let failures = 0;

    while (!signal.aborted) {
      this.setState("polling");

      let result: PollResult;
      try {
        result = await this.transport.poll(
          this.currentCursor,
          this.pollTimeSeconds,
          signal,
        );
      } catch (error) {
        if (signal.aborted) return;
        const transportError = toTransportError(error);
        failures += 1;

        if (failures >= this.retry.maxAttempts) {
          const fatal = new TransportExhaustedError(failures, transportError);
          this.logger.error("Polling stopped after repeated transport failures", {
            attempts: failures,
            kind: transportError.kind,
            status: transportError.status,
            error: transportError.message,
          });
          await this.runHook("onFatalError", () => this.hooks.onFatalError?.(fatal));
          throw fatal;
        }

        const delayMs = Math.max(
          computeBackoffDelay(this.retry, failures),
          transportError.retryAfterMs ?? 0,
        );
        this.logger.warn(`Poll failed, retrying in ${formatDuration(delayMs)}`, {
          attempt: failures,
          kind: transportError.kind,
          status: transportError.status,
          delayMs,
          error: transportError.message,
        });
        await this.runHook("onTransportError", () =>
          this.hooks.onTransportError?.(transportError, failures, delayMs),
        );
        if (!(await sleep(delayMs, signal))) return;
        continue;
      }

      failures = 0;
      if (signal.aborted) return;

      const submitted = await this.processBatch(result);
      if (!submitted) return;
      await this.advanceCursor(result.nextCursor);
    }
  }

  /** Returns false when stop interrupted the batch before every event was submitted. */
  private async processBatch(result: PollResult): Promise<boolean> {
    if (result.updates.length === 0) return true;
    this.setState("processing");
    const signal = this.signal;

    for (const raw of result.updates) {
      if (signal.aborted) return false;

      const decoded = decodeSafely(raw);
      if (!decoded.ok) {
        this.logger.warn("Skipping undecodable update", {
          eventId: decoded.error.eventId,
          kind: decoded.error.kind,
          path: decoded.error.path,
          error: decoded.error.message,
        });
        await this.reportEventError(decoded.error);
        continue;
      }

      const event = decoded.event;
      const started = await this.pool.submit(
        () => this.dispatchEvent(event),
        () => !signal.aborted,
      );
      if (!started) return false;
    }
    return true;
  }

  private async dispatchEvent(event: BotEvent): Promise<void> {
    const scope = new DependencyScope(this.logger);
    const ctx: DispatchContext = {
      dispatchId: generateId(),
      send: (method, params) => this.transport.send(method, params),
      logger: this.logger,
      signal: this.signal,
      use: (dependency) => dependency.resolveIn(scope, ctx),
    };
    const logContext = {
      eventId: event.eventId,
      type: event.type,
      chatId: event.chat.chatId,
      dispatchId: ctx.dispatchId,
    };

    try {
      const outcome = await runMiddlewareChain(this.middlewares, event, ctx);
      if (outcome.type === "failed") {
        this.logger.warn("Middleware failed, event dropped", {
          ...logContext,
          middleware: outcome.middleware,
          error: describeError(outcome.error.cause),
        });
        await this.reportEventError(outcome.error, event);
        return;
      }
      if (outcome.type === "abort") {
        this.logger.debug("Middleware aborted event", {
          ...logContext,
          middleware: outcome.middleware,
          reason: outcome.reason,
        });
        return;
      }

      let registration: HandlerRegistration | undefined;
      try {
        registration = this.handlers.match(outcome.event);
      } catch (cause) {
        const error =
          cause instanceof HandlerError
            ? cause
            : new HandlerError({ handler: "(match)", eventId: event.eventId, cause });
        this.logger.error("Handler filter failed", {
          ...logContext,
          handler: error.handler,
          error: describeError(error.cause),
        });
        await this.reportEventError(error, outcome.event);
        return;
      }
      if (!registration) {
        this.logger.debug("No handler matched event", logContext);
        return;
      }

      try {
        await registration.callback(outcome.event, ctx);
      } catch (cause) {
        const error = new HandlerError({
          handler: registration.name,
          eventId: event.eventId,
          cause,
        });
        this.logger.error("Handler failed", {
          ...logContext,
          handler: registration.name,
          error: describeError(cause),
        });
        await this.reportEventError(error, outcome.event);
      }
    } finally {
      await scope.dispose();
    }
  }

  private async advanceCursor(next: Cursor): Promise<void> {
    const previous = this.currentCursor;
    if (next === previous) return;
    if (typeof next === "number" && typeof previous === "number" && next < previous) {
      this.logger.warn("Ignoring cursor that moves backwards", {
        cursor: previous,
        nextCursor: next,
      });
      return;
    }
    this.currentCursor = next;
    this.logger.debug("Cursor advanced", { cursor: next, previous });
    await this.runHook("onCursorAdvance", () =>
      this.hooks.onCursorAdvance?.(next, previous),
    );
  }

  private setState(next: DispatcherState): void {
    const previous = this.currentState;
    if (previous === next) return;
    this.currentState = next;
    void this.runHook("onStateChange", () =>
      this.hooks.onStateChange?.(next, previous),
    );
  }

  private async reportEventError(error: EventError, event?: BotEvent): Promise<void> {
    await this.runHook("onEventError", () => this.hooks.onEventError?.(error, event));
  }

  private async runHook(
    name: keyof DispatcherHooks,
    invoke: () => void | Promise<void> | undefined,
  ): Promise<void> {
    try {
      await invoke();
    } catch (error) {
      this.logger.warn("Dispatcher hook failed", {
        hook: name,
        error: describeError(error),
      });
    }
  }
}

export function normalizeRetryPolicy(input?: Partial<RetryPolicy>): RetryPolicy {
  const maxAttempts =
    input?.maxAttempts === Number.POSITIVE_INFINITY
      ? Number.POSITIVE_INFINITY
      : positiveOr(input?.maxAttempts, DEFAULT_RETRY_POLICY.maxAttempts, 1);
  return {
    maxAttempts: Math.floor(maxAttempts),
    baseDelayMs: positiveOr(input?.baseDelayMs, DEFAULT_RETRY_POLICY.baseDelayMs, 0),
    maxDelayMs: positiveOr(input?.maxDelayMs, DEFAULT_RETRY_POLICY.maxDelayMs, 0),
    factor: positiveOr(input?.factor, DEFAULT_RETRY_POLICY.factor, 1),
  };
}

function positiveOr(value: number | undefined, fallback: number, min: number): number {
  if (typeof value !== "number" || !Number.isFinite(value)) return fallback;
  return Math.max(min, value);
}

function decodeSafely(raw: unknown): DecodeResult {
  try {
    return decodeEvent(raw);
  } catch (error) {
    return {
      ok: false,
      error: new DecodeError({
        kind: "MalformedValue",
        path: "",
        message: `Update could not be decoded: ${describeError(error)}`,
      }),
    };
  }
}
