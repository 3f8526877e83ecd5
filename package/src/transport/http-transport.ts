import { z } from "zod";
import { TransportError, describeError } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../telemetry/index.js";
import { sleep } from "../process/utils/time.js";
import type {
  Cursor,
  PollResult,
  SendParams,
  Transport,
  TransportResponse,
} from "../types/transport.js";

/**
 * HTTP transport for the Bot API (`events/get` long polling).
 *
 * 关键点（中文）
 * - 所有请求都是 GET + query string，token 放在 query 里
 * - poll 失败统一抛 TransportError（Network / RateLimited / ServerError / Timeout），由 dispatcher 决定是否重试
 * - send 只在 5xx 时按 `sendRetries` 自行重试；dispatcher 不会重试 send
 */

export type HttpTransportOptions = {
  token: string;
  /** Server origin, e.g. `https://api.example.com`. */
  url: string;
  /** Default `/bot/v1/`. */
  basePath?: string;
  /** Upper bound for one request; polls get at least `pollTime + 5s`. Default 30000. */
  requestTimeoutMs?: number;
  /** Extra attempts for sends that hit a 5xx. Default 2. */
  sendRetries?: number;
  sendRetryDelayMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
};

const pollEnvelopeSchema = z.object({
  ok: z.boolean().optional(),
  description: z.string().optional(),
  events: z.array(z.unknown()),
});

const sendEnvelopeSchema = z
  .object({
    ok: z.boolean(),
    description: z.string().optional(),
  })
  .passthrough();

const POLL_TIMEOUT_GRACE_MS = 5000;

export class HttpTransport implements Transport {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly sendRetries: number;
  private readonly sendRetryDelayMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: HttpTransportOptions) {
    this.token = options.token;
    this.baseUrl = joinBaseUrl(options.url, options.basePath ?? "/bot/v1/");
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.sendRetries = Math.max(0, Math.floor(options.sendRetries ?? 2));
    this.sendRetryDelayMs = Math.max(0, options.sendRetryDelayMs ?? 500);
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? defaultLogger;
  }

  async poll(
    cursor: Cursor,
    timeoutSeconds: number,
    signal?: AbortSignal,
  ): Promise<PollResult> {
    const url = this.buildUrl("events/get", {
      lastEventId: cursor,
      pollTime: timeoutSeconds,
    });
    const timeoutMs = Math.max(
      this.requestTimeoutMs,
      timeoutSeconds * 1000 + POLL_TIMEOUT_GRACE_MS,
    );
    const events = await this.request(url, timeoutMs, signal, async (response) => {
      if (response.status === 429) {
        await this.discardBody(response);
        throw new TransportError("RateLimited", "events/get rate limited (HTTP 429)", {
          status: 429,
          retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
        });
      }
      if (!response.ok) {
        await this.discardBody(response);
        throw new TransportError("ServerError", `events/get failed: HTTP ${response.status}`, {
          status: response.status,
        });
      }

      const body = await readJson(response, "events/get");
      const parsed = pollEnvelopeSchema.safeParse(body);
      if (!parsed.success) {
        throw new TransportError("ServerError", "events/get returned a malformed batch", {
          status: response.status,
          cause: parsed.error,
        });
      }
      if (parsed.data.ok === false) {
        const details = parsed.data.description ? `: ${parsed.data.description}` : "";
        throw new TransportError("ServerError", `events/get rejected${details}`, {
          status: response.status,
        });
      }
      return parsed.data.events;
    });

    return {
      updates: events,
      nextCursor: computeNextCursor(cursor, events),
    };
  }

  async send(method: string, params: SendParams = {}): Promise<TransportResponse> {
    const url = this.buildUrl(method, params);
    const attempts = this.sendRetries + 1;

    for (let attempt = 1; ; attempt += 1) {
      const outcome = await this.request(url, this.requestTimeoutMs, undefined, async (response) => {
        if (response.status >= 500 && attempt < attempts) {
          await this.discardBody(response);
          return { retry: true as const, status: response.status };
        }
        return { retry: false as const, body: await this.readSendResponse(method, response) };
      });
      if (!outcome.retry) return outcome.body;

      this.logger.warn("Send failed, retrying", {
        method,
        status: outcome.status,
        attempt,
      });
      await sleep(this.sendRetryDelayMs);
    }
  }

  private async readSendResponse(method: string, response: Response): Promise<TransportResponse> {
    if (response.status === 429) {
      await this.discardBody(response);
      throw new TransportError("RateLimited", `${method} rate limited (HTTP 429)`, {
        status: 429,
        retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
      });
    }
    if (!response.ok) {
      await this.discardBody(response);
      throw new TransportError("ServerError", `${method} failed: HTTP ${response.status}`, {
        status: response.status,
      });
    }

    const body = await readJson(response, method);
    const parsed = sendEnvelopeSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError("ServerError", `${method} returned a malformed response`, {
        status: response.status,
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  /** Releases the connection of a response whose body is not read. */
  private async discardBody(response: Response): Promise<void> {
    if (!response.body || response.bodyUsed) return;
    await response.body.cancel().catch((error: unknown) => {
      this.logger.debug("Discarding response body failed", { error: describeError(error) });
    });
  }

  private buildUrl(method: string, params: SendParams): string {
    const query = new URLSearchParams({ token: this.token });
    for (const [key, value] of Object.entries(params)) {
      if (value === undefined || value === null) continue;
      query.append(
        key,
        typeof value === "object" ? JSON.stringify(value) : String(value),
      );
    }
    return `${this.baseUrl}${method.replace(/^\/+/, "")}?${query.toString()}`;
  }

  /**
   * 发请求并在同一个超时 / 取消窗口内读取响应体。
   *
   * 关键点（中文）
   * - `read` 在 timer 与调用方 signal 仍然生效时执行，响应体卡住也会被超时或 stop() 打断
   * - `read` 自己抛出的 TransportError 原样透传
   */
  private async request<T>(
    url: string,
    timeoutMs: number,
    signal: AbortSignal | undefined,
    read: (response: Response) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        signal: controller.signal,
      });
      return await untilAborted(read(response), controller.signal);
    } catch (error) {
      if (timedOut) {
        throw new TransportError("Timeout", `Request timed out after ${timeoutMs}ms`, {
          cause: error,
        });
      }
      if (signal?.aborted) {
        throw new TransportError("Network", "Request aborted", { cause: error });
      }
      if (error instanceof TransportError) throw error;
      throw new TransportError("Network", `Request failed: ${describeError(error)}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}

export function joinBaseUrl(url: string, basePath: string): string {
  const origin = url.trim().replace(/\/+$/, "");
  const trimmed = basePath.trim().replace(/^\/+|\/+$/g, "");
  return trimmed ? `${origin}/${trimmed}/` : `${origin}/`;
}

/**
 * Largest numeric `eventId` in the batch, never below the current cursor.
 * Batches without readable ids keep the cursor as is.
 */
export function computeNextCursor(cursor: Cursor, events: readonly unknown[]): Cursor {
  let next: number | undefined;
  for (const event of events) {
    if (typeof event !== "object" || event === null || !("eventId" in event)) continue;
    const id = Number(event.eventId);
    if (!Number.isFinite(id)) continue;
    next = next === undefined ? id : Math.max(next, id);
  }
  if (next === undefined) return cursor;
  const current = Number(cursor);
  if (Number.isFinite(current) && current >= next) return cursor;
  return next;
}

export function parseRetryAfter(
  header: string | null,
  now: number = Date.now(),
): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

async function readJson(response: Response, method: string): Promise<unknown> {
  try {
    const body: unknown = await response.json();
    return body;
  } catch (error) {
    throw new TransportError("ServerError", `${method} returned invalid JSON`, {
      status: response.status,
      cause: error,
    });
  }
}

/** Settles with `work`, or rejects as soon as `signal` aborts. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    void work
      .then(resolve, reject)
      .finally(() => signal.removeEventListener("abort", onAbort));
  });
}
