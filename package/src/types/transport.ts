/**
 * Transport contract（轮询 + 发送能力）。
 *
 * The dispatcher only depends on this interface; `HttpTransport` is the
 * bundled implementation, tests use in-process fakes.
 */

/** Opaque progress marker. The bundled HTTP transport uses numeric event ids. */
export type Cursor = string | number;

export type PollResult = {
  /** Raw updates in server order, not yet decoded. */
  readonly updates: readonly unknown[];
  readonly nextCursor: Cursor;
};

export type SendParams = Record<string, unknown>;

export type TransportResponse = {
  ok: boolean;
  description?: string;
  [key: string]: unknown;
};

export interface Transport {
  /**
   * Long-poll for the next batch after `cursor`.
   * Fails with `TransportError`; any other rejection is treated as `Network`.
   */
  poll(
    cursor: Cursor,
    timeoutSeconds: number,
    signal?: AbortSignal,
  ): Promise<PollResult>;

  /** Calls a remote method. The dispatcher never retries sends. */
  send(method: string, params?: SendParams): Promise<TransportResponse>;
}
