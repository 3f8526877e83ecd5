/**
 * Error taxonomy.
 *
 * Per-event failures (`DecodeError` / `MiddlewareError` / `HandlerError`) are
 * isolated to one event and only reported. `TransportError` is retried by the
 * poll loop; `TransportExhaustedError` is the single fatal outcome of `start()`.
 */

export type DecodeErrorKind = "UnknownType" | "MissingField" | "MalformedValue";

export type TransportErrorKind =
  | "Network"
  | "RateLimited"
  | "ServerError"
  | "Timeout";

export class BotwireError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DecodeError extends BotwireError {
  readonly kind: DecodeErrorKind;
  /** Dotted path of the offending field, e.g. `payload.chat.chatId`. */
  readonly path: string;
  readonly eventId?: string;

  constructor(params: {
    kind: DecodeErrorKind;
    path: string;
    message: string;
    eventId?: string;
  }) {
    super(params.message);
    this.kind = params.kind;
    this.path = params.path;
    this.eventId = params.eventId;
  }
}

export class MiddlewareError extends BotwireError {
  readonly middleware: string;
  readonly eventId: string;

  constructor(params: { middleware: string; eventId: string; cause: unknown }) {
    super(
      `Middleware "${params.middleware}" failed for event ${params.eventId}: ${describeError(params.cause)}`,
      { cause: params.cause },
    );
    this.middleware = params.middleware;
    this.eventId = params.eventId;
  }
}

export class HandlerError extends BotwireError {
  readonly handler: string;
  readonly eventId: string;

  constructor(params: { handler: string; eventId: string; cause: unknown }) {
    super(
      `Handler "${params.handler}" failed for event ${params.eventId}: ${describeError(params.cause)}`,
      { cause: params.cause },
    );
    this.handler = params.handler;
    this.eventId = params.eventId;
  }
}

export class TransportError extends BotwireError {
  readonly kind: TransportErrorKind;
  readonly status?: number;
  /** Server hint for `RateLimited`, in milliseconds. */
  readonly retryAfterMs?: number;

  constructor(
    kind: TransportErrorKind,
    message: string,
    options?: { status?: number; retryAfterMs?: number; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.kind = kind;
    this.status = options?.status;
    this.retryAfterMs = options?.retryAfterMs;
  }
}

export class TransportExhaustedError extends BotwireError {
  readonly attempts: number;
  readonly lastError: TransportError;

  constructor(attempts: number, lastError: TransportError) {
    super(
      `Polling stopped after ${attempts} consecutive transport failures: ${lastError.message}`,
      { cause: lastError },
    );
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class RegistryLockedError extends BotwireError {
  constructor(what: "handler" | "middleware") {
    super(
      `Cannot register a ${what} after the dispatcher has started; register everything before start()`,
    );
  }
}

export class ConfigError extends BotwireError {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid botwire config (${source}): ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export type EventError = DecodeError | MiddlewareError | HandlerError;

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) return error;
  return new TransportError("Network", describeError(error), { cause: error });
}
