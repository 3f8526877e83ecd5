import { MiddlewareError } from "../errors.js";
import type { BotEvent } from "../types/event.js";
import type { DispatchContext } from "../types/dispatcher.js";

/**
 * Middleware chain.
 *
 * 关键点（中文）
 * - 按注册顺序执行；每个 middleware 返回 continue(event) 或 abort(reason)
 * - abort 后不再执行后续 middleware，也不会进入 handler
 * - middleware 抛错视为该事件的 abort，错误包装成 MiddlewareError 交给调用方记录
 */

export type MiddlewareResult =
  | { type: "continue"; event: BotEvent }
  | { type: "abort"; reason?: string };

export interface Middleware {
  name?: string;
  handle(
    event: BotEvent,
    ctx: DispatchContext,
  ): MiddlewareResult | Promise<MiddlewareResult>;
}

export type MiddlewareFn = Middleware["handle"];

export function next(event: BotEvent): MiddlewareResult {
  return { type: "continue", event };
}

export function abort(reason?: string): MiddlewareResult {
  return { type: "abort", reason };
}

/** Wraps a plain function as a named middleware. */
export function defineMiddleware(name: string, handle: MiddlewareFn): Middleware {
  return { name, handle };
}

export function describeMiddleware(middleware: Middleware, index: number): string {
  const name = middleware.name?.trim();
  return name ? name : `middleware#${index}`;
}

export type ChainOutcome =
  | { type: "continue"; event: BotEvent }
  | { type: "abort"; middleware: string; reason?: string }
  | { type: "failed"; middleware: string; error: MiddlewareError };

export async function runMiddlewareChain(
  middlewares: readonly Middleware[],
  event: BotEvent,
  ctx: DispatchContext,
): Promise<ChainOutcome> {
  let current = event;
  for (const [index, middleware] of middlewares.entries()) {
    const name = describeMiddleware(middleware, index);
    let result: MiddlewareResult;
    try {
      result = await middleware.handle(current, ctx);
    } catch (cause) {
      return {
        type: "failed",
        middleware: name,
        error: new MiddlewareError({ middleware: name, eventId: event.eventId, cause }),
      };
    }
    if (result.type === "abort") {
      return { type: "abort", middleware: name, reason: result.reason };
    }
    current = result.event;
  }
  return { type: "continue", event: current };
}
