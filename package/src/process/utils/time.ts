/**
 * 时间工具模块。
 *
 * 职责说明：
 * 1. 提供统一时间戳格式与耗时格式化，便于日志和 CLI 输出使用一致单位。
 * 2. 提供可被 AbortSignal 打断的 sleep，以及轮询重试用的指数退避计算。
 */
import { setTimeout as delay } from "node:timers/promises";

export type BackoffPolicy = {
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
};

export function getTimestamp(): string {
  return new Date().toISOString();
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${(ms / 60000).toFixed(1)}m`;
}

/**
 * Delay before retry number `attempt` (1-based):
 * `min(maxDelayMs, baseDelayMs * factor^(attempt - 1))`.
 */
export function computeBackoffDelay(
  policy: BackoffPolicy,
  attempt: number,
): number {
  const exponent = Math.max(0, attempt - 1);
  const raw = policy.baseDelayMs * Math.pow(policy.factor, exponent);
  return Math.max(0, Math.min(policy.maxDelayMs, raw));
}

/**
 * Resolves after `ms`, or early (without throwing) once `signal` aborts.
 * Returns `false` when the wait was cut short.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  if (ms <= 0) return true;
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal?.aborted) return false;
    throw error;
  }
}
