import type { Logger } from "../telemetry/index.js";
import { describeError } from "../errors.js";

/**
 * In-memory per-user conversation state.
 *
 * 关键点（中文）
 * - key 默认使用 chatId（私聊里 chatId 就是用户 id）
 * - 每次 set/update 都会刷新 session 过期时间；过期条目在读取时惰性剔除，
 *   也可以通过 `startSweeper` 周期清理并触发 `onExpire`（例如通知用户“会话已过期”）
 * - 仅进程内存，不落盘
 */

export type UserStateEntry = {
  state?: string;
  data: Record<string, unknown>;
  additional: Record<string, unknown>;
  expiresAt: number;
};

export type SetUserStateParams = {
  user: string;
  state?: string;
  /** Merged into existing data; previous keys are kept. */
  data?: Record<string, unknown>;
  additional?: Record<string, unknown>;
  /** Session lifetime for this entry. Defaults to the store's `sessionTtlMs`. */
  ttlMs?: number;
};

/** Read side used by the `state` filter. */
export interface UserStateReader {
  getState(user: string): string | undefined;
}

export type UserStateStoreOptions = {
  sessionTtlMs?: number;
  now?: () => number;
  onExpire?: (user: string, entry: UserStateEntry) => void | Promise<void>;
  logger?: Pick<Logger, "info" | "warn">;
};

export class UserStateStore implements UserStateReader {
  private readonly entries: Map<string, UserStateEntry> = new Map();
  private readonly sessionTtlMs: number;
  private readonly now: () => number;
  private readonly onExpire?: UserStateStoreOptions["onExpire"];
  private readonly logger?: UserStateStoreOptions["logger"];
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: UserStateStoreOptions = {}) {
    this.sessionTtlMs =
      typeof options.sessionTtlMs === "number" && options.sessionTtlMs > 0
        ? options.sessionTtlMs
        : 5 * 60 * 1000;
    this.now = options.now ?? (() => Date.now());
    this.onExpire = options.onExpire;
    this.logger = options.logger;
  }

  set(params: SetUserStateParams): void {
    const existing = this.getEntry(params.user);
    const entry: UserStateEntry = existing ?? {
      state: undefined,
      data: {},
      additional: {},
      expiresAt: 0,
    };
    entry.state = params.state;
    Object.assign(entry.data, params.data ?? {});
    Object.assign(entry.additional, params.additional ?? {});
    entry.expiresAt = this.now() + (params.ttlMs ?? this.sessionTtlMs);
    this.entries.set(params.user, entry);
  }

  getEntry(user: string): UserStateEntry | undefined {
    const entry = this.entries.get(user);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(user);
      return undefined;
    }
    return entry;
  }

  getState(user: string): string | undefined {
    return this.getEntry(user)?.state;
  }

  getData(user: string): Record<string, unknown> | undefined {
    return this.getEntry(user)?.data;
  }

  /** Returns false when the user has no live session. */
  updateState(user: string, state: string): boolean {
    const entry = this.getEntry(user);
    if (!entry) return false;
    entry.state = state;
    this.touch(entry);
    return true;
  }

  updateData(user: string, data: Record<string, unknown>): boolean {
    const entry = this.getEntry(user);
    if (!entry) return false;
    Object.assign(entry.data, data);
    this.touch(entry);
    return true;
  }

  delete(user: string): boolean {
    return this.entries.delete(user);
  }

  size(): number {
    return this.entries.size;
  }

  /**
   * Removes every expired entry and runs `onExpire` for each.
   * Returns the expired user keys.
   */
  async sweep(): Promise<string[]> {
    const now = this.now();
    const expired: Array<[string, UserStateEntry]> = [];
    for (const [user, entry] of this.entries) {
      if (entry.expiresAt <= now) expired.push([user, entry]);
    }

    for (const [user, entry] of expired) {
      this.entries.delete(user);
      this.logger?.info("User session expired", { user });
      if (!this.onExpire) continue;
      try {
        await this.onExpire(user, entry);
      } catch (error) {
        this.logger?.warn("onExpire callback failed", {
          user,
          error: describeError(error),
        });
      }
    }

    return expired.map(([user]) => user);
  }

  startSweeper(intervalMs: number = 60_000): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      void this.sweep();
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeper(): void {
    if (!this.sweepTimer) return;
    clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }

  private touch(entry: UserStateEntry): void {
    entry.expiresAt = this.now() + this.sessionTtlMs;
  }
}
