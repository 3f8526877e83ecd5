import { describeError } from "../errors.js";
import type { Logger } from "../telemetry/index.js";
import type { DispatchContext } from "../types/dispatcher.js";

/**
 * Per-dispatch dependency providers.
 *
 * 关键点（中文）
 * - 依赖是懒加载的：handler / middleware 第一次 `ctx.use(dep)` 时才调用 factory
 * - 同一次 dispatch 内多次 use 同一个依赖只解析一次
 * - dispatch 结束（handler 返回或中断）后按解析的逆序执行 dispose
 */

export type DependencyFactory<T> = (ctx: DispatchContext) => T | Promise<T>;

export type DependencyOptions<T> = {
  dispose?: (value: T) => void | Promise<void>;
};

export class Dependency<T> {
  readonly name: string;
  private readonly factory: DependencyFactory<T>;
  private readonly dispose?: (value: T) => void | Promise<void>;
  private readonly resolved: WeakMap<DependencyScope, Promise<T>> = new WeakMap();

  constructor(
    name: string,
    factory: DependencyFactory<T>,
    options: DependencyOptions<T> = {},
  ) {
    this.name = name;
    this.factory = factory;
    this.dispose = options.dispose;
  }

  resolveIn(scope: DependencyScope, ctx: DispatchContext): Promise<T> {
    const cached = this.resolved.get(scope);
    if (cached) return cached;

    const pending = (async () => {
      const value = await this.factory(ctx);
      const dispose = this.dispose;
      if (dispose) await scope.onDispose(this.name, () => dispose(value));
      return value;
    })();
    this.resolved.set(scope, pending);
    return pending;
  }
}

export function defineDependency<T>(
  name: string,
  factory: DependencyFactory<T>,
  options?: DependencyOptions<T>,
): Dependency<T> {
  return new Dependency(name, factory, options);
}

type Disposer = { name: string; run: () => void | Promise<void> };

export class DependencyScope {
  private readonly disposers: Disposer[] = [];
  private disposed = false;

  constructor(private readonly logger: Pick<Logger, "warn">) {}

  /** A disposer registered after `dispose()` (a factory that settled late) runs right away. */
  async onDispose(name: string, run: () => void | Promise<void>): Promise<void> {
    if (this.disposed) {
      await this.runDisposer({ name, run });
      return;
    }
    this.disposers.push({ name, run });
  }

  /** Runs disposers in reverse resolution order. Failures are logged, not thrown. */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    for (const disposer of [...this.disposers].reverse()) {
      await this.runDisposer(disposer);
    }
  }

  private async runDisposer(disposer: Disposer): Promise<void> {
    try {
      await disposer.run();
    } catch (error) {
      this.logger.warn("Dependency dispose failed", {
        dependency: disposer.name,
        error: describeError(error),
      });
    }
  }
}
