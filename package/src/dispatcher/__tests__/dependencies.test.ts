import { describe, expect, it } from "vitest";

import { DependencyScope, defineDependency } from "../dependencies.js";
import { deferred, fakeContext, silentLogger } from "../../__tests__/fixtures.js";

describe("Dependency", () => {
  it("resolves lazily and once per scope", async () => {
    let calls = 0;
    const session = defineDependency("session", async () => {
      calls += 1;
      return { id: calls };
    });
    const scope = new DependencyScope(silentLogger());
    const ctx = fakeContext();

    expect(calls).toBe(0);
    const [first, second] = await Promise.all([
      session.resolveIn(scope, ctx),
      session.resolveIn(scope, ctx),
    ]);
    expect(first).toBe(second);
    expect(calls).toBe(1);

    const other = await session.resolveIn(new DependencyScope(silentLogger()), ctx);
    expect(other).toEqual({ id: 2 });
  });

  it("lets factories use other dependencies through the context", async () => {
    const base = defineDependency("base", () => 20);
    const derived = defineDependency("derived", async (ctx) => (await ctx.use(base)) + 1);
    const ctx = fakeContext();

    expect(await ctx.use(derived)).toBe(21);
  });

  it("disposes in reverse resolution order and only once", async () => {
    const log: string[] = [];
    const first = defineDependency("first", () => "a", {
      dispose: (value) => void log.push(`dispose:${value}`),
    });
    const second = defineDependency("second", () => "b", {
      dispose: async (value) => void log.push(`dispose:${value}`),
    });
    const scope = new DependencyScope(silentLogger());
    const ctx = fakeContext();

    await first.resolveIn(scope, ctx);
    await second.resolveIn(scope, ctx);
    await scope.dispose();
    await scope.dispose();

    expect(log).toEqual(["dispose:b", "dispose:a"]);
  });

  it("logs dispose failures and keeps disposing", async () => {
    const logger = silentLogger();
    const log: string[] = [];
    const broken = defineDependency("broken", () => 1, {
      dispose: () => {
        throw new Error("close failed");
      },
    });
    const fine = defineDependency("fine", () => 2, {
      dispose: () => void log.push("fine"),
    });
    const scope = new DependencyScope(logger);
    const ctx = fakeContext();

    await fine.resolveIn(scope, ctx);
    await broken.resolveIn(scope, ctx);
    await scope.dispose();

    expect(log).toEqual(["fine"]);
    const warnings = logger.getLogsByType("warn");
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.message).toBe("Dependency dispose failed");
    expect(warnings[0]?.details).toEqual({ dependency: "broken", error: "close failed" });
  });

  it("disposes a value whose factory settles after the scope was disposed", async () => {
    const gate = deferred();
    const log: string[] = [];
    const slow = defineDependency(
      "slow",
      async () => {
        await gate.promise;
        return "late";
      },
      { dispose: (value) => void log.push(`dispose:${value}`) },
    );
    const scope = new DependencyScope(silentLogger());

    const pending = slow.resolveIn(scope, fakeContext());
    await scope.dispose();
    expect(log).toEqual([]);

    gate.resolve();
    expect(await pending).toBe("late");
    expect(log).toEqual(["dispose:late"]);
  });
});
