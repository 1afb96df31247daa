import { describe, it, expect } from "vitest";
import { enforce, evaluateWrite, testFirstReason, type EnforcementContext } from "../src/enforcer.js";
import { MemorySessionStore, type SessionState, type SessionStore } from "../src/sessionStore.js";

function makeContext(store: SessionStore = new MemorySessionStore()): EnforcementContext {
  return { store, cwd: "/repo" };
}

async function recorded(ctx: EnforcementContext): Promise<string[]> {
  const state = await ctx.store.load();
  return [...state.testFilesModified];
}

class BrokenStore implements SessionStore {
  constructor(private readonly failOn: "load" | "recordTest") {}

  async load(): Promise<SessionState> {
    if (this.failOn === "load") throw new Error("disk on fire");
    return { testFilesModified: new Set(), sessionId: null, startedAt: null };
  }

  async recordTest(): Promise<void> {
    throw new Error("read-only filesystem");
  }

  async reset(): Promise<void> {}
}

describe("evaluateWrite", () => {
  it("allows the implementation after its sibling test was written", async () => {
    const ctx = makeContext();
    const first = await evaluateWrite("src/utils/math.test.ts", ctx);
    expect(first).toEqual({ role: "TEST", decision: { decision: "allow" }, matchedTest: "/repo/src/utils/math.test.ts" });

    const second = await evaluateWrite("src/utils/math.ts", ctx);
    expect(second).toEqual({
      role: "IMPLEMENTATION",
      decision: { decision: "allow" },
      matchedTest: "/repo/src/utils/math.test.ts",
    });
  });

  it("blocks an implementation on a fresh session and suggests the sibling test", async () => {
    const out = await evaluateWrite("src/utils/math.ts", makeContext());
    expect(out.role).toBe("IMPLEMENTATION");
    expect(out.decision).toEqual({ decision: "block", reason: testFirstReason("src/utils/math.test.ts") });
    expect(out.decision.reason).toContain("Suggested test file: src/utils/math.test.ts");
  });

  it("matches a differently-cased test file name", async () => {
    const ctx = makeContext();
    await evaluateWrite("src/foo/bar.spec.tsx", ctx);
    const out = await evaluateWrite("src/foo/Bar.tsx", ctx);
    expect(out.decision.decision).toBe("allow");
    expect(out.matchedTest).toBe("/repo/src/foo/bar.spec.tsx");
  });

  it("allows configuration and non-source files without touching the store", async () => {
    const ctx = makeContext();
    for (const p of ["tsconfig.json", "vite.config.ts", "README.md", "src/types/env.d.ts"]) {
      const out = await evaluateWrite(p, ctx);
      expect(out.decision).toEqual({ decision: "allow" });
      expect(out.matchedTest).toBeNull();
    }
    expect(await recorded(ctx)).toEqual([]);
  });

  it("records the same test only once", async () => {
    const ctx = makeContext();
    for (let i = 0; i < 3; i++) await evaluateWrite("src/a.test.ts", ctx);
    await evaluateWrite("/repo/src/a.test.ts", ctx);
    expect(await recorded(ctx)).toEqual(["/repo/src/a.test.ts"]);
  });

  it("keeps allowing a matched implementation across unrelated writes", async () => {
    const ctx = makeContext();
    await evaluateWrite("src/cart.test.ts", ctx);
    await evaluateWrite("README.md", ctx);
    expect((await evaluateWrite("src/checkout.ts", ctx)).decision.decision).toBe("block");
    await evaluateWrite("src/other.spec.ts", ctx);
    expect((await evaluateWrite("src/cart.ts", ctx)).decision.decision).toBe("allow");
  });

  it("blocks again after the session is reset", async () => {
    const ctx = makeContext();
    await evaluateWrite("src/cart.test.ts", ctx);
    expect((await evaluateWrite("src/cart.ts", ctx)).decision.decision).toBe("allow");

    await ctx.store.reset();
    expect((await evaluateWrite("src/cart.ts", ctx)).decision.decision).toBe("block");
  });

  it("resolves relative requests against the working directory", async () => {
    const ctx = makeContext(new MemorySessionStore(["/repo/src/api/client.test.ts"]));
    expect((await evaluateWrite("src/api/client.ts", ctx)).decision.decision).toBe("allow");
    expect((await evaluateWrite("/repo/src/api/client.ts", ctx)).decision.decision).toBe("allow");
  });

  it("accepts a test from a __tests__ directory", async () => {
    const ctx = makeContext();
    await evaluateWrite("src/api/__tests__/client.ts", ctx);
    expect((await evaluateWrite("src/api/client.ts", ctx)).decision.decision).toBe("allow");
  });

  it("still allows a test write the store failed to record", async () => {
    const out = await evaluateWrite("src/a.test.ts", makeContext(new BrokenStore("recordTest")));
    expect(out.decision).toEqual({ decision: "allow" });
  });
});

describe("enforce", () => {
  it("maps an internal failure to allow", async () => {
    const out = await enforce("src/a.ts", makeContext(new BrokenStore("load")));
    expect(out).toEqual({ role: null, decision: { decision: "allow" }, matchedTest: null });
  });

  it("passes a confident block through unchanged", async () => {
    const out = await enforce("src/a.ts", makeContext());
    expect(out.decision.decision).toBe("block");
  });
});
