import { describe, expect, it } from "vitest";
import { NO_AUTH_STATE, RequestContextPropagator } from "../src/auth/context.js";
import type { ClaimSet, RuntimeAuthState } from "../src/auth/types.js";
import { LakegateError } from "../src/lakegate/errors.js";

function tokenState(subject: string, resources: string[] = []): RuntimeAuthState {
  const claims: ClaimSet = {
    subject,
    expiresAt: 2_000_000_000,
    audience: [],
    scope: "",
    level: "read",
    permissions: ["s3:GetObject"],
    resources,
    roles: []
  };
  return { scheme: "token", claims, extras: {} };
}

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

describe("RequestContextPropagator", () => {
  it("reports no identity outside a frame", () => {
    const context = new RequestContextPropagator();
    expect(context.current()).toBe(NO_AUTH_STATE);
    expect(context.depth()).toBe(0);
  });

  it("installs the state for the duration of run", async () => {
    const context = new RequestContextPropagator();
    const seen = await context.run(tokenState("alice"), async () => {
      await sleep(1);
      return context.current().claims?.subject;
    });
    expect(seen).toBe("alice");
    expect(context.current().scheme).toBe("none");
  });

  it("restores the outer state after a nested run", async () => {
    const context = new RequestContextPropagator();
    await context.run(tokenState("outer"), async () => {
      await context.run(tokenState("inner"), async () => {
        expect(context.current().claims?.subject).toBe("inner");
        expect(context.depth()).toBe(2);
      });
      expect(context.current().claims?.subject).toBe("outer");
      expect(context.depth()).toBe(1);
    });
  });

  it("pops the state when the handler throws", async () => {
    const context = new RequestContextPropagator();
    let depthAfterInner = -1;
    await context.run(tokenState("outer"), async () => {
      await expect(context.run(tokenState("inner"), async () => {
        throw new Error("handler failed");
      })).rejects.toThrow("handler failed");
      depthAfterInner = context.depth();
    });
    expect(depthAfterInner).toBe(1);
  });

  it("rejects out-of-order pops", async () => {
    const context = new RequestContextPropagator();
    await context.run(tokenState("alice"), async () => {
      const first = context.push(tokenState("bob"));
      const second = context.push(tokenState("carol"));
      expect(() => context.pop(first)).toThrow("Auth context popped out of order");
      context.pop(second);
      context.pop(first);
      expect(context.current().claims?.subject).toBe("alice");
    });
  });

  it("refuses push and pop outside a frame", () => {
    const context = new RequestContextPropagator();
    expect(() => context.push(tokenState("alice"))).toThrow(LakegateError);
    expect(() => context.pop({ id: 1 })).toThrow("Cannot pop auth context outside a request frame");
  });

  it("installs a frozen copy of the state", async () => {
    const context = new RequestContextPropagator();
    const state = tokenState("alice", ["team-a"]);
    await context.run(state, async () => {
      state.claims?.resources.push("team-b");
      const installed = context.current();
      expect(installed.claims?.resources).toEqual(["team-a"]);
      expect(Object.isFrozen(installed.claims)).toBe(true);
    });
  });

  it("isolates interleaved requests", async () => {
    const context = new RequestContextPropagator();
    const subjects = Array.from({ length: 40 }, (_, i) => `user-${i}`);

    const observed = await Promise.all(subjects.map((subject, i) =>
      context.run(tokenState(subject, [`bucket-${i}`]), async () => {
        const seen: string[] = [];
        for (let step = 0; step < 3; step++) {
          await sleep((i * 7 + step * 3) % 5);
          seen.push(`${context.current().claims?.subject}:${context.current().claims?.resources.join(",")}`);
        }
        return seen;
      })
    ));

    observed.forEach((seen, i) => {
      expect(seen).toEqual([
        `user-${i}:bucket-${i}`,
        `user-${i}:bucket-${i}`,
        `user-${i}:bucket-${i}`
      ]);
    });
    expect(context.depth()).toBe(0);
  });
});
