import { AsyncLocalStorage } from "node:async_hooks";
import { LakegateError } from "../lakegate/errors.js";
import { deepFreeze } from "../lakegate/utils/freeze.js";
import type { RuntimeAuthState } from "./types.js";

/**
 * Per-request auth state.
 *
 * Each request runs in its own AsyncLocalStorage frame holding a stack of
 * states. Nothing is stored outside a frame, so a concurrent request can
 * never observe another's identity.
 */

export type ContextToken = { readonly id: number };

type Entry = { token: ContextToken; state: RuntimeAuthState };

type Frame = { stack: Entry[] };

export const NO_AUTH_STATE: RuntimeAuthState = deepFreeze<RuntimeAuthState>({ scheme: "none", extras: {} });

let nextTokenId = 1;

export class RequestContextPropagator {
  private readonly storage = new AsyncLocalStorage<Frame>();

  /**
   * Run `fn` in a fresh frame with `state` installed. The frame starts as a
   * copy of the caller's stack, and the state is popped on every exit path.
   */
  async run<T>(state: RuntimeAuthState, fn: () => Promise<T> | T): Promise<T> {
    const parent = this.storage.getStore();
    const frame: Frame = { stack: parent ? [...parent.stack] : [] };
    return this.storage.run(frame, async () => {
      const token = this.push(state);
      try {
        return await fn();
      } finally {
        this.pop(token);
      }
    });
  }

  /**
   * Install `state` on top of the current frame. The state is copied and frozen.
   */
  push(state: RuntimeAuthState): ContextToken {
    const frame = this.requireFrame("push");
    const token: ContextToken = Object.freeze({ id: nextTokenId++ });
    frame.stack.push({ token, state: deepFreeze(structuredClone(state)) });
    return token;
  }

  /**
   * Remove the state installed with `token`; it must be on top.
   */
  pop(token: ContextToken): void {
    const frame = this.requireFrame("pop");
    const top = frame.stack[frame.stack.length - 1];
    if (!top || top.token !== token) {
      throw new LakegateError("INTERNAL", "Auth context popped out of order", { tokenId: token.id });
    }
    frame.stack.pop();
  }

  current(): RuntimeAuthState {
    const stack = this.storage.getStore()?.stack;
    const top = stack?.[stack.length - 1];
    return top?.state ?? NO_AUTH_STATE;
  }

  /** Number of states installed in the current frame */
  depth(): number {
    return this.storage.getStore()?.stack.length ?? 0;
  }

  private requireFrame(op: string): Frame {
    const frame = this.storage.getStore();
    if (!frame) {
      throw new LakegateError("INTERNAL", `Cannot ${op} auth context outside a request frame`);
    }
    return frame;
  }
}
