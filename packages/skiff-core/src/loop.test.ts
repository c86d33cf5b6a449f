import { describe, expect, it } from "vitest";

import { ConnectionLoop } from "./loop.ts";
import { settle } from "./test-support.ts";

describe("ConnectionLoop", () => {
  it("runs a task inline when idle", () => {
    const loop = new ConnectionLoop(() => {});
    const order: string[] = [];
    loop.run(() => order.push("a"));
    expect(order).toEqual(["a"]);
  });

  it("queues re-entrant work behind the running task", () => {
    const loop = new ConnectionLoop(() => {});
    const order: string[] = [];
    loop.run(() => {
      order.push("outer:start");
      loop.run(() => order.push("inner"));
      order.push("outer:end");
    });
    expect(order).toEqual(["outer:start", "outer:end", "inner"]);
  });

  it("drains executed tasks on a microtask, in order", async () => {
    const loop = new ConnectionLoop(() => {});
    const order: number[] = [];
    loop.execute(() => order.push(1));
    loop.execute(() => order.push(2));
    expect(order).toEqual([]);
    expect(loop.pending).toBe(2);

    await settle();
    expect(order).toEqual([1, 2]);
    expect(loop.pending).toBe(0);
  });

  it("reports whether a task is running", () => {
    const loop = new ConnectionLoop(() => {});
    let inside = false;
    loop.run(() => {
      inside = loop.inLoop;
    });
    expect(inside).toBe(true);
    expect(loop.inLoop).toBe(false);
  });

  it("routes task failures to the error handler and keeps draining", async () => {
    const errors: unknown[] = [];
    const loop = new ConnectionLoop((error) => errors.push(error));
    const ran: string[] = [];
    const boom = new Error("boom");

    loop.execute(() => {
      throw boom;
    });
    loop.execute(() => ran.push("after"));
    await settle();

    expect(errors).toEqual([boom]);
    expect(ran).toEqual(["after"]);
  });
});
