import assert from "assert";
import { describe, it } from "node:test";
import { KeyedQueue } from "../core/keyedQueue";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("KeyedQueue", () => {
  it("runs tasks under one key in arrival order", async () => {
    const queue = new KeyedQueue();
    const order: string[] = [];
    const slow = queue.run("s1", async () => {
      await delay(20);
      order.push("slow");
      return 1;
    });
    const fast = queue.run("s1", async () => {
      order.push("fast");
      return 2;
    });
    assert.deepEqual(await Promise.all([slow, fast]), [1, 2]);
    assert.deepEqual(order, ["slow", "fast"]);
  });

  it("does not hold back other keys", async () => {
    const queue = new KeyedQueue();
    const order: string[] = [];
    const slow = queue.run("s1", async () => {
      await delay(20);
      order.push("s1");
    });
    const other = queue.run("s2", async () => {
      order.push("s2");
    });
    await Promise.all([slow, other]);
    assert.deepEqual(order, ["s2", "s1"]);
  });

  it("runs the next task after a failure and forgets settled keys", async () => {
    const queue = new KeyedQueue();
    const failed = queue.run("s1", async () => {
      throw new Error("boom");
    });
    const next = queue.run("s1", async () => "ok");
    await assert.rejects(failed, /boom/);
    assert.equal(await next, "ok");
    await delay(0);
    assert.equal(queue.pending(), 0);
  });
});
