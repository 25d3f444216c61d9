import { describe, it, expect } from "vitest";
import { SerialQueue } from "../../src/core/queue.js";

describe("SerialQueue", () => {
  it("runs jobs one at a time in submission order", async () => {
    const queue = new SerialQueue();
    const events: string[] = [];

    const slow = queue.run(async () => {
      events.push("slow:start");
      await new Promise((resolve) => setTimeout(resolve, 20));
      events.push("slow:end");
      return 1;
    });
    const fast = queue.run(() => {
      events.push("fast");
      return 2;
    });

    expect(queue.size).toBe(2);
    expect(await Promise.all([slow, fast])).toEqual([1, 2]);
    expect(events).toEqual(["slow:start", "slow:end", "fast"]);
    expect(queue.size).toBe(0);
  });

  it("keeps going after a failed job", async () => {
    const queue = new SerialQueue();
    const failed = queue.run(() => {
      throw new Error("boom");
    });
    const next = queue.run(() => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });
});
