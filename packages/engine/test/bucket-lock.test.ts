import { describe, expect, it } from "vitest";
import { BucketLock } from "../src/engine";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe("BucketLock", () => {
  it("runs tasks for one key in call order", async () => {
    const lock = new BucketLock();
    const order: string[] = [];

    await Promise.all([
      lock.run("common", async () => {
        await tick();
        order.push("first");
      }),
      lock.run("common", async () => {
        order.push("second");
      })
    ]);

    expect(order).toEqual(["first", "second"]);
    await tick();
    expect(lock.isLocked("common")).toBe(false);
  });

  it("keeps the chain going after a failed task", async () => {
    const lock = new BucketLock();

    const failed = lock.run("seasons", async () => {
      throw new Error("task failed");
    });
    const next = lock.run("seasons", async () => "ran");

    await expect(failed).rejects.toThrow("task failed");
    await expect(next).resolves.toBe("ran");
  });

  it("does not serialize different keys", async () => {
    const lock = new BucketLock();
    const order: string[] = [];

    await Promise.all([
      lock.run("common", async () => {
        await tick();
        order.push("common");
      }),
      lock.run("seasons", async () => {
        order.push("seasons");
      })
    ]);

    expect(order).toEqual(["seasons", "common"]);
  });
});
