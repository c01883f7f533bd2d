import { describe, expect, it } from "vitest";
import { TaskQueue } from "../workers/task-queue";

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

describe("TaskQueue", () => {
  it("hands out items in the order they were put", async () => {
    const queue = new TaskQueue<string>(3);
    await queue.put("a");
    await queue.put("b");
    await queue.put("c");

    expect(await queue.take()).toBe("a");
    expect(await queue.take()).toBe("b");
    expect(await queue.take()).toBe("c");
  });

  it("blocks the producer while the queue is full", async () => {
    const queue = new TaskQueue<string>(1);
    await queue.put("a");

    let secondPutDone = false;
    const pending = queue.put("b").then(() => {
      secondPutDone = true;
    });

    await tick();
    expect(secondPutDone).toBe(false);

    expect(await queue.take()).toBe("a");
    await pending;
    expect(secondPutDone).toBe(true);
    expect(await queue.take()).toBe("b");
  });

  it("wakes a waiting consumer when an item arrives", async () => {
    const queue = new TaskQueue<number>();
    const taken = queue.take();

    await queue.put(42);

    expect(await taken).toBe(42);
  });

  it("drains queued items before reporting closure", async () => {
    const queue = new TaskQueue<string>(2);
    await queue.put("a");
    await queue.put("b");
    queue.close();

    expect(await queue.take()).toBe("a");
    expect(await queue.take()).toBe("b");
    expect(await queue.take()).toBeNull();
  });

  it("releases every waiting consumer on close", async () => {
    const queue = new TaskQueue<string>();
    const first = queue.take();
    const second = queue.take();

    queue.close();

    expect(await first).toBeNull();
    expect(await second).toBeNull();
  });

  it("rejects puts after close", async () => {
    const queue = new TaskQueue<string>();
    queue.close();

    await expect(queue.put("late")).rejects.toThrow(
      "Cannot put into a closed queue",
    );
  });

  it("tracks enqueued and dequeued counts", async () => {
    const queue = new TaskQueue<string>(2);
    await queue.put("a");
    await queue.put("b");
    await queue.take();
    queue.close();

    expect(queue.getProgress()).toEqual({
      enqueued: 2,
      dequeued: 1,
      pending: 1,
      closed: true,
    });
  });
});
