import { MemoryTaskQueue } from "../src/queue/memoryTaskQueue";
import { Delivery } from "../src/queue/taskQueue";

describe("Memory Task Queue Suite", () => {
  let queue: MemoryTaskQueue;

  beforeEach(() => {
    queue = new MemoryTaskQueue();
  });

  afterEach(async () => {
    await queue.close();
  });

  it("should keep messages until a consumer arrives", async () => {
    await queue.publish("jobs", "one", { correlationId: "c1" });

    expect(queue.peek("jobs")).toEqual([{ queue: "jobs", body: "one", correlationId: "c1", headers: { attempts: 0 } }]);
  });

  it("should deliver in publish order, one at a time with prefetch 1", async () => {
    const seen: string[] = [];
    let active = 0;
    let maxActive = 0;
    await queue.consume("jobs", { prefetch: 1 }, async (delivery: Delivery) => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await new Promise(resolve => setImmediate(resolve));
      seen.push(delivery.body);
      active -= 1;
    });

    for (const body of ["a", "b", "c"]) {
      await queue.publish("jobs", body, { correlationId: body });
    }
    await queue.drain();

    expect(seen).toEqual(["a", "b", "c"]);
    expect(maxActive).toBe(1);
  });

  it("should redeliver a message whose handler rejects", async () => {
    const handler = jest.fn()
      .mockRejectedValueOnce(new Error("consumer crashed"))
      .mockResolvedValueOnce(undefined);
    await queue.consume("jobs", { prefetch: 1 }, handler);

    await queue.publish("jobs", "retry-me", { correlationId: "r1", headers: { attempts: 2 } });
    await queue.drain();

    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler.mock.calls[1][0]).toMatchObject({ body: "retry-me", headers: { attempts: 2 } });
  });

  it("should hold a delayed message until its delay has passed", async () => {
    await queue.publish("later", "x", { correlationId: "d1", delayMs: 30 });
    expect(queue.peek("later")).toHaveLength(0);

    await new Promise(resolve => setTimeout(resolve, 60));
    expect(queue.peek("later")).toHaveLength(1);
  });

  it("should refuse to publish after close", async () => {
    await queue.close();

    await expect(queue.publish("jobs", "late", { correlationId: "z" })).rejects.toThrow("Queue \"jobs\" is closed");
  });
});
