import { MemoryLedgerStore } from "../src/dao/memoryLedgerStore";
import { TranslationTaskBridge } from "../src/queue/translationTaskBridge";
import { MemoryTaskQueue } from "../src/queue/memoryTaskQueue";
import { TaskQueue } from "../src/queue/taskQueue";
import { ErrorStatus } from "../src/factory/status";
import { seedUser } from "./helpers";

const settings = { taskQueue: "translation_tasks", publishRetries: 3, publishRetryDelayMs: 0 };

// Queue whose publish fails a given number of times before succeeding.
function flakyQueue(failures: number): TaskQueue & { publish: jest.Mock } {
  const publish = jest.fn();
  for (let i = 0; i < failures; i++) {
    publish.mockRejectedValueOnce(new Error("broker unavailable"));
  }
  publish.mockResolvedValue(undefined);
  return {
    publish,
    consume: jest.fn(),
    close: jest.fn()
  };
}

describe("Translation Task Bridge Suite", () => {
  const payload = { userId: "u1", inputText: "hello", sourceLang: "en", targetLang: "fr" };

  it("should publish the task id as correlation id and inside the body", async () => {
    const queue = new MemoryTaskQueue();
    const bridge = new TranslationTaskBridge(queue, new MemoryLedgerStore(), settings);

    const taskId = await bridge.publish({ ...payload, taskId: "T1" });

    expect(taskId).toBe("T1");
    const [message] = queue.peek("translation_tasks");
    expect(message).toMatchObject({ correlationId: "T1", headers: { attempts: 0 } });
    expect(JSON.parse(message.body)).toEqual({ ...payload, taskId: "T1" });
  });

  it("should generate a task id when none is given", async () => {
    const queue = new MemoryTaskQueue();
    const bridge = new TranslationTaskBridge(queue, new MemoryLedgerStore(), settings);

    const taskId = await bridge.publish(payload);

    expect(taskId).toMatch(/^[0-9a-f-]{36}$/);
    expect(queue.peek("translation_tasks")[0].correlationId).toBe(taskId);
  });

  it("should retry a failed publish", async () => {
    const queue = flakyQueue(2);
    const bridge = new TranslationTaskBridge(queue, new MemoryLedgerStore(), settings);

    await expect(bridge.publish({ ...payload, taskId: "T2" })).resolves.toBe("T2");
    expect(queue.publish).toHaveBeenCalledTimes(3);
  });

  it("should give up after the configured attempts", async () => {
    const queue = flakyQueue(3);
    const bridge = new TranslationTaskBridge(queue, new MemoryLedgerStore(), settings);

    await expect(bridge.publish({ ...payload, taskId: "T3" })).rejects.toMatchObject({
      errorType: ErrorStatus.taskPublishFailedError,
      message: "Failed to publish task T3 after 3 attempts",
      status: 503
    });
    expect(queue.publish).toHaveBeenCalledTimes(3);
  });

  it("should report a task as done once its translation is recorded", async () => {
    const store = new MemoryLedgerStore();
    const bridge = new TranslationTaskBridge(new MemoryTaskQueue(), store, settings);
    const owner = await seedUser(store, "owner@x.com");
    const other = await seedUser(store, "other@x.com");

    await expect(bridge.getStatus("T4", owner.id)).resolves.toEqual({ taskId: "T4", status: "pending" });

    await store.transaction(session => session.appendTranslation({
      userId: owner.id,
      externalId: "T4",
      inputText: "hello",
      outputText: "bonjour",
      sourceLang: "en",
      targetLang: "fr",
      cost: 1
    }));

    await expect(bridge.getStatus("T4", owner.id)).resolves.toEqual({ taskId: "T4", status: "done", outputText: "bonjour", cost: 1 });
    await expect(bridge.getStatus("T4", other.id)).resolves.toEqual({ taskId: "T4", status: "pending" });
  });

  it("should name the dead-letter queue after the task queue", () => {
    const bridge = new TranslationTaskBridge(new MemoryTaskQueue(), new MemoryLedgerStore(), settings);

    expect(bridge.deadLetterQueue).toBe("translation_tasks.failed");
  });
});
