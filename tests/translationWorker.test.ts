import { MemoryTaskQueue } from "../src/queue/memoryTaskQueue";
import { TranslationTaskBridge } from "../src/queue/translationTaskBridge";
import { TranslationWorker } from "../src/workers/translationWorker";
import { ErrorManager } from "../src/factory/errorManager";
import { ErrorStatus } from "../src/factory/status";
import { DictionaryTranslator, Translator } from "../src/services/translator";
import { buildLedger, seedUser, Ledger } from "./helpers";

const QUEUE = "translation_tasks";
const DEAD_LETTERS = "translation_tasks.failed";
const workerSettings = { taskQueue: QUEUE, maxAttempts: 3, retryDelayMs: 0, prefetch: 1 };

describe("Translation Worker Suite", () => {
  let queue: MemoryTaskQueue;
  let ledger: Ledger;
  let bridge: TranslationTaskBridge;
  let worker: TranslationWorker;

  const setup = (translator: Translator = new DictionaryTranslator()): void => {
    queue = new MemoryTaskQueue();
    ledger = buildLedger(translator);
    bridge = new TranslationTaskBridge(queue, ledger.store, { taskQueue: QUEUE, publishRetries: 1, publishRetryDelayMs: 0 });
    worker = new TranslationWorker(queue, ledger.processor, workerSettings);
  };

  beforeEach(() => {
    setup();
  });

  afterEach(async () => {
    await worker.stop();
    await queue.close();
  });

  it("should translate and debit a queued task", async () => {
    const user = await seedUser(ledger.store, "q@x.com");
    await ledger.creditService.topUp(user.id, 2);
    await worker.start();

    const taskId = await bridge.publish({ userId: user.id, inputText: "hello", sourceLang: "en", targetLang: "fr" });
    await queue.drain();

    await expect(bridge.getStatus(taskId, user.id)).resolves.toEqual({ taskId, status: "done", outputText: "bonjour", cost: 1 });
    expect(await ledger.walletService.getBalance(user.id)).toBe(1);
  });

  it("should charge a task published twice only once", async () => {
    const user = await seedUser(ledger.store, "t1@x.com");
    await ledger.creditService.topUp(user.id, 5);
    await worker.start();

    const task = { taskId: "T1", userId: user.id, inputText: "hello", sourceLang: "en", targetLang: "fr" };
    await bridge.publish(task);
    await bridge.publish(task);
    await queue.drain();

    const translations = ledger.store.committedTranslations();
    expect(translations).toHaveLength(1);
    expect(translations[0].externalId).toBe("T1");
    expect(await ledger.walletService.getBalance(user.id)).toBe(4);
    expect(queue.peek(DEAD_LETTERS)).toHaveLength(0);
  });

  it("should dead-letter a business error without retrying", async () => {
    const user = await seedUser(ledger.store, "broke@x.com");

    const result = await worker.handleDelivery({
      queue: QUEUE,
      body: JSON.stringify({ userId: user.id, inputText: "hello", sourceLang: "en", targetLang: "fr" }),
      correlationId: "B1",
      headers: { attempts: 0 }
    });

    expect(result).toBe("dead-lettered");
    expect(queue.peek(QUEUE)).toHaveLength(0);
    expect(queue.peek(DEAD_LETTERS)).toEqual([expect.objectContaining({
      correlationId: "B1",
      headers: { attempts: 0, failed: true, reason: "Insufficient credits. Required: 1, current balance: 0" }
    })]);
  });

  it("should retry a transient error and dead-letter it at the attempt cap", async () => {
    const timeout = ErrorManager.getInstance().createError(ErrorStatus.translationTimeoutError);
    const translate = jest.fn().mockRejectedValue(timeout);
    setup({ translate });
    const user = await seedUser(ledger.store, "flaky@x.com");
    await ledger.creditService.topUp(user.id, 1);
    await worker.start();

    await bridge.publish({ taskId: "R1", userId: user.id, inputText: "hello", sourceLang: "en", targetLang: "fr" });
    await queue.drain();

    expect(translate).toHaveBeenCalledTimes(3);
    expect(queue.peek(DEAD_LETTERS)).toEqual([expect.objectContaining({
      correlationId: "R1",
      headers: { attempts: 3, failed: true, reason: "Translation timed out." }
    })]);
    expect(await ledger.walletService.getBalance(user.id)).toBe(1);
  });

  it("should republish a retryable failure with a bumped attempt counter", async () => {
    setup({ translate: jest.fn().mockRejectedValue(ErrorManager.getInstance().createError(ErrorStatus.translationTimeoutError)) });
    const user = await seedUser(ledger.store, "bump@x.com");
    await ledger.creditService.topUp(user.id, 1);

    const result = await worker.handleDelivery({
      queue: QUEUE,
      body: JSON.stringify({ userId: user.id, inputText: "hello", sourceLang: "en", targetLang: "fr" }),
      correlationId: "R2",
      headers: { attempts: 1 }
    });

    expect(result).toBe("retried");
    expect(queue.peek(QUEUE)).toEqual([expect.objectContaining({ correlationId: "R2", headers: { attempts: 2 } })]);
  });

  it("should dead-letter malformed JSON", async () => {
    const result = await worker.handleDelivery({ queue: QUEUE, body: "{not json", correlationId: "M1", headers: { attempts: 0 } });

    expect(result).toBe("dead-lettered");
    expect(queue.peek(DEAD_LETTERS)).toEqual([{
      queue: DEAD_LETTERS,
      body: "{not json",
      correlationId: "M1",
      headers: { attempts: 0, failed: true, reason: "malformed" }
    }]);
  });

  it("should dead-letter a payload without a user", async () => {
    const result = await worker.handleDelivery({
      queue: QUEUE,
      body: JSON.stringify({ inputText: "hello", sourceLang: "en", targetLang: "fr" }),
      correlationId: "P1",
      headers: { attempts: 0 }
    });

    expect(result).toBe("dead-lettered");
    expect(queue.peek(DEAD_LETTERS)[0].headers).toEqual({ attempts: 0, failed: true, reason: "userId is required" });
  });

  it("should take the task id from the body when the message has no correlation id", async () => {
    const user = await seedUser(ledger.store, "body@x.com");
    await ledger.creditService.topUp(user.id, 1);

    const result = await worker.handleDelivery({
      queue: QUEUE,
      body: JSON.stringify({ taskId: "FROM-BODY", userId: user.id, inputText: "cat", sourceLang: "en", targetLang: "fr" }),
      headers: { attempts: 0 }
    });

    expect(result).toBe("succeeded");
    expect((await ledger.store.findTranslationByExternalId("FROM-BODY"))?.outputText).toBe("chat");
  });
});
