// import necessary modules and types
import { v4 as uuidv4 } from "uuid";
import { QueueConfig } from "../config/appConfig";
import { AppError, ErrorManager, describeError, isAppError } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, QueueLogger } from "../factory/loggerFactory";
import { Consumer, Delivery, TaskQueue } from "../queue/taskQueue";
import { deadLetterQueueName } from "../queue/translationTaskBridge";
import { TranslationProcessor, TranslationRequest } from "../services/translationProcessor";

export type DeliveryResult = "succeeded" | "retried" | "dead-lettered";

export type WorkerSettings = Pick<QueueConfig, "taskQueue" | "maxAttempts" | "retryDelayMs" | "prefetch">;

interface ParsedTask {
    taskId: string;
    body: unknown;
}

// TranslationWorker consumes queued tasks and runs each through the translation processor.
export class TranslationWorker {
    private readonly errorManager = ErrorManager.getInstance();
    private readonly queueLogger: QueueLogger = loggerFactory.createQueueLogger();
    private consumer?: Consumer;

    constructor(
        private readonly queue: TaskQueue,
        private readonly processor: TranslationProcessor,
        private readonly settings: WorkerSettings
    ) {}

    public get isRunning(): boolean {
        return this.consumer !== undefined;
    }

    // Starts consuming the task queue.
    public async start(): Promise<void> {
        if (this.consumer) {
            return;
        }
        this.consumer = await this.queue.consume(
            this.settings.taskQueue,
            { prefetch: this.settings.prefetch },
            async (delivery) => {
                await this.handleDelivery(delivery);
            }
        );
        this.queueLogger.logWorkerStarted(this.settings.taskQueue, this.settings.prefetch);
    }

    public async stop(): Promise<void> {
        if (!this.consumer) {
            return;
        }
        await this.consumer.close();
        this.consumer = undefined;
        this.queueLogger.logWorkerStopped(this.settings.taskQueue);
    }

    /**
     * Handles one delivery. Business and validation failures are dead-lettered at once;
     * retryable failures are republished with a bumped attempt counter until the attempt
     * budget runs out. A rejection from here means the delivery was not acknowledged.
     */
    public async handleDelivery(delivery: Delivery): Promise<DeliveryResult> {
        const attempts = delivery.headers.attempts;
        let parsed: ParsedTask;
        try {
            parsed = this.parse(delivery);
        } catch {
            const taskId = delivery.correlationId ?? "unknown";
            await this.deadLetter(delivery, taskId, attempts, "malformed");
            return "dead-lettered";
        }

        const { taskId } = parsed;
        this.queueLogger.logTaskReceived(taskId, attempts);

        try {
            const request = this.toRequest(parsed);
            const outcome = await this.processor.process(request, "strict");
            this.queueLogger.logTaskSucceeded(taskId, outcome.cost);
            return "succeeded";
        } catch (error) {
            if (isAppError(error) && !error.retryable) {
                await this.deadLetter(delivery, taskId, attempts, error.message);
                return "dead-lettered";
            }

            const next = attempts + 1;
            if (next < this.settings.maxAttempts) {
                await this.queue.publish(this.settings.taskQueue, delivery.body, {
                    correlationId: taskId,
                    headers: { attempts: next },
                    delayMs: this.settings.retryDelayMs
                });
                this.queueLogger.logTaskRetried(taskId, next, this.settings.retryDelayMs, describeError(error));
                return "retried";
            }
            await this.deadLetter(delivery, taskId, next, describeError(error));
            return "dead-lettered";
        }
    }

    // Task id comes from the correlation id, then the body, else a fresh one.
    private parse(delivery: Delivery): ParsedTask {
        const body: unknown = JSON.parse(delivery.body);
        let taskId = delivery.correlationId;
        if (!taskId && typeof body === "object" && body !== null && "taskId" in body && typeof body.taskId === "string") {
            taskId = body.taskId;
        }
        return { taskId: taskId || uuidv4(), body };
    }

    private toRequest(task: ParsedTask): TranslationRequest {
        const body = task.body;
        if (typeof body !== "object" || body === null) {
            throw this.invalidPayload("Task body must be a JSON object");
        }
        const userId = "userId" in body ? body.userId : undefined;
        const inputText = "inputText" in body ? body.inputText : undefined;
        const sourceLang = "sourceLang" in body ? body.sourceLang : undefined;
        const targetLang = "targetLang" in body ? body.targetLang : undefined;
        if (typeof userId !== "string" || !userId) {
            throw this.invalidPayload("userId is required");
        }
        if (typeof inputText !== "string" || typeof sourceLang !== "string" || typeof targetLang !== "string") {
            throw this.invalidPayload("inputText, sourceLang and targetLang must be strings");
        }
        return { userId, inputText, sourceLang, targetLang, externalId: task.taskId };
    }

    private invalidPayload(message: string): AppError {
        return this.errorManager.createError(ErrorStatus.invalidTaskPayloadError, message);
    }

    private async deadLetter(delivery: Delivery, taskId: string, attempts: number, reason: string): Promise<void> {
        const queue = deadLetterQueueName(this.settings.taskQueue);
        await this.queue.publish(queue, delivery.body, {
            correlationId: taskId,
            headers: { attempts, failed: true, reason }
        });
        this.queueLogger.logTaskDeadLettered(taskId, queue, reason);
    }
}
