// Import necessary modules and types
import { v4 as uuidv4 } from "uuid";
import { QueueConfig } from "../config/appConfig";
import { LedgerReader } from "../dao/ledgerStore";
import { ErrorManager, describeError } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, QueueLogger } from "../factory/loggerFactory";
import { TaskQueue } from "./taskQueue";

// Body of a queued translation task.
export interface TranslationTaskPayload {
    taskId?: string;
    userId: string;
    inputText: string;
    sourceLang: string;
    targetLang: string;
}

export interface TaskStatus {
    taskId: string;
    status: "pending" | "done";
    outputText?: string;
    cost?: number | null;
}

export type BridgeSettings = Pick<QueueConfig, "taskQueue" | "publishRetries" | "publishRetryDelayMs">;

export function deadLetterQueueName(queue: string): string {
    return `${queue}.failed`;
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

// Publishes translation tasks and reports their completion from the ledger.
export class TranslationTaskBridge {
    private readonly errorManager = ErrorManager.getInstance();
    private readonly queueLogger: QueueLogger = loggerFactory.createQueueLogger();

    constructor(
        private readonly queue: TaskQueue,
        private readonly reader: LedgerReader,
        private readonly settings: BridgeSettings
    ) {}

    public get taskQueue(): string {
        return this.settings.taskQueue;
    }

    public get deadLetterQueue(): string {
        return deadLetterQueueName(this.settings.taskQueue);
    }

    /**
     * Publishes a task and returns its id. The id travels both as the correlation id and
     * inside the body, and becomes the external id of the resulting translation.
     */
    public async publish(payload: TranslationTaskPayload): Promise<string> {
        const taskId = payload.taskId ?? uuidv4();
        const body = JSON.stringify({ ...payload, taskId });

        for (let attempt = 1; attempt <= this.settings.publishRetries; attempt++) {
            try {
                await this.queue.publish(this.settings.taskQueue, body, {
                    correlationId: taskId,
                    headers: { attempts: 0 }
                });
                this.queueLogger.logTaskPublished(this.settings.taskQueue, taskId, 0);
                return taskId;
            } catch (error) {
                this.queueLogger.logPublishAttemptFailed(this.settings.taskQueue, taskId, attempt, describeError(error));
                if (attempt < this.settings.publishRetries) {
                    await sleep(this.settings.publishRetryDelayMs);
                }
            }
        }
        throw this.errorManager.createError(
            ErrorStatus.taskPublishFailedError,
            `Failed to publish task ${taskId} after ${this.settings.publishRetries} attempts`
        );
    }

    // A task is done once its translation is recorded; another user's record reads as pending.
    public async getStatus(taskId: string, userId?: string): Promise<TaskStatus> {
        const record = await this.reader.findTranslationByExternalId(taskId);
        if (!record || (userId !== undefined && record.userId !== userId)) {
            return { taskId, status: "pending" };
        }
        return { taskId, status: "done", outputText: record.outputText, cost: record.cost };
    }
}
