// import all necessary modules and types
import { Job, Queue, Worker } from "bullmq";
import IORedis from "ioredis";
import { RedisConfig } from "../config/appConfig";
import { Consumer, ConsumeOptions, DeliveryHandler, PublishOptions, TaskHeaders, TaskQueue, readHeaders } from "./taskQueue";
import { loggerFactory, ErrorRouteLogger } from "../factory/loggerFactory";

// Define the structure of job data
interface TaskJobData {
    body: string;
    correlationId: string;
    headers: TaskHeaders;
}

const JOB_NAME = "translation-task";

// Attempts BullMQ itself makes when a handler rejects; business retries are republished copies.
const REDELIVERY_ATTEMPTS = 3;

// BullMqTaskQueue stores tasks in Redis; stalled jobs of a crashed consumer are redelivered by BullMQ.
export class BullMqTaskQueue implements TaskQueue {
    private readonly connection: IORedis;
    private readonly queues = new Map<string, Queue<TaskJobData>>();
    private readonly workers = new Set<Worker<TaskJobData>>();
    private readonly errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();

    constructor(redis: RedisConfig) {
        // BullMQ requires maxRetriesPerRequest to be null on its connections.
        this.connection = new IORedis({
            host: redis.host,
            port: redis.port,
            password: redis.password,
            maxRetriesPerRequest: null
        });
        this.connection.on("error", (error: Error) => {
            this.errorLogger.logDatabaseError("REDIS_CONNECTION", "redis", error.message);
        });
    }

    public async publish(queue: string, body: string, options: PublishOptions): Promise<void> {
        const data: TaskJobData = {
            body,
            correlationId: options.correlationId,
            headers: options.headers ?? { attempts: 0 }
        };
        await this.queue(queue).add(JOB_NAME, data, {
            delay: options.delayMs && options.delayMs > 0 ? options.delayMs : undefined,
            attempts: REDELIVERY_ATTEMPTS,
            backoff: { type: "fixed", delay: 1000 },
            removeOnComplete: 1000,
            removeOnFail: 5000
        });
    }

    public async consume(queue: string, options: ConsumeOptions, handler: DeliveryHandler): Promise<Consumer> {
        const worker = new Worker<TaskJobData>(
            queue,
            async (job: Job<TaskJobData>) => {
                await handler({
                    queue,
                    body: job.data.body,
                    correlationId: job.data.correlationId,
                    headers: readHeaders(job.data.headers)
                });
            },
            { connection: this.connection, concurrency: Math.max(1, options.prefetch) }
        );

        // Log job failures and worker errors
        worker.on("failed", (job: Job<TaskJobData> | undefined, error: Error) => {
            this.errorLogger.logDatabaseError("CONSUME_TASK", queue, `Job ${job?.id ?? "unknown"} failed: ${error.message}`);
        });
        worker.on("error", (error: Error) => {
            this.errorLogger.logDatabaseError("QUEUE_ERROR", queue, error.message);
        });
        this.workers.add(worker);

        return {
            close: async () => {
                this.workers.delete(worker);
                await worker.close();
            }
        };
    }

    // Closes workers, queues and the Redis connection.
    public async close(): Promise<void> {
        await Promise.all([...this.workers].map(worker => worker.close()));
        this.workers.clear();
        await Promise.all([...this.queues.values()].map(queue => queue.close()));
        this.queues.clear();
        await this.connection.quit();
    }

    // The queue is declared on first use.
    private queue(name: string): Queue<TaskJobData> {
        let queue = this.queues.get(name);
        if (!queue) {
            queue = new Queue<TaskJobData>(name, { connection: this.connection });
            queue.on("error", (error: Error) => {
                this.errorLogger.logDatabaseError("QUEUE_ERROR", name, error.message);
            });
            this.queues.set(name, queue);
        }
        return queue;
    }
}
