// Import the queue contract and loggers.
import { Consumer, ConsumeOptions, Delivery, DeliveryHandler, PublishOptions, TaskQueue } from "./taskQueue";
import { loggerFactory, ErrorRouteLogger } from "../factory/loggerFactory";
import { describeError } from "../factory/errorManager";

interface MemoryConsumer {
    prefetch: number;
    inFlight: number;
    handler: DeliveryHandler;
    closed: boolean;
}

interface QueueState {
    messages: Delivery[];
    consumers: MemoryConsumer[];
}

/**
 * In-process task queue with the same delivery semantics as the broker-backed one:
 * FIFO per queue, at most `prefetch` unacknowledged deliveries per consumer and
 * redelivery of any delivery whose handler rejects. Used by tests and single-process runs.
 */
export class MemoryTaskQueue implements TaskQueue {
    private readonly queues = new Map<string, QueueState>();
    private readonly timers = new Set<NodeJS.Timeout>();
    private readonly errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();
    private closed = false;

    public async publish(queue: string, body: string, options: PublishOptions): Promise<void> {
        if (this.closed) {
            throw new Error(`Queue "${queue}" is closed`);
        }
        const delivery: Delivery = {
            queue,
            body,
            correlationId: options.correlationId,
            headers: { ...(options.headers ?? { attempts: 0 }) }
        };

        const delayMs = options.delayMs ?? 0;
        if (delayMs <= 0) {
            this.enqueue(delivery);
            return;
        }
        const timer = setTimeout(() => {
            this.timers.delete(timer);
            this.enqueue(delivery);
        }, delayMs);
        this.timers.add(timer);
    }

    public async consume(queue: string, options: ConsumeOptions, handler: DeliveryHandler): Promise<Consumer> {
        const consumer: MemoryConsumer = { prefetch: Math.max(1, options.prefetch), inFlight: 0, handler, closed: false };
        const state = this.state(queue);
        state.consumers.push(consumer);
        this.dispatch(queue);

        return {
            close: async () => {
                consumer.closed = true;
                state.consumers = state.consumers.filter(entry => entry !== consumer);
            }
        };
    }

    public async close(): Promise<void> {
        this.closed = true;
        for (const timer of this.timers) {
            clearTimeout(timer);
        }
        this.timers.clear();
        for (const state of this.queues.values()) {
            for (const consumer of state.consumers) {
                consumer.closed = true;
            }
            state.consumers = [];
        }
    }

    // Messages waiting in a queue that no consumer has taken yet.
    public peek(queue: string): Delivery[] {
        return [...(this.queues.get(queue)?.messages ?? [])];
    }

    // Resolves once every consumed queue is empty, nothing is in flight and no delayed publish is pending.
    public async drain(): Promise<void> {
        while (!this.isIdle()) {
            await new Promise<void>(resolve => setImmediate(resolve));
        }
    }

    private isIdle(): boolean {
        if (this.timers.size > 0) {
            return false;
        }
        for (const state of this.queues.values()) {
            if (state.consumers.some(consumer => consumer.inFlight > 0)) {
                return false;
            }
            if (state.consumers.length > 0 && state.messages.length > 0) {
                return false;
            }
        }
        return true;
    }

    private state(queue: string): QueueState {
        let state = this.queues.get(queue);
        if (!state) {
            state = { messages: [], consumers: [] };
            this.queues.set(queue, state);
        }
        return state;
    }

    private enqueue(delivery: Delivery): void {
        this.state(delivery.queue).messages.push(delivery);
        this.dispatch(delivery.queue);
    }

    private dispatch(queue: string): void {
        const state = this.state(queue);
        for (const consumer of state.consumers) {
            while (!consumer.closed && consumer.inFlight < consumer.prefetch && state.messages.length > 0) {
                const delivery = state.messages.shift();
                if (!delivery) {
                    break;
                }
                consumer.inFlight += 1;
                void consumer.handler(delivery).then(
                    () => this.settle(queue, consumer),
                    (error: unknown) => {
                        this.errorLogger.logDatabaseError("CONSUME_TASK", queue, describeError(error));
                        // Unacknowledged deliveries go back to the head of the queue.
                        state.messages.unshift(delivery);
                        this.settle(queue, consumer);
                    }
                );
            }
        }
    }

    private settle(queue: string, consumer: MemoryConsumer): void {
        consumer.inFlight -= 1;
        if (!this.closed) {
            this.dispatch(queue);
        }
    }
}
