// Broker-neutral contract for durable task delivery.

export interface TaskHeaders {
    attempts: number;
    failed?: boolean;
    reason?: string;
}

export interface PublishOptions {
    correlationId: string;
    headers?: TaskHeaders;
    delayMs?: number;
}

export interface Delivery {
    queue: string;
    body: string;
    correlationId?: string;
    headers: TaskHeaders;
}

// Resolving acknowledges the delivery; rejecting leaves it for redelivery.
export type DeliveryHandler = (delivery: Delivery) => Promise<void>;

export interface ConsumeOptions {
    prefetch: number;
}

export interface Consumer {
    close(): Promise<void>;
}

export interface TaskQueue {
    publish(queue: string, body: string, options: PublishOptions): Promise<void>;
    consume(queue: string, options: ConsumeOptions, handler: DeliveryHandler): Promise<Consumer>;
    close(): Promise<void>;
}

// Reads the attempt counter from loosely typed message headers.
export function readHeaders(raw: unknown): TaskHeaders {
    if (typeof raw !== "object" || raw === null) {
        return { attempts: 0 };
    }
    const attempts = "attempts" in raw ? Number(raw.attempts) : 0;
    const headers: TaskHeaders = { attempts: Number.isSafeInteger(attempts) && attempts >= 0 ? attempts : 0 };
    if ("failed" in raw && raw.failed === true) {
        headers.failed = true;
    }
    if ("reason" in raw && typeof raw.reason === "string") {
        headers.reason = raw.reason;
    }
    return headers;
}
