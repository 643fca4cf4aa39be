// Import the policy type shared with the translation processor.
import { FundsPolicy } from "../services/translationProcessor";

export type LedgerDriver = "postgres" | "memory";
export type QueueDriver = "bullmq" | "memory";
export type TranslatorDriver = "dictionary" | "http";

export interface DatabaseConfig {
    host: string;
    port: number;
    username: string;
    password: string;
    database: string;
    lockTimeoutMs: number;
    logging: boolean;
    alterSchema: boolean;
}

export interface RedisConfig {
    host: string;
    port: number;
    password?: string;
}

export interface QueueConfig {
    taskQueue: string;
    maxAttempts: number;
    retryDelayMs: number;
    publishRetries: number;
    publishRetryDelayMs: number;
    prefetch: number;
    embeddedWorker: boolean;
}

export interface TranslationConfig {
    driver: TranslatorDriver;
    serviceUrl?: string;
    timeoutMs: number;
    costPerRequest: number;
    maxInputLength: number;
    syncFundsPolicy: FundsPolicy;
}

export interface AuthConfig {
    jwtSecret: string;
    tokenTtlSeconds: number;
    bcryptRounds: number;
}

export interface HistoryConfig {
    defaultLimit: number;
    maxLimit: number;
    adminMaxLimit: number;
}

export interface AdminConfig {
    email?: string;
    password?: string;
    initialCredits: number;
}

// Application settings, built once at process start and handed to every constructor.
export interface AppConfig {
    env: string;
    port: number;
    ledgerDriver: LedgerDriver;
    queueDriver: QueueDriver;
    auth: AuthConfig;
    database?: DatabaseConfig;
    redis: RedisConfig;
    queue: QueueConfig;
    translation: TranslationConfig;
    history: HistoryConfig;
    admin: AdminConfig;
}

type Env = Record<string, string | undefined>;

// Reads a required variable, failing fast when it is absent.
function required(env: Env, name: string): string {
    const value = env[name];
    if (!value) {
        throw new Error(`FATAL: Missing required environment variable: ${name}`);
    }
    return value;
}

// Parses an integer variable with a fallback and a lower bound.
function integer(env: Env, name: string, fallback: number, min = 0): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isSafeInteger(value) || value < min) {
        throw new Error(`FATAL: Environment variable ${name} must be an integer >= ${min}, got "${raw}"`);
    }
    return value;
}

// Parses a boolean flag ("true"/"false", "1"/"0").
function flag(env: Env, name: string, fallback: boolean): boolean {
    const raw = env[name]?.trim().toLowerCase();
    if (!raw) {
        return fallback;
    }
    return raw === "true" || raw === "1";
}

// Restricts a variable to a fixed set of values.
function oneOf<T extends string>(env: Env, name: string, allowed: readonly T[], fallback: T): T {
    const raw = env[name]?.trim().toLowerCase();
    if (!raw) {
        return fallback;
    }
    const match = allowed.find(value => value === raw);
    if (!match) {
        throw new Error(`FATAL: Environment variable ${name} must be one of ${allowed.join(", ")}, got "${raw}"`);
    }
    return match;
}

// Builds the database settings, only required when the Postgres ledger is selected.
function loadDatabaseConfig(env: Env, nodeEnv: string): DatabaseConfig {
    const requiredEnvVars = ["DB_HOST", "DB_PORT", "POSTGRES_USER", "POSTGRES_PASSWORD", "POSTGRES_DB"];
    for (const name of requiredEnvVars) {
        required(env, name);
    }

    return {
        host: required(env, "DB_HOST"),
        port: integer(env, "DB_PORT", 5432, 1),
        username: required(env, "POSTGRES_USER"),
        password: required(env, "POSTGRES_PASSWORD"),
        database: required(env, "POSTGRES_DB"),
        lockTimeoutMs: integer(env, "DB_LOCK_TIMEOUT_MS", 5000, 1),
        logging: nodeEnv === "development",
        alterSchema: nodeEnv !== "production"
    };
}

// Builds the application configuration from environment variables.
export function loadConfig(env: Env = process.env): AppConfig {
    const nodeEnv = env.NODE_ENV || "development";
    const ledgerDriver = oneOf(env, "LEDGER_DRIVER", ["postgres", "memory"] as const, "postgres");
    const queueDriver = oneOf(env, "QUEUE_DRIVER", ["bullmq", "memory"] as const, "bullmq");
    const translatorDriver = oneOf(env, "TRANSLATOR_DRIVER", ["dictionary", "http"] as const, "dictionary");

    const serviceUrl = translatorDriver === "http" ? required(env, "TRANSLATOR_URL") : env.TRANSLATOR_URL;
    const maxLimit = integer(env, "HISTORY_MAX_LIMIT", 500, 1);

    return {
        env: nodeEnv,
        port: integer(env, "PORT", 3000, 1),
        ledgerDriver,
        queueDriver,
        auth: {
            jwtSecret: required(env, "JWT_SECRET"),
            tokenTtlSeconds: integer(env, "JWT_TTL_SECONDS", 86400, 60),
            bcryptRounds: integer(env, "BCRYPT_ROUNDS", 10, 4)
        },
        database: ledgerDriver === "postgres" ? loadDatabaseConfig(env, nodeEnv) : undefined,
        redis: {
            host: env.REDIS_HOST || "localhost",
            port: integer(env, "REDIS_PORT", 6379, 1),
            password: env.REDIS_PASSWORD || undefined
        },
        queue: {
            taskQueue: env.TASK_QUEUE || "translation_tasks",
            maxAttempts: integer(env, "WORKER_MAX_RETRIES", 5, 1),
            retryDelayMs: integer(env, "WORKER_RETRY_DELAY_MS", 1000),
            publishRetries: integer(env, "PUBLISH_MAX_RETRIES", 3, 1),
            publishRetryDelayMs: integer(env, "PUBLISH_RETRY_DELAY_MS", 500),
            prefetch: 1,
            embeddedWorker: flag(env, "EMBEDDED_WORKER", queueDriver === "memory")
        },
        translation: {
            driver: translatorDriver,
            serviceUrl,
            timeoutMs: integer(env, "TRANSLATOR_TIMEOUT_MS", 10000, 1),
            costPerRequest: integer(env, "TRANSLATION_COST", 1, 1),
            maxInputLength: integer(env, "MAX_INPUT_LENGTH", 5000, 1),
            syncFundsPolicy: oneOf(env, "SYNC_FUNDS_POLICY", ["strict", "lenient"] as const, "strict")
        },
        history: {
            defaultLimit: Math.min(100, maxLimit),
            maxLimit,
            adminMaxLimit: integer(env, "ADMIN_MAX_LIMIT", 1000, 1)
        },
        admin: {
            email: env.ADMIN_EMAIL || undefined,
            password: env.ADMIN_PASSWORD || undefined,
            initialCredits: integer(env, "ADMIN_INITIAL_CREDITS", 1000)
        }
    };
}
