// Import configuration, stores, services and queue implementations.
import { AppConfig } from "../config/appConfig";
import { DbConnection } from "../config/database";
import { LedgerStore } from "../dao/ledgerStore";
import { MemoryLedgerStore } from "../dao/memoryLedgerStore";
import { SequelizeLedgerStore } from "../dao/sequelizeLedgerStore";
import { UserRepository } from "../repository/userRepository";
import { AdminInitService } from "../services/adminInitService";
import { AuthService } from "../services/authService";
import { CreditService } from "../services/creditService";
import { HistoryService } from "../services/historyService";
import { HttpTranslator } from "../services/httpTranslator";
import { TranslationProcessor } from "../services/translationProcessor";
import { DictionaryTranslator, Translator } from "../services/translator";
import { WalletService } from "../services/walletService";
import { BullMqTaskQueue } from "../queue/bullMqTaskQueue";
import { MemoryTaskQueue } from "../queue/memoryTaskQueue";
import { TaskQueue } from "../queue/taskQueue";
import { TranslationTaskBridge } from "../queue/translationTaskBridge";
import { TranslationWorker } from "../workers/translationWorker";

// Every long-lived collaborator of a process, built once from the configuration.
export interface Container {
    config: AppConfig;
    store: LedgerStore;
    walletService: WalletService;
    translator: Translator;
    processor: TranslationProcessor;
    creditService: CreditService;
    historyService: HistoryService;
    userRepository: UserRepository;
    authService: AuthService;
    adminInitService: AdminInitService;
    taskQueue: TaskQueue;
    taskBridge: TranslationTaskBridge;
    worker: TranslationWorker;
    close(): Promise<void>;
}

// Replacements for the configured drivers, used by tests.
export interface ContainerOverrides {
    store?: LedgerStore;
    taskQueue?: TaskQueue;
    translator?: Translator;
}

// The Sequelize store owns the connection and closes it with itself.
async function buildStore(config: AppConfig): Promise<LedgerStore> {
    if (config.ledgerDriver === "memory") {
        return new MemoryLedgerStore();
    }
    if (!config.database) {
        throw new Error("FATAL: Database configuration is required for the postgres ledger");
    }
    const db = new DbConnection(config.database);
    await db.connect();
    return new SequelizeLedgerStore(db.sequelize, { lockTimeoutMs: config.database.lockTimeoutMs });
}

function buildTranslator(config: AppConfig): Translator {
    const { driver, serviceUrl, timeoutMs } = config.translation;
    if (driver === "http") {
        if (!serviceUrl) {
            throw new Error("FATAL: Missing required environment variable: TRANSLATOR_URL");
        }
        return new HttpTranslator({ serviceUrl, timeoutMs });
    }
    return new DictionaryTranslator();
}

function buildQueue(config: AppConfig): TaskQueue {
    return config.queueDriver === "memory" ? new MemoryTaskQueue() : new BullMqTaskQueue(config.redis);
}

// Wires the object graph; connects the database first when the Postgres ledger is selected.
export async function buildContainer(config: AppConfig, overrides: ContainerOverrides = {}): Promise<Container> {
    const store = overrides.store ?? await buildStore(config);
    const translator = overrides.translator ?? buildTranslator(config);
    const taskQueue = overrides.taskQueue ?? buildQueue(config);

    const walletService = new WalletService(store);
    const processor = new TranslationProcessor(store, walletService, translator, {
        costPerRequest: config.translation.costPerRequest,
        translateTimeoutMs: config.translation.timeoutMs,
        maxInputLength: config.translation.maxInputLength
    });
    const creditService = new CreditService(store, walletService);
    const userRepository = new UserRepository(store, config.auth.bcryptRounds);
    const worker = new TranslationWorker(taskQueue, processor, config.queue);

    return {
        config,
        store,
        walletService,
        translator,
        processor,
        creditService,
        historyService: new HistoryService(store, config.history),
        userRepository,
        authService: new AuthService(config.auth),
        adminInitService: new AdminInitService(userRepository, creditService, config.admin),
        taskQueue,
        taskBridge: new TranslationTaskBridge(taskQueue, store, config.queue),
        worker,
        close: async () => {
            await worker.stop();
            await taskQueue.close();
            await store.close();
        }
    };
}
