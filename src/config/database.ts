// Import necessary modules
import { Sequelize } from "sequelize";
import { DatabaseConfig } from "./appConfig";
import { initModels } from "../models";
import logger from "../utils/logger";

// Storage-level checks Sequelize cannot declare on a model.
const CHECK_CONSTRAINTS = [
    { table: "wallets", name: "ck_wallets_balance_non_negative", expression: "balance >= 0" },
    { table: "transactions", name: "ck_transactions_amount_positive", expression: "amount > 0" }
];

// Database connection manager
export class DbConnection {
    public readonly sequelize: Sequelize;

    constructor(private readonly config: DatabaseConfig) {
        this.sequelize = new Sequelize({
            dialect: "postgres",
            host: config.host,
            port: config.port,
            username: config.username,
            password: config.password,
            database: config.database,
            logging: config.logging
                ? (sql: string) => logger.debug("Database Query", { sql })
                : false,
            pool: {
                max: 10,
                min: 0,
                acquire: 30000,
                idle: 10000
            }
        });
        initModels(this.sequelize);
    }

    // Establishes and authenticates the database connection, then synchronizes the schema.
    public async connect(): Promise<void> {
        try {
            logger.info("Connecting to database...", { host: this.config.host, database: this.config.database });
            await this.sequelize.authenticate();
            await this.sync();
            logger.info("Database connected and synchronized successfully");
        } catch (error) {
            const err = error instanceof Error ? error : new Error("Unknown database error");
            logger.error("Unable to connect to database:", { error: err.message, stack: err.stack });
            throw err;
        }
    }

    // Synchronizes all defined models with the database and installs the check constraints.
    public async sync(): Promise<void> {
        // Allow alter only outside production
        await this.sequelize.sync(this.config.alterSchema ? { alter: true } : {});

        for (const check of CHECK_CONSTRAINTS) {
            await this.sequelize.query(`ALTER TABLE "${check.table}" DROP CONSTRAINT IF EXISTS "${check.name}"`);
            await this.sequelize.query(`ALTER TABLE "${check.table}" ADD CONSTRAINT "${check.name}" CHECK (${check.expression})`);
        }
        logger.info("Database synchronized successfully.");
    }
}
