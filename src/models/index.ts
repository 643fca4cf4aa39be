// Import all model classes
import { Sequelize } from "sequelize";
import { User } from "./User";
import { Wallet } from "./Wallet";
import { WalletTransaction } from "./WalletTransaction";
import { Translation } from "./Translation";

// Initializes every model against the given connection and wires the associations.
export function initModels(sequelize: Sequelize): void {
    User.initialize(sequelize);
    Wallet.initialize(sequelize);
    WalletTransaction.initialize(sequelize);
    Translation.initialize(sequelize);

    // One-to-one relationship between User and Wallet
    User.hasOne(Wallet, { foreignKey: "userId", as: "wallet", onDelete: "CASCADE" });
    Wallet.belongsTo(User, { foreignKey: "userId", as: "user", onDelete: "CASCADE" });

    // One-to-many relationship between User and WalletTransaction
    User.hasMany(WalletTransaction, { foreignKey: "userId", as: "transactions", onDelete: "CASCADE" });
    WalletTransaction.belongsTo(User, { foreignKey: "userId", as: "user", onDelete: "CASCADE" });

    // One-to-many relationship between User and Translation
    User.hasMany(Translation, { foreignKey: "userId", as: "translations", onDelete: "CASCADE" });
    Translation.belongsTo(User, { foreignKey: "userId", as: "user", onDelete: "CASCADE" });
}

// Export all models
export {
    User,
    Wallet,
    WalletTransaction,
    Translation
};
