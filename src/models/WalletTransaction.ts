// Import necessary modules from Sequelize.
import { DataTypes, Model, Optional, Sequelize } from "sequelize";
import { TransactionType } from "../dao/ledgerStore";

export interface WalletTransactionAttributes {
  id: string;
  userId: string;
  amount: number;
  type: TransactionType;
  timestamp: Date;
}

export type WalletTransactionCreationAttributes = Optional<WalletTransactionAttributes, "id" | "timestamp">;

// Append-only ledger entry; amounts are positive magnitudes for both TOPUP and DEBIT.
export class WalletTransaction
  extends Model<WalletTransactionAttributes, WalletTransactionCreationAttributes>
  implements WalletTransactionAttributes {
  public id!: string;
  public userId!: string;
  public amount!: number;
  public type!: TransactionType;
  public readonly timestamp!: Date;

  static initialize(sequelize: Sequelize): void {
    WalletTransaction.init(
      {
        id: {
          type: DataTypes.UUID,
          primaryKey: true,
          defaultValue: DataTypes.UUIDV4,
        },
        userId: {
          type: DataTypes.UUID,
          allowNull: false,
          field: "user_id",
        },
        amount: {
          type: DataTypes.INTEGER,
          allowNull: false,
          validate: {
            isInt: true,
            min: 1,
          },
        },
        type: {
          type: DataTypes.ENUM("TOPUP", "DEBIT"),
          allowNull: false,
        },
        // Assigned by the database clock so concurrent processes agree on ordering.
        timestamp: {
          type: DataTypes.DATE,
          allowNull: false,
          defaultValue: Sequelize.fn("clock_timestamp"),
        },
      },
      {
        sequelize,
        modelName: "WalletTransaction",
        tableName: "transactions",
        timestamps: false,
        underscored: true,
        indexes: [{ fields: ["user_id", "timestamp"] }],
      }
    );
  }
}
