// Import necessary modules from Sequelize.
import { DataTypes, Model, Optional, Sequelize } from "sequelize";

export interface WalletAttributes {
  id: string;
  userId: string;
  balance: number;
}

export type WalletCreationAttributes = Optional<WalletAttributes, "id" | "balance">;

// One wallet per user holding a non-negative integer balance.
export class Wallet extends Model<WalletAttributes, WalletCreationAttributes> implements WalletAttributes {
  public id!: string;
  public userId!: string;
  public balance!: number;

  static initialize(sequelize: Sequelize): void {
    Wallet.init(
      {
        id: {
          type: DataTypes.UUID,
          primaryKey: true,
          defaultValue: DataTypes.UUIDV4,
        },
        userId: {
          type: DataTypes.UUID,
          allowNull: false,
          unique: "uq_wallets_user_id",
          field: "user_id",
        },
        balance: {
          type: DataTypes.INTEGER,
          allowNull: false,
          defaultValue: 0,
          validate: {
            isInt: true,
            min: 0,
          },
        },
      },
      {
        sequelize,
        modelName: "Wallet",
        tableName: "wallets",
        timestamps: false,
        underscored: true,
      }
    );
  }
}
