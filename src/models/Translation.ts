// Import necessary modules from Sequelize.
import { DataTypes, Model, Optional, Sequelize } from "sequelize";

export interface TranslationAttributes {
  id: string;
  userId: string;
  externalId: string | null;
  inputText: string;
  outputText: string;
  sourceLang: string;
  targetLang: string;
  cost: number | null;
  timestamp: Date;
}

export type TranslationCreationAttributes = Optional<TranslationAttributes, "id" | "timestamp" | "externalId" | "cost">;

// Immutable translation history record; a null cost means nothing was debited.
export class Translation extends Model<TranslationAttributes, TranslationCreationAttributes> implements TranslationAttributes {
  public id!: string;
  public userId!: string;
  public externalId!: string | null;
  public inputText!: string;
  public outputText!: string;
  public sourceLang!: string;
  public targetLang!: string;
  public cost!: number | null;
  public readonly timestamp!: Date;

  static initialize(sequelize: Sequelize): void {
    Translation.init(
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
        externalId: {
          type: DataTypes.STRING(255),
          allowNull: true,
          unique: "uq_translations_external_id",
          field: "external_id",
        },
        inputText: {
          type: DataTypes.TEXT,
          allowNull: false,
          field: "input_text",
        },
        outputText: {
          type: DataTypes.TEXT,
          allowNull: false,
          field: "output_text",
        },
        sourceLang: {
          type: DataTypes.STRING(16),
          allowNull: false,
          field: "source_lang",
        },
        targetLang: {
          type: DataTypes.STRING(16),
          allowNull: false,
          field: "target_lang",
        },
        cost: {
          type: DataTypes.INTEGER,
          allowNull: true,
        },
        timestamp: {
          type: DataTypes.DATE,
          allowNull: false,
          defaultValue: Sequelize.fn("clock_timestamp"),
        },
      },
      {
        sequelize,
        modelName: "Translation",
        tableName: "translations",
        timestamps: false,
        underscored: true,
        indexes: [{ fields: ["user_id", "timestamp"] }],
      }
    );
  }
}
