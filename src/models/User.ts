// Import necessary modules from Sequelize.
import { DataTypes, Model, Optional, Sequelize } from "sequelize";
import { isValidEmail, normalizeEmail } from "../utils/credentials";

export interface UserAttributes {
  id: string;
  email: string;
  passwordHash: string;
  isAdmin: boolean;
  createdAt: Date;
}

export type UserCreationAttributes = Optional<UserAttributes, "id" | "isAdmin" | "createdAt">;

// User model: identity with a normalized unique email and a bcrypt hash.
export class User extends Model<UserAttributes, UserCreationAttributes> implements UserAttributes {
  public id!: string;
  public email!: string;
  public passwordHash!: string;
  public isAdmin!: boolean;

  public readonly createdAt!: Date;

  // Changes the email through the same normalization and format rule used at registration.
  public setNormalizedEmail(email: string): void {
    const normalized = normalizeEmail(email);
    if (!isValidEmail(normalized)) {
      throw new Error(`Invalid email: ${email}`);
    }
    this.email = normalized;
  }

  // Initializes the User model, defining its schema and configuration with Sequelize.
  static initialize(sequelize: Sequelize): void {
    User.init(
      {
        id: {
          type: DataTypes.UUID,
          primaryKey: true,
          defaultValue: DataTypes.UUIDV4,
        },
        email: {
          type: DataTypes.STRING(255),
          allowNull: false,
          unique: "uq_users_email",
          validate: {
            isEmail: true,
            isLowercase: true,
          },
        },
        passwordHash: {
          type: DataTypes.STRING(255),
          allowNull: false,
          field: "password_hash",
        },
        isAdmin: {
          type: DataTypes.BOOLEAN,
          allowNull: false,
          defaultValue: false,
          field: "is_admin",
        },
        createdAt: {
          type: DataTypes.DATE,
          allowNull: false,
          defaultValue: Sequelize.fn("clock_timestamp"),
          field: "created_at",
        },
      },
      {
        sequelize,
        modelName: "User",
        tableName: "users",
        timestamps: false,
        underscored: true,
      }
    );
  }
}
