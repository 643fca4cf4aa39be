import { Request, Response, NextFunction } from "express";
import {
  validateUUID,
  validateTranslationBody,
  validateAmount,
  validateTargetUser,
  validatePagination,
  validateAdminFilters,
  readAdminFilter,
  readPageQuery
} from "../src/middleware/validationMiddleware";
import { AppError } from "../src/factory/errorManager";
import { ErrorStatus } from "../src/factory/status";

const USER_ID = "0b7e8c1a-3d2f-4e5a-8b9c-1d2e3f4a5b6c";
const errorPassedTo = (next: NextFunction): AppError => (next as jest.Mock).mock.calls[0][0];

describe("Validation Middleware Suite", () => {
  let req: Partial<Request>;
  let res: Partial<Response>;
  let next: NextFunction;

  beforeEach(() => {
    req = { body: {}, params: {}, query: {} };
    res = {};
    next = jest.fn();
  });

  describe("validateUUID", () => {
    it("should accept a well-formed id", () => {
      req.params = { taskId: USER_ID };
      validateUUID("taskId")(req as Request, res as Response, next);
      expect(next).toHaveBeenCalledWith();
    });

    it("should reject a malformed id", () => {
      req.params = { taskId: "task-1" };
      validateUUID("taskId")(req as Request, res as Response, next);
      const error = errorPassedTo(next);
      expect(error.status).toBe(400);
      expect(error.message).toBe("Invalid taskId format");
    });
  });

  describe("validateTranslationBody", () => {
    it("should name every field that is not a string", () => {
      req.body = { inputText: "hello", sourceLang: 3 };
      validateTranslationBody(req as Request, res as Response, next);
      expect(errorPassedTo(next).message).toBe("The following fields are required and must be strings: sourceLang, targetLang");
    });

    it("should leave content checks to the processor", () => {
      req.body = { inputText: "", sourceLang: "en", targetLang: "fr" };
      validateTranslationBody(req as Request, res as Response, next);
      expect(next).toHaveBeenCalledWith();
    });
  });

  describe("validateAmount", () => {
    it.each([
      [0, "Amount must be a positive integer, got 0"],
      [-5, "Amount must be a positive integer, got -5"],
      [1.5, "Amount must be a positive integer, got 1.5"],
      ["10", "Amount must be a positive integer, got \"10\""],
      [undefined, "Amount must be a positive integer, got nothing"],
      [2147483648, "Amount must not exceed 2147483647, got 2147483648"]
    ])("should reject %p", (amount, message) => {
      req.body = { amount };
      validateAmount(req as Request, res as Response, next);
      const error = errorPassedTo(next);
      expect(error.status).toBe(422);
      expect(error.errorType).toBe(ErrorStatus.invalidAmountError);
      expect(error.message).toBe(message);
    });

    it("should accept a positive integer", () => {
      req.body = { amount: 25 };
      validateAmount(req as Request, res as Response, next);
      expect(next).toHaveBeenCalledWith();
    });
  });

  describe("validateTargetUser", () => {
    it("should require a UUID user id", () => {
      req.body = { userId: "admin", amount: 5 };
      validateTargetUser(req as Request, res as Response, next);
      expect(errorPassedTo(next).message).toBe("userId must be a valid UUID");
    });
  });

  describe("validatePagination", () => {
    it("should reject a negative skip", () => {
      req.query = { skip: "-1" };
      validatePagination(req as Request, res as Response, next);
      const error = errorPassedTo(next);
      expect(error.errorType).toBe(ErrorStatus.invalidPaginationError);
      expect(error.message).toBe("skip must be a non-negative integer");
    });

    it("should pass numeric values through to readPageQuery", () => {
      req.query = { skip: "10", limit: "5" };
      validatePagination(req as Request, res as Response, next);
      expect(next).toHaveBeenCalledWith();
      expect(readPageQuery(req as Request)).toEqual({ skip: 10, limit: 5 });
    });
  });

  describe("validateAdminFilters", () => {
    it("should reject an unknown transaction type", () => {
      req.query = { type: "refund" };
      validateAdminFilters(req as Request, res as Response, next);
      expect(errorPassedTo(next).message).toBe("type must be one of TOPUP, DEBIT");
    });

    it("should reject an unparseable date", () => {
      req.query = { from: "yesterday" };
      validateAdminFilters(req as Request, res as Response, next);
      expect(errorPassedTo(next).message).toBe("from must be an ISO 8601 date");
    });

    it("should read the accepted filters", () => {
      req.query = { userId: USER_ID, type: "debit", from: "2024-01-01T00:00:00Z", limit: "20" };
      validateAdminFilters(req as Request, res as Response, next);
      expect(next).toHaveBeenCalledWith();
      expect(readAdminFilter(req as Request)).toEqual({
        skip: undefined,
        limit: 20,
        userId: USER_ID,
        type: "DEBIT",
        from: new Date("2024-01-01T00:00:00Z"),
        to: undefined
      });
    });
  });
});
