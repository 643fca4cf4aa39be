import jwt from "jsonwebtoken";
import { MemoryLedgerStore } from "../src/dao/memoryLedgerStore";
import { UserRepository } from "../src/repository/userRepository";
import { AuthService } from "../src/services/authService";
import { ErrorStatus } from "../src/factory/status";

describe("User Repository Suite", () => {
  let store: MemoryLedgerStore;
  let repository: UserRepository;

  beforeEach(() => {
    store = new MemoryLedgerStore();
    repository = new UserRepository(store, 4);
  });

  it("should create a user with a hashed password and an empty wallet", async () => {
    const user = await repository.createUser({ email: " New@Example.com ", password: "Passw0rdOk" });

    expect(user.email).toBe("new@example.com");
    expect(user.isAdmin).toBe(false);
    expect(user.passwordHash).not.toBe("Passw0rdOk");
    expect(await store.findWallet(user.id)).toEqual(expect.objectContaining({ userId: user.id, balance: 0 }));
  });

  it("should refuse a duplicate email regardless of case", async () => {
    await repository.createUser({ email: "dup@example.com", password: "Passw0rdOk" });

    await expect(repository.createUser({ email: "DUP@example.com", password: "Passw0rdOk" }))
      .rejects.toMatchObject({ errorType: ErrorStatus.userAlreadyExistsError, status: 409 });
  });

  it("should validate the right password only", async () => {
    const user = await repository.createUser({ email: "login@example.com", password: "Passw0rdOk" });

    await expect(repository.validateLogin("LOGIN@example.com", "Passw0rdOk")).resolves.toEqual(user);
    await expect(repository.validateLogin("login@example.com", "wrong-password")).resolves.toBeNull();
    await expect(repository.validateLogin("nobody@example.com", "Passw0rdOk")).resolves.toBeNull();
  });

  it("should look users up by id and email", async () => {
    const user = await repository.createUser({ email: "find@example.com", password: "Passw0rdOk", isAdmin: true });

    await expect(repository.getUserById(user.id)).resolves.toEqual(user);
    await expect(repository.getUserByEmail("Find@Example.com")).resolves.toEqual(user);
  });

  it("should report an unexpected store failure as a creation failure", async () => {
    jest.spyOn(store, "transaction").mockRejectedValueOnce(new Error("disk full"));

    await expect(repository.createUser({ email: "fail@example.com", password: "Passw0rdOk" }))
      .rejects.toMatchObject({ errorType: ErrorStatus.userCreationFailedError });
  });
});

describe("Auth Service Suite", () => {
  const service = new AuthService({ jwtSecret: "test-secret", tokenTtlSeconds: 600, bcryptRounds: 4 });
  const user = {
    id: "8d6c3a52-1b7e-4a0c-9a55-0e4b8f3c2d10",
    email: "token@example.com",
    passwordHash: "not-a-real-hash",
    isAdmin: true,
    createdAt: new Date(0)
  };

  it("should issue a token carrying the user claims and expiry", () => {
    const token = service.issueToken(user);
    const decoded = jwt.decode(token);

    expect(decoded).toEqual(expect.objectContaining({ userId: user.id, email: user.email, isAdmin: true }));
    expect(typeof decoded === "object" && decoded !== null && decoded.exp !== undefined && decoded.iat !== undefined
      ? decoded.exp - decoded.iat
      : null).toBe(600);
  });

  it("should verify its own tokens", () => {
    expect(service.verifyToken(service.issueToken(user))).toEqual({ userId: user.id, email: user.email, isAdmin: true });
  });

  it("should throw on a token signed elsewhere", () => {
    const foreign = jwt.sign({ userId: user.id, email: user.email }, "other-secret");
    expect(() => service.verifyToken(foreign)).toThrow(jwt.JsonWebTokenError);
  });
});
