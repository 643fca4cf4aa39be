import { MemoryLedgerStore } from "../src/dao/memoryLedgerStore";
import { UserRepository } from "../src/repository/userRepository";
import { WalletService } from "../src/services/walletService";
import { CreditService } from "../src/services/creditService";
import { AdminInitService } from "../src/services/adminInitService";
import { ErrorStatus } from "../src/factory/status";

describe("Admin Init Service Suite", () => {
  let store: MemoryLedgerStore;
  let userRepository: UserRepository;
  let walletService: WalletService;
  let creditService: CreditService;

  beforeEach(() => {
    store = new MemoryLedgerStore();
    userRepository = new UserRepository(store, 4);
    walletService = new WalletService(store);
    creditService = new CreditService(store, walletService);
  });

  it("should create the admin with its starting credits", async () => {
    const service = new AdminInitService(userRepository, creditService, {
      email: "admin@example.com",
      password: "Adm1nPassword",
      initialCredits: 250
    });

    await service.initializeAdminUser();

    const admin = await userRepository.getUserByEmail("admin@example.com");
    expect(admin?.isAdmin).toBe(true);
    expect(admin ? await walletService.getBalance(admin.id) : null).toBe(250);
  });

  it("should leave an existing admin untouched", async () => {
    const settings = { email: "admin@example.com", password: "Adm1nPassword", initialCredits: 5 };
    const service = new AdminInitService(userRepository, creditService, settings);

    await service.initializeAdminUser();
    await service.initializeAdminUser();

    expect(await store.listTransactions({ offset: 0, limit: 10 })).toHaveLength(1);
  });

  it("should skip when the credentials are not configured", async () => {
    const createUser = jest.spyOn(userRepository, "createUser");
    const service = new AdminInitService(userRepository, creditService, { email: "admin@example.com", initialCredits: 5 });

    await service.initializeAdminUser();

    expect(createUser).not.toHaveBeenCalled();
  });

  it("should wrap a creation failure", async () => {
    jest.spyOn(userRepository, "createUser").mockRejectedValueOnce(new Error("store offline"));
    const service = new AdminInitService(userRepository, creditService, {
      email: "admin@example.com",
      password: "Adm1nPassword",
      initialCredits: 0
    });

    await expect(service.initializeAdminUser()).rejects.toMatchObject({
      errorType: ErrorStatus.userCreationFailedError,
      message: "Failed to initialize admin user: store offline"
    });
  });
});
