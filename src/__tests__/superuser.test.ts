import {
  createSuperuser,
  hashPassword,
  verifyPassword,
} from "../app/superuser";
import { MemoryStore } from "./memory-store";

jest.mock("../logger", () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
  },
}));

describe("superuser", () => {
  it("should create a superuser with a hashed password", async () => {
    const store = new MemoryStore();

    const user = await createSuperuser(store, {
      username: "admin",
      email: "admin@example.com",
      password: "test-secret",
    });

    expect(user).toEqual({
      id: 1,
      username: "admin",
      email: "admin@example.com",
      isSuperuser: true,
      passwordHash: expect.stringMatching(/^scrypt\$[0-9a-f]{32}\$[0-9a-f]{128}$/),
    });
    const [stored] = store.users;
    expect(await verifyPassword("test-secret", stored.passwordHash)).toBe(true);
  });

  it("should refuse to create the same user twice", async () => {
    const store = new MemoryStore();
    const config = { username: "admin", password: "test-secret" };
    await createSuperuser(store, config);

    await expect(createSuperuser(store, config)).rejects.toThrow(
      "User admin already exists",
    );
  });

  it("should require a username and a password", async () => {
    await expect(
      createSuperuser(new MemoryStore(), { username: "admin" }),
    ).rejects.toThrow(
      "AUCTIONS_SUPERUSER_USERNAME and AUCTIONS_SUPERUSER_PASSWORD must be set",
    );
  });

  describe("passwords", () => {
    it("should salt every hash", async () => {
      expect(await hashPassword("test-secret")).not.toBe(
        await hashPassword("test-secret"),
      );
    });

    it("should reject wrong passwords and unknown schemes", async () => {
      const hash = await hashPassword("test-secret");

      expect(await verifyPassword("other-secret", hash)).toBe(false);
      expect(await verifyPassword("test-secret", "md5$abc$def")).toBe(false);
    });
  });
});
