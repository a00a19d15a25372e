import { randomBytes, scrypt, timingSafeEqual } from "node:crypto";
import { logger } from "../logger";
import { SuperuserConfig } from "../config";
import { AuctionsError } from "../errors";
import { User } from "./models";
import { UserStore } from "./store";

const KeyLength = 64;

function deriveKey(password: string, salt: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, KeyLength, (error, key) =>
      error ? reject(error) : resolve(key),
    );
  });
}

/**
 * Hashes a password as scrypt$<salt>$<key>, both hex encoded
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(16);
  const key = await deriveKey(password, salt);
  return `scrypt$${salt.toString("hex")}$${key.toString("hex")}`;
}

export async function verifyPassword(
  password: string,
  hash: string,
): Promise<boolean> {
  const [scheme, salt, expected] = hash.split("$");
  if (scheme !== "scrypt" || !salt || !expected) {
    return false;
  }
  const key = await deriveKey(password, Buffer.from(salt, "hex"));
  const expectedKey = Buffer.from(expected, "hex");
  return key.length === expectedKey.length && timingSafeEqual(key, expectedKey);
}

export async function createSuperuser(
  store: UserStore,
  config: SuperuserConfig,
): Promise<User> {
  const { username, email = "", password } = config;
  if (!username || !password) {
    throw new AuctionsError(
      "AUCTIONS_SUPERUSER_USERNAME and AUCTIONS_SUPERUSER_PASSWORD must be set",
    );
  }
  if (await store.findUser(username)) {
    throw new AuctionsError(`User ${username} already exists`);
  }
  const user = await store.createUser({
    username,
    email,
    passwordHash: await hashPassword(password),
    isSuperuser: true,
  });
  logger.info({ username: user.username }, "Superuser created");
  return user;
}
