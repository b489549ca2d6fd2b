// src/utils/password.ts
import { randomBytes, scryptSync, timingSafeEqual } from "crypto";

const KEY_LEN = 32;

/** `scrypt$<salt hex>$<key hex>` */
export function hashPassword(plain: string) {
  const salt = randomBytes(16);
  const key = scryptSync(plain, salt, KEY_LEN);
  return `scrypt$${salt.toString("hex")}$${key.toString("hex")}`;
}

export function verifyPassword(plain: string, stored: string) {
  const [scheme, saltHex, keyHex] = stored.split("$");
  if (scheme !== "scrypt" || !saltHex || !keyHex) return false;
  const expected = Buffer.from(keyHex, "hex");
  const actual = scryptSync(plain, Buffer.from(saltHex, "hex"), expected.length);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}
