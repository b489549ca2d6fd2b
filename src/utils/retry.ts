// src/utils/retry.ts
import { setTimeout as sleep } from "node:timers/promises";
import { StorageError, messageOf } from "../errors";

export type RetryPolicy = { retries: number; delayMs: number };

/**
 * Runs a single storage call, retrying up to `retries` more times.
 * The last failure surfaces as a StorageError.
 */
export async function withRetry<T>(label: string, policy: RetryPolicy, call: () => Promise<T>): Promise<T> {
  let attempt = 0;
  for (;;) {
    try {
      return await call();
    } catch (err) {
      if (attempt >= policy.retries) {
        throw new StorageError(`${label} failed: ${messageOf(err)}`, err);
      }
      attempt++;
      console.warn(`[store] ${label} failed (attempt ${attempt}), retrying`, messageOf(err));
      await sleep(policy.delayMs * attempt);
    }
  }
}
