// src/store/file.ts
import * as fs from "fs/promises";
import path from "path";
import type { z } from "zod";
import { StorageError } from "../errors";
import { RecordSchemas } from "../validators/records";
import { withRetry, type RetryPolicy } from "../utils/retry";
import { SnapshotGateway, type EntityKind, type EntityMap, type Snapshot } from "./gateway";

/**
 * One JSON file per collection under `dir` (vehicles.json, users.json,
 * rentals.json). A missing file is an empty collection. Writes go to a temp
 * file first and are renamed into place.
 */
export class FileGateway extends SnapshotGateway {
  constructor(
    private readonly dir: string,
    private readonly policy: RetryPolicy = { retries: 2, delayMs: 50 }
  ) {
    super();
  }

  private fileOf(kind: EntityKind) {
    return path.join(this.dir, `${kind}.json`);
  }

  protected async read<K extends EntityKind>(kind: K): Promise<Snapshot<K>> {
    const file = this.fileOf(kind);
    const text = await withRetry(`read ${kind}`, this.policy, async () => {
      try {
        return await fs.readFile(file, "utf-8");
      } catch (err) {
        if (isMissing(err)) return null;
        throw err;
      }
    });
    if (text === null) return [];

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new StorageError(`${file} is not valid JSON`, err);
    }
    const schema: z.ZodType<EntityMap[K]> = RecordSchemas[kind];
    const parsed = schema.array().safeParse(json);
    if (!parsed.success) {
      throw new StorageError(`${file} holds malformed ${kind}: ${parsed.error.issues[0]?.message}`, parsed.error);
    }
    return parsed.data;
  }

  protected async write<K extends EntityKind>(kind: K, rows: Snapshot<K>): Promise<void> {
    const file = this.fileOf(kind);
    const tmp = `${file}.tmp`;
    await withRetry(`write ${kind}`, this.policy, async () => {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(tmp, JSON.stringify(rows, null, 2), "utf-8");
      await fs.rename(tmp, file);
    });
  }
}

function isMissing(err: unknown) {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
