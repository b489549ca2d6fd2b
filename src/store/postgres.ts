// src/store/postgres.ts
import { sql } from "drizzle-orm";
import type { Pool } from "pg";
import type { Database } from "../db/drizzle";
import { rentals, users, vehicles } from "../db/schema";
import { ServiceError, StorageError, messageOf } from "../errors";
import type { EntityKind, PersistenceGateway, Snapshot, SnapshotScope } from "./gateway";

type Tx = Parameters<Parameters<Database["transaction"]>[0]>[0];

type TableOps<K extends EntityKind> = {
  selectAll(tx: Tx): Promise<Snapshot<K>>;
  replaceAll(tx: Tx, rows: Snapshot<K>): Promise<void>;
};

// Serialises writers across every process sharing the database.
const WRITE_LOCK_KEY = 7_340_021;

// pg caps one statement at 65535 bind parameters; replace-all saves insert in slices.
export const INSERT_CHUNK = 1000;

export function chunks<T>(rows: readonly T[], size = INSERT_CHUNK): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < rows.length; i += size) out.push(rows.slice(i, i + size));
  return out;
}

// ids are zero padded to at least 3 digits, so length then text keeps insertion order
const OPS: { [K in EntityKind]: TableOps<K> } = {
  vehicles: {
    selectAll: (tx) => tx.select().from(vehicles).orderBy(sql`length(${vehicles.id})`, vehicles.id),
    replaceAll: async (tx, rows) => {
      await tx.delete(vehicles);
      for (const part of chunks(rows)) await tx.insert(vehicles).values(part);
    },
  },
  users: {
    selectAll: (tx) => tx.select().from(users).orderBy(sql`length(${users.id})`, users.id),
    replaceAll: async (tx, rows) => {
      await tx.delete(users);
      for (const part of chunks(rows)) await tx.insert(users).values(part);
    },
  },
  rentals: {
    selectAll: (tx) => tx.select().from(rentals).orderBy(sql`length(${rentals.id})`, rentals.id),
    replaceAll: async (tx, rows) => {
      await tx.delete(rentals);
      for (const part of chunks(rows)) await tx.insert(rentals).values(part);
    },
  },
};

function scopeOf(tx: Tx): SnapshotScope {
  return {
    load: <K extends EntityKind>(kind: K) => OPS[kind].selectAll(tx),
    save: <K extends EntityKind>(kind: K, rows: Snapshot<K>) => OPS[kind].replaceAll(tx, rows),
  };
}

function toStorageError(err: unknown) {
  if (err instanceof ServiceError) return err;
  return new StorageError(`Database error: ${messageOf(err)}`, err);
}

/**
 * Postgres-backed gateway. Each transaction holds a transaction-scoped
 * advisory lock for its whole read-modify-write and rolls back on any error.
 */
export class PostgresGateway implements PersistenceGateway {
  constructor(private readonly db: Database, private readonly pool: Pool) {}

  async load<K extends EntityKind>(kind: K): Promise<Snapshot<K>> {
    try {
      return await this.db.transaction((tx) => OPS[kind].selectAll(tx));
    } catch (err) {
      throw toStorageError(err);
    }
  }

  save<K extends EntityKind>(kind: K, rows: Snapshot<K>): Promise<void> {
    return this.transaction((scope) => scope.save(kind, rows));
  }

  async transaction<T>(work: (scope: SnapshotScope) => Promise<T>): Promise<T> {
    try {
      return await this.db.transaction(async (tx) => {
        await tx.execute(sql`select pg_advisory_xact_lock(${WRITE_LOCK_KEY})`);
        return work(scopeOf(tx));
      });
    } catch (err) {
      throw toStorageError(err);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
