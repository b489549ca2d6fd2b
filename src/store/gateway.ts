// src/store/gateway.ts
import type { Rental, User, Vehicle } from "../db/schema";
import { StorageError, messageOf } from "../errors";
import { WriteLock } from "../utils/lock";

export type EntityMap = {
  vehicles: Vehicle;
  users: User;
  rentals: Rental;
};

export type EntityKind = keyof EntityMap;

/** Full in-memory collection of one entity kind. */
export type Snapshot<K extends EntityKind> = EntityMap[K][];

export interface SnapshotScope {
  load<K extends EntityKind>(kind: K): Promise<Snapshot<K>>;
  save<K extends EntityKind>(kind: K, rows: Snapshot<K>): Promise<void>;
}

/**
 * Whole-snapshot persistence for vehicles, users and rentals.
 *
 * `load`/`save` outside a transaction act on the last committed state.
 * Every read-modify-write the services perform goes through `transaction`,
 * which serialises writers and commits the saved snapshots as one unit:
 * either all of them land or none do.
 */
export interface PersistenceGateway extends SnapshotScope {
  transaction<T>(work: (scope: SnapshotScope) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

// One slot per kind; reading `slots[kind]` keeps the kind/snapshot pairing for a generic K.
type Slot<K extends EntityKind> = { rows?: Snapshot<K> };
type Slots = { [K in EntityKind]: Slot<K> };

const emptySlots = (): Slots => ({ vehicles: {}, users: {}, rentals: {} });

// Vehicle last: a failed rental write never leaves an orphaned unavailable vehicle.
export const FLUSH_ORDER: readonly EntityKind[] = ["users", "rentals", "vehicles"];

/**
 * Shared transaction logic for stores that can only read and overwrite whole
 * collections (memory, JSON files). Writers queue on one lock; saves inside a
 * transaction are staged and flushed in FLUSH_ORDER once the work resolves.
 * When a flush fails part way, the collections already overwritten are put
 * back to their pre-transaction contents.
 */
export abstract class SnapshotGateway implements PersistenceGateway {
  private readonly lock = new WriteLock();

  protected abstract read<K extends EntityKind>(kind: K): Promise<Snapshot<K>>;
  protected abstract write<K extends EntityKind>(kind: K, rows: Snapshot<K>): Promise<void>;

  load<K extends EntityKind>(kind: K): Promise<Snapshot<K>> {
    return this.read(kind);
  }

  save<K extends EntityKind>(kind: K, rows: Snapshot<K>): Promise<void> {
    return this.lock.run(() => this.write(kind, rows));
  }

  transaction<T>(work: (scope: SnapshotScope) => Promise<T>): Promise<T> {
    return this.lock.run(async () => {
      const staged = emptySlots();
      const scope: SnapshotScope = {
        load: async <K extends EntityKind>(kind: K): Promise<Snapshot<K>> => {
          const pending = staged[kind].rows;
          return pending ? structuredClone(pending) : this.read(kind);
        },
        save: async <K extends EntityKind>(kind: K, rows: Snapshot<K>): Promise<void> => {
          const slot: Slot<K> = staged[kind];
          slot.rows = structuredClone(rows);
        },
      };

      const result = await work(scope);
      await this.flush(staged);
      return result;
    });
  }

  async close(): Promise<void> {
    await this.lock.run(async () => undefined);
  }

  private async flush(staged: Slots) {
    const kinds = FLUSH_ORDER.filter((kind) => staged[kind].rows !== undefined);
    const before = emptySlots();
    for (const kind of kinds) {
      await this.capture(before, kind);
    }

    const written: EntityKind[] = [];
    for (const kind of kinds) {
      try {
        await this.writeFrom(staged, kind);
        written.push(kind);
      } catch (err) {
        await this.rollback(before, written, err);
      }
    }
  }

  private async rollback(before: Slots, written: EntityKind[], cause: unknown): Promise<never> {
    for (const kind of [...written].reverse()) {
      try {
        await this.writeFrom(before, kind);
      } catch (undoErr) {
        throw new StorageError(
          `Commit failed (${messageOf(cause)}) and ${kind} could not be restored: ${messageOf(undoErr)}`,
          cause
        );
      }
    }
    if (cause instanceof StorageError) throw cause;
    throw new StorageError(`Commit failed: ${messageOf(cause)}`, cause);
  }

  private async capture<K extends EntityKind>(into: Slots, kind: K) {
    const slot: Slot<K> = into[kind];
    slot.rows = await this.read(kind);
  }

  private async writeFrom<K extends EntityKind>(from: Slots, kind: K) {
    const rows = from[kind].rows;
    if (rows) await this.write(kind, rows);
  }
}
