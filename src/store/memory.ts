// src/store/memory.ts
import { SnapshotGateway, type EntityKind, type Snapshot } from "./gateway";

type Collections = { [K in EntityKind]: { rows: Snapshot<K> } };

export type Seed = { [K in EntityKind]?: Snapshot<K> };

/** Process-local store. Used by tests and by STORE_DRIVER=memory. */
export class MemoryGateway extends SnapshotGateway {
  private readonly data: Collections;

  constructor(seed: Seed = {}) {
    super();
    this.data = {
      vehicles: { rows: structuredClone(seed.vehicles ?? []) },
      users: { rows: structuredClone(seed.users ?? []) },
      rentals: { rows: structuredClone(seed.rentals ?? []) },
    };
  }

  protected async read<K extends EntityKind>(kind: K): Promise<Snapshot<K>> {
    return structuredClone(this.data[kind].rows);
  }

  protected async write<K extends EntityKind>(kind: K, rows: Snapshot<K>): Promise<void> {
    const collection: { rows: Snapshot<K> } = this.data[kind];
    collection.rows = structuredClone(rows);
  }
}
