// src/utils/id.ts
import type { EntityKind } from "../store/gateway";

export const ID_PREFIX: Record<EntityKind, string> = {
  vehicles: "UID",
  users: "U",
  rentals: "A",
};

export function formatId(kind: EntityKind, n: number) {
  return `${ID_PREFIX[kind]}${String(n).padStart(3, "0")}`;
}

/**
 * Next sequential id for a collection: one past the highest numeric suffix
 * among the collection's ids and any `referenced` ids (ids other records
 * still point at, such as `rentals.userId`). A deleted record whose id is
 * still referenced never has that id handed out again.
 */
export function nextId(kind: EntityKind, rows: ReadonlyArray<{ id: string }>, referenced: Iterable<string> = []) {
  const prefix = ID_PREFIX[kind];
  let max = 0;
  const consider = (id: string) => {
    if (!id.startsWith(prefix)) return;
    const digits = id.slice(prefix.length);
    if (!/^\d+$/.test(digits)) return;
    max = Math.max(max, Number(digits));
  };
  for (const { id } of rows) consider(id);
  for (const id of referenced) consider(id);
  return formatId(kind, max + 1);
}
