export type ChainLink = {
  id: number;
  next: number | null;
};

export type ChainInspection<T extends ChainLink> = {
  /** Rows reachable from the head, in outline order. */
  ordered: T[];
  /** Rows no `next` pointer from the head reaches. */
  unreachable: T[];
  /** True when the walk came back to a row it had already placed. */
  cyclic: boolean;
};

/**
 * Orders rows by following `next` pointers from `firstTask`.
 *
 * Each visited row is swapped into the next unfilled front slot of a copy of
 * `rows`, with an id to slot map kept current for both swapped rows. The walk
 * ends at a `null` pointer, at an id with no row, or at a row that already sits
 * in a filled slot, so it never runs longer than `rows.length` steps.
 */
export const inspectChain = <T extends ChainLink>(
  rows: readonly T[],
  firstTask: number | null
): ChainInspection<T> => {
  const slots = [...rows];
  const slotOf = new Map<number, number>();
  slots.forEach((row, index) => slotOf.set(row.id, index));

  let filled = 0;
  let cyclic = false;
  let currentId = firstTask;

  while (currentId !== null) {
    const slot = slotOf.get(currentId);
    if (slot === undefined) break;
    if (slot < filled) {
      cyclic = true;
      break;
    }
    if (slot !== filled) {
      const displaced = slots[filled];
      slots[filled] = slots[slot];
      slots[slot] = displaced;
      slotOf.set(slots[slot].id, slot);
      slotOf.set(slots[filled].id, filled);
    }
    currentId = slots[filled].next;
    filled += 1;
  }

  return {
    ordered: slots.slice(0, filled),
    unreachable: slots.slice(filled),
    cyclic,
  };
};

export const linearizeTasks = <T extends ChainLink>(rows: readonly T[], firstTask: number | null): T[] =>
  inspectChain(rows, firstTask).ordered;
