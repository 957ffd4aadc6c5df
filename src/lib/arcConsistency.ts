import type { Crossing } from "./gridTopology";

type Arc = Readonly<{ x: number; y: number; xOffset: number; yOffset: number }>;

/**
 * AC-3 over the crossing graph. Replaces entries of `domains` with pruned
 * copies and returns false as soon as any domain is wiped out. Word
 * uniqueness is not considered here; only letter agreement.
 */
export function enforceArcConsistency(
  crossings: ReadonlyArray<ReadonlyArray<IndexedCrossing>>,
  domains: Array<ReadonlyArray<string>>,
): boolean {
  const queue: Arc[] = [];
  crossings.forEach((list, x) => {
    for (const cr of list) {
      queue.push({ x, y: cr.other, xOffset: cr.offset, yOffset: cr.otherOffset });
    }
  });

  let head = 0;
  while (head < queue.length) {
    const arc = queue[head++]!;
    if (!revise(arc, domains)) continue;
    if ((domains[arc.x] ?? []).length === 0) return false;

    for (const cr of crossings[arc.x] ?? []) {
      if (cr.other === arc.y) continue;
      queue.push({
        x: cr.other,
        y: arc.x,
        xOffset: cr.otherOffset,
        yOffset: cr.offset,
      });
    }
  }
  return true;
}

/** A {@link Crossing} with the other slot referred to by index. */
export type IndexedCrossing = Readonly<{
  other: number;
  offset: number;
  otherOffset: number;
}>;

export function indexCrossings(
  slotIds: ReadonlyArray<string>,
  bySlot: ReadonlyMap<string, ReadonlyArray<Crossing>>,
): IndexedCrossing[][] {
  const indexOf = new Map(slotIds.map((id, i) => [id, i] as const));
  return slotIds.map((id) =>
    (bySlot.get(id) ?? []).flatMap((cr) => {
      const other = indexOf.get(cr.otherSlotId);
      return other === undefined
        ? []
        : [{ other, offset: cr.offset, otherOffset: cr.otherOffset }];
    }),
  );
}

// Drops words of x with no partner in y on the shared cell.
function revise(arc: Arc, domains: Array<ReadonlyArray<string>>): boolean {
  const xs = domains[arc.x] ?? [];
  const supported = new Set<string>();
  for (const w of domains[arc.y] ?? []) {
    const ch = w[arc.yOffset];
    if (ch !== undefined) supported.add(ch);
  }

  const kept = xs.filter((w) => {
    const ch = w[arc.xOffset];
    return ch !== undefined && supported.has(ch);
  });
  if (kept.length === xs.length) return false;
  domains[arc.x] = kept;
  return true;
}
