import { ConfigError, MalformedGridError } from "./errors";

export type Coord = Readonly<{ r: number; c: number }>;
export type Dir = "across" | "down";

export type Slot = Readonly<{
  id: string;
  dir: Dir;
  start: Coord;
  cells: ReadonlyArray<Coord>;
  length: number;
}>;

/** One across slot and one down slot sharing `cell`. */
export type Intersection = Readonly<{
  across: string;
  down: string;
  cell: Coord;
  acrossOffset: number;
  downOffset: number;
}>;

/** An intersection seen from one of its two slots. */
export type Crossing = Readonly<{
  otherSlotId: string;
  offset: number;
  otherOffset: number;
}>;

export type ClueEntry = Readonly<{
  number: number;
  cell: Coord;
  across: string | null;
  down: string | null;
}>;

export type GridTopology = Readonly<{
  height: number;
  width: number;
  shape: ReadonlyArray<ReadonlyArray<boolean>>;
  slots: ReadonlyArray<Slot>;
  intersections: ReadonlyArray<Intersection>;
  entries: ReadonlyArray<ClueEntry>;
}>;

/**
 * What to do with an open cell that belongs to no slot in either direction
 * (a single-cell run both ways). `"ignore"` keeps it as an unchecked filler
 * cell that stays empty in the output.
 */
export type OrphanCellPolicy = "ignore" | "reject";

export type GridTopologyOptions = Readonly<{
  minSlotLength?: number;
  orphanCells?: OrphanCellPolicy;
}>;

export function buildGridTopology(
  shape: ReadonlyArray<ReadonlyArray<boolean>>,
  options: GridTopologyOptions = {},
): GridTopology {
  const minSlotLength = options.minSlotLength ?? 2;
  const orphanCells = options.orphanCells ?? "ignore";

  if (!Number.isInteger(minSlotLength) || minSlotLength < 2) {
    throw new ConfigError(
      `minSlotLength must be an integer of at least 2, got ${minSlotLength}`,
    );
  }
  if (!isRect(shape)) {
    throw new MalformedGridError(
      "Non-rectangular shape: rows have different widths",
    );
  }

  const height = shape.length;
  const width = shape[0]?.length ?? 0;
  const slots = extractSlots(shape, minSlotLength);

  if (orphanCells === "reject") {
    const orphans = findOrphanCells(shape, slots);
    if (orphans.length > 0) {
      const listed = orphans.map(({ r, c }) => `(${r}, ${c})`).join(", ");
      throw new MalformedGridError(
        `${orphans.length} open cell(s) belong to no slot of length ≥ ${minSlotLength}: ${listed}`,
      );
    }
  }

  return {
    height,
    width,
    shape: shape.map((row) => row.slice()),
    slots,
    intersections: findIntersections(slots),
    entries: numberEntries(slots),
  };
}

/**
 * Checks slot identity on a topology that may not have come from
 * {@link buildGridTopology}: ids are unique, and no two slots of one
 * direction cover the same cells.
 */
export function assertDistinctSlots(slots: ReadonlyArray<Slot>): void {
  const ids = new Set<string>();
  const footprints = new Set<string>();
  for (const slot of slots) {
    if (ids.has(slot.id)) {
      throw new MalformedGridError(`Duplicate slot id: ${slot.id}`);
    }
    ids.add(slot.id);

    const footprint = `${slot.dir}|${slot.cells.map(cellKey).join(",")}`;
    if (footprints.has(footprint)) {
      throw new MalformedGridError(
        `Slot ${slot.id} covers the same cells as another ${slot.dir} slot`,
      );
    }
    footprints.add(footprint);

    if (slot.cells.length !== slot.length) {
      throw new MalformedGridError(
        `Slot ${slot.id} has length ${slot.length} but ${slot.cells.length} cell(s)`,
      );
    }
  }
}

export function crossingsBySlot(
  topology: GridTopology,
): Map<string, Crossing[]> {
  const m = new Map<string, Crossing[]>();
  for (const slot of topology.slots) m.set(slot.id, []);
  for (const x of topology.intersections) {
    m.get(x.across)?.push({
      otherSlotId: x.down,
      offset: x.acrossOffset,
      otherOffset: x.downOffset,
    });
    m.get(x.down)?.push({
      otherSlotId: x.across,
      offset: x.downOffset,
      otherOffset: x.acrossOffset,
    });
  }
  return m;
}

/** Clue numbers keyed by `"r:c"`, as printed in the corner of a cell. */
export function getClueNumbers(topology: GridTopology): Map<string, number> {
  const clueNumbers = new Map<string, number>();
  for (const entry of topology.entries) {
    clueNumbers.set(cellKey(entry.cell), entry.number);
  }
  return clueNumbers;
}

export function cellKey({ r, c }: Coord): string {
  return `${r}:${c}`;
}

export function isRect(grid: ReadonlyArray<ReadonlyArray<unknown>>): boolean {
  const h = grid.length;
  if (h === 0) return true;
  const w = grid[0]!.length;
  for (const row of grid) {
    if (row.length !== w) return false;
  }
  return true;
}

export function findOrphanCells(
  shape: ReadonlyArray<ReadonlyArray<boolean>>,
  slots: ReadonlyArray<Slot>,
): Coord[] {
  const covered = new Set<string>();
  for (const slot of slots) {
    for (const cell of slot.cells) covered.add(cellKey(cell));
  }

  const orphans: Coord[] = [];
  for (let r = 0; r < shape.length; r++) {
    const row = shape[r]!;
    for (let c = 0; c < row.length; c++) {
      if (!row[c]) continue;
      if (!covered.has(`${r}:${c}`)) orphans.push({ r, c });
    }
  }
  return orphans;
}

export function extractSlots(
  shape: ReadonlyArray<ReadonlyArray<boolean>>,
  minLen: number,
): Slot[] {
  const slots: Slot[] = [];
  const h = shape.length;
  const w = shape[0]?.length ?? 0;

  for (let r = 0; r < h; r++) {
    const row = shape[r]!;
    let c = 0;
    while (c < w) {
      const start = c;
      while (c < w && row[c]) c++;
      const runLen = c - start;
      if (runLen >= minLen) {
        slots.push({
          id: `A:${r}:${start}`,
          dir: "across",
          start: { r, c: start },
          cells: range(runLen).map((i) => ({ r, c: start + i })),
          length: runLen,
        });
      }
      c++;
    }
  }

  for (let c = 0; c < w; c++) {
    let r = 0;
    while (r < h) {
      const start = r;
      while (r < h && shape[r]![c]) r++;
      const runLen = r - start;
      if (runLen >= minLen) {
        slots.push({
          id: `D:${start}:${c}`,
          dir: "down",
          start: { r: start, c },
          cells: range(runLen).map((i) => ({ r: start + i, c })),
          length: runLen,
        });
      }
      r++;
    }
  }

  return slots;
}

function findIntersections(slots: ReadonlyArray<Slot>): Intersection[] {
  const acrossAt = new Map<string, { slotId: string; offset: number }>();
  for (const slot of slots) {
    if (slot.dir !== "across") continue;
    slot.cells.forEach((cell, offset) => {
      acrossAt.set(cellKey(cell), { slotId: slot.id, offset });
    });
  }

  const intersections: Intersection[] = [];
  for (const slot of slots) {
    if (slot.dir !== "down") continue;
    slot.cells.forEach((cell, downOffset) => {
      const hit = acrossAt.get(cellKey(cell));
      if (!hit) return;
      intersections.push({
        across: hit.slotId,
        down: slot.id,
        cell,
        acrossOffset: hit.offset,
        downOffset,
      });
    });
  }
  return intersections;
}

// Row-major over start cells; a cell starting both an across and a down
// slot gets a single number.
function numberEntries(slots: ReadonlyArray<Slot>): ClueEntry[] {
  const byStart = new Map<
    string,
    { cell: Coord; across: string | null; down: string | null }
  >();
  for (const slot of slots) {
    const key = cellKey(slot.start);
    const entry = byStart.get(key) ?? { cell: slot.start, across: null, down: null };
    if (slot.dir === "across") entry.across = slot.id;
    else entry.down = slot.id;
    byStart.set(key, entry);
  }

  return Array.from(byStart.values())
    .sort((a, b) => a.cell.r - b.cell.r || a.cell.c - b.cell.c)
    .map((entry, i) => ({ number: i + 1, ...entry }));
}

function range(n: number): number[] {
  const a = new Array<number>(n);
  for (let i = 0; i < n; i++) a[i] = i;
  return a;
}
