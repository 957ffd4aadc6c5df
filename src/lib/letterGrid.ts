import type { GridTopology, Slot } from "./gridTopology";

export const BLOCKED = "#";

/** `"#"` for closed cells, `""` for open cells. */
export function makeEmptyGrid(
  shape: ReadonlyArray<ReadonlyArray<boolean>>,
): string[][] {
  return shape.map((row) => row.map((cell) => (cell ? "" : BLOCKED)));
}

export function cloneGrid(grid: ReadonlyArray<ReadonlyArray<string>>): string[][] {
  return grid.map((row) => row.slice());
}

/**
 * Letter overlay for an assignment, same dimensions as the shape. Slots
 * missing from the assignment leave their cells empty.
 */
export function letterGrid(
  topology: GridTopology,
  assignment: ReadonlyMap<string, string>,
): string[][] {
  const grid = makeEmptyGrid(topology.shape);
  for (const slot of topology.slots) {
    const word = assignment.get(slot.id);
    if (word === undefined) continue;
    placeLetters(grid, slot, word);
  }
  return grid;
}

export type LetterChange = Readonly<{ r: number; c: number; prev: string }>;

/**
 * Writes `word` into the slot's cells and returns the cells that were empty
 * before, so the write can be undone.
 */
export function placeLetters(
  grid: string[][],
  slot: Slot,
  word: string,
): LetterChange[] {
  const changes: LetterChange[] = [];
  slot.cells.forEach(({ r, c }, i) => {
    const row = grid[r];
    const ch = word[i];
    if (!row || ch === undefined) return;
    const existing = row[c] ?? "";
    if (existing === "") {
      changes.push({ r, c, prev: existing });
      row[c] = ch;
    }
  });
  return changes;
}

export function undoPlacement(
  grid: string[][],
  changes: ReadonlyArray<LetterChange>,
): void {
  for (const { r, c, prev } of changes) {
    const row = grid[r];
    if (!row) continue;
    row[c] = prev;
  }
}

/** Terminal rendering: `█` for closed cells, a space for an empty open cell. */
export function renderText(grid: ReadonlyArray<ReadonlyArray<string>>): string {
  return grid
    .map((row) =>
      row.map((cell) => (cell === BLOCKED ? "█" : cell || " ")).join(""),
    )
    .join("\n");
}
