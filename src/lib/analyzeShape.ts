import { extractSlots, findOrphanCells, isRect, type Slot } from "./gridTopology";
import type { DictionaryIndex } from "./wordPool";

export type CrosswordShapeIssueSeverity = "error" | "warning";
export type CrosswordShapeIssueCode =
  | "empty_shape"
  | "non_rectangular"
  | "orphan_cells"
  | "no_candidates_for_slot_length"
  | "not_enough_unique_words_for_length"
  | "disconnected_components";

export type CrosswordShapeIssue = Readonly<{
  code: CrosswordShapeIssueCode;
  severity: CrosswordShapeIssueSeverity;
  message: string;
}>;

export type CrosswordShapeAnalysis = Readonly<{
  isValid: boolean;
  issues: ReadonlyArray<CrosswordShapeIssue>;
  slotCount: number;
}>;

/**
 * Cheap diagnostics run before a fill. Errors here mean the fill cannot
 * succeed; warnings are printed and otherwise ignored.
 */
export function analyzeCrosswordShape(params: Readonly<{
  shape: ReadonlyArray<ReadonlyArray<boolean>>;
  dictionaryIndex: DictionaryIndex;
  minSlotLength: number;
}>): CrosswordShapeAnalysis {
  const { shape, dictionaryIndex, minSlotLength } = params;

  const issues: CrosswordShapeIssue[] = [];

  const openCount = shape.reduce(
    (n, row) => n + row.filter((cell) => cell).length,
    0,
  );
  if (openCount === 0) {
    issues.push({
      code: "empty_shape",
      severity: "warning",
      message: "Grid has no open cells; there is nothing to fill.",
    });
  }

  if (!isRect(shape)) {
    issues.push({
      code: "non_rectangular",
      severity: "error",
      message: "Grid rows are different widths (non-rectangular).",
    });
    return { isValid: false, issues, slotCount: 0 };
  }

  const slots = extractSlots(shape, minSlotLength);

  const orphanCellCount = findOrphanCells(shape, slots).length;
  if (orphanCellCount > 0) {
    issues.push({
      code: "orphan_cells",
      severity: "warning",
      message: `${orphanCellCount} open cell(s) are not part of any across/down slot of length ≥ ${minSlotLength}. They will be left empty.`,
    });
  }

  const slotCountsByLength = countSlotsByLength(slots);
  const noCandidateLengths: Array<{ length: number; slotCount: number }> = [];
  const notEnoughWordsLengths: Array<{
    length: number;
    slotCount: number;
    wordCount: number;
  }> = [];

  for (const [length, slotCount] of slotCountsByLength) {
    const wordCount = dictionaryIndex.wordsByLength.get(length)?.length ?? 0;
    if (wordCount === 0) {
      noCandidateLengths.push({ length, slotCount });
      continue;
    }
    if (wordCount < slotCount) {
      notEnoughWordsLengths.push({ length, slotCount, wordCount });
    }
  }

  if (noCandidateLengths.length > 0) {
    const details = noCandidateLengths
      .sort((a, b) => a.length - b.length)
      .map(
        ({ length, slotCount }) =>
          `${slotCount} slot(s) of length ${length} (0 words in word list)`,
      )
      .join("; ");
    issues.push({
      code: "no_candidates_for_slot_length",
      severity: "error",
      message: `Some slots have no candidates in the word list: ${details}.`,
    });
  }

  if (notEnoughWordsLengths.length > 0) {
    const details = notEnoughWordsLengths
      .sort((a, b) => a.length - b.length)
      .map(
        ({ length, slotCount, wordCount }) =>
          `${slotCount} slot(s) of length ${length} but only ${wordCount} unique word(s) available`,
      )
      .join("; ");
    issues.push({
      code: "not_enough_unique_words_for_length",
      severity: "error",
      message: `Words cannot repeat, and the word list doesn't have enough unique words: ${details}.`,
    });
  }

  const componentCount = countConnectedComponents(shape);
  if (componentCount > 1) {
    issues.push({
      code: "disconnected_components",
      severity: "warning",
      message: `Your grid has ${componentCount} disconnected "islands" of open cells. This is allowed, but each island is filled independently.`,
    });
  }

  const isValid = issues.every((i) => i.severity !== "error");
  return { isValid, issues, slotCount: slots.length };
}

function countSlotsByLength(slots: ReadonlyArray<Slot>): Map<number, number> {
  const m = new Map<number, number>();
  for (const slot of slots) {
    m.set(slot.length, (m.get(slot.length) ?? 0) + 1);
  }
  return m;
}

function countConnectedComponents(
  shape: ReadonlyArray<ReadonlyArray<boolean>>,
): number {
  const h = shape.length;
  const w = shape[0]?.length ?? 0;

  const visited: boolean[][] = shape.map((row) => row.map(() => false));
  let components = 0;

  for (let r = 0; r < h; r++) {
    for (let c = 0; c < w; c++) {
      if (!shape[r]![c]) continue;
      if (visited[r]![c]) continue;

      components++;
      const queue: Array<{ r: number; c: number }> = [{ r, c }];
      visited[r]![c] = true;

      let cur = queue.pop();
      while (cur) {
        const neighbors = [
          { r: cur.r - 1, c: cur.c },
          { r: cur.r + 1, c: cur.c },
          { r: cur.r, c: cur.c - 1 },
          { r: cur.r, c: cur.c + 1 },
        ];
        for (const n of neighbors) {
          if (n.r < 0 || n.r >= h || n.c < 0 || n.c >= w) continue;
          if (!shape[n.r]![n.c]) continue;
          if (visited[n.r]![n.c]) continue;
          visited[n.r]![n.c] = true;
          queue.push(n);
        }
        cur = queue.pop();
      }
    }
  }

  return components;
}
