import type { GridTopology } from "./gridTopology";
import type { DictionaryIndex } from "./wordPool";

export type AssignmentViolation =
  | Readonly<{ kind: "missing_slot"; slotId: string }>
  | Readonly<{ kind: "unknown_slot"; slotId: string }>
  | Readonly<{ kind: "length_mismatch"; slotId: string; word: string; expected: number }>
  | Readonly<{ kind: "not_in_pool"; slotId: string; word: string }>
  | Readonly<{ kind: "reused_word"; word: string; slotIds: ReadonlyArray<string> }>
  | Readonly<{
      kind: "letter_conflict";
      across: string;
      down: string;
      r: number;
      c: number;
      acrossLetter: string;
      downLetter: string;
    }>;

/**
 * Checks a finished assignment against the topology and pool without
 * reference to how it was found. An empty result means the fill is valid.
 */
export function validateAssignment(
  topology: GridTopology,
  pool: DictionaryIndex,
  assignment: ReadonlyMap<string, string>,
): AssignmentViolation[] {
  const violations: AssignmentViolation[] = [];
  const poolWords = new Set(pool.normalizedWords);
  const knownSlots = new Set(topology.slots.map((s) => s.id));

  for (const slotId of assignment.keys()) {
    if (!knownSlots.has(slotId)) violations.push({ kind: "unknown_slot", slotId });
  }

  const slotsByWord = new Map<string, string[]>();
  for (const slot of topology.slots) {
    const raw = assignment.get(slot.id);
    if (raw === undefined) {
      violations.push({ kind: "missing_slot", slotId: slot.id });
      continue;
    }
    const word = raw.toUpperCase();
    if (word.length !== slot.length) {
      violations.push({ kind: "length_mismatch", slotId: slot.id, word, expected: slot.length });
    }
    if (!poolWords.has(word)) {
      violations.push({ kind: "not_in_pool", slotId: slot.id, word });
    }
    const holders = slotsByWord.get(word);
    if (holders) holders.push(slot.id);
    else slotsByWord.set(word, [slot.id]);
  }

  for (const [word, slotIds] of slotsByWord) {
    if (slotIds.length > 1) violations.push({ kind: "reused_word", word, slotIds });
  }

  for (const x of topology.intersections) {
    const acrossWord = assignment.get(x.across);
    const downWord = assignment.get(x.down);
    if (acrossWord === undefined || downWord === undefined) continue;
    const acrossLetter = (acrossWord[x.acrossOffset] ?? "").toUpperCase();
    const downLetter = (downWord[x.downOffset] ?? "").toUpperCase();
    if (acrossLetter !== downLetter) {
      violations.push({
        kind: "letter_conflict",
        across: x.across,
        down: x.down,
        r: x.cell.r,
        c: x.cell.c,
        acrossLetter,
        downLetter,
      });
    }
  }

  return violations;
}
