import { DEFAULT_FILL_CONFIG } from "@/config/fillConfig";
import { enforceArcConsistency, indexCrossings, type IndexedCrossing } from "./arcConsistency";
import {
  InsufficientPoolError,
  MalformedGridError,
  SearchBudgetExceededError,
  SearchCancelledError,
  UnsatisfiableError,
  type PoolShortfall,
} from "./errors";
import {
  assertDistinctSlots,
  buildGridTopology,
  crossingsBySlot,
  type GridTopology,
  type GridTopologyOptions,
  type Slot,
} from "./gridTopology";
import {
  cloneGrid,
  makeEmptyGrid,
  placeLetters,
  undoPlacement,
  type LetterChange,
} from "./letterGrid";
import { buildDictionaryIndex, wordsOfLength, type DictionaryIndex } from "./wordPool";

export type ValueOrder = "pool" | "least-constraining" | "random";

export type CrosswordFillOptions = Readonly<{
  /** Drop values that clash with a fresh placement from neighbouring domains. */
  forwardChecking?: boolean;
  /** Run AC-3 over all crossings before searching. */
  arcConsistency?: boolean;
  /** Fail early with {@link InsufficientPoolError} on a length shortfall. */
  preflight?: boolean;
  valueOrder?: ValueOrder;
  /** Seed for `valueOrder: "random"`; unseeded runs use Math.random. */
  seed?: number;
  maxSteps?: number;
  timeoutMs?: number;
  progressInterval?: number;
  clock?: () => number;
}>;

export type FillFailure =
  | MalformedGridError
  | UnsatisfiableError
  | SearchBudgetExceededError
  | SearchCancelledError;

export type FillCrosswordOutcome =
  | Readonly<{
      ok: true;
      grid: string[][];
      assignment: ReadonlyMap<string, string>;
      steps: number;
    }>
  | Readonly<{
      ok: false;
      error: FillFailure;
      reason: string;
      steps: number;
    }>;

/** Return false to cancel the search. */
export type FillCrosswordProgressCallback = (
  steps: number,
  partialGrid: ReadonlyArray<ReadonlyArray<string>>,
) => boolean;

const TIME_CHECK_INTERVAL = 16;

/**
 * Builds the pool and topology from raw inputs and fills the grid.
 * Malformed shapes come back as a failed outcome instead of a throw.
 */
export function fillCrossword(
  shape: ReadonlyArray<ReadonlyArray<boolean>>,
  dictionary: ReadonlyArray<string>,
  options: CrosswordFillOptions & GridTopologyOptions = {},
  onProgress?: FillCrosswordProgressCallback,
): FillCrosswordOutcome {
  let topology: GridTopology;
  try {
    topology = buildGridTopology(shape, options);
  } catch (err) {
    if (err instanceof MalformedGridError) return failed(err, 0);
    throw err;
  }
  return fillGrid(topology, buildDictionaryIndex(dictionary), options, onProgress);
}

type Frame = {
  slot: number;
  candidates: ReadonlyArray<string>;
  cursor: number;
  placed: string | null;
  changes: LetterChange[];
  saved: Array<readonly [number, ReadonlyArray<string>]>;
};

export function fillGrid(
  topology: GridTopology,
  pool: DictionaryIndex,
  options: CrosswordFillOptions = {},
  onProgress?: FillCrosswordProgressCallback,
): FillCrosswordOutcome {
  const forwardChecking = options.forwardChecking ?? DEFAULT_FILL_CONFIG.forwardChecking;
  const arcConsistency = options.arcConsistency ?? DEFAULT_FILL_CONFIG.arcConsistency;
  const preflight = options.preflight ?? DEFAULT_FILL_CONFIG.preflight;
  const valueOrder = options.valueOrder ?? DEFAULT_FILL_CONFIG.valueOrder;
  const maxSteps = options.maxSteps ?? DEFAULT_FILL_CONFIG.maxSteps;
  const timeoutMs = options.timeoutMs;
  const progressInterval = options.progressInterval ?? DEFAULT_FILL_CONFIG.progressInterval;
  const clock = options.clock ?? (() => performance.now());

  try {
    assertDistinctSlots(topology.slots);
  } catch (err) {
    if (err instanceof MalformedGridError) return failed(err, 0);
    throw err;
  }

  const slots = topology.slots;
  const grid = makeEmptyGrid(topology.shape);
  if (slots.length === 0) {
    return { ok: true, grid, assignment: new Map(), steps: 0 };
  }

  if (preflight) {
    const shortfalls = findPoolShortfalls(slots, pool);
    if (shortfalls.length > 0) return failed(new InsufficientPoolError(shortfalls), 0);
  }

  const crossings = indexCrossings(
    slots.map((s) => s.id),
    crossingsBySlot(topology),
  );
  // crossAt[i].get(j) is the crossing of slot i with slot j, if any.
  const crossAt = crossings.map(
    (list) => new Map(list.map((cr) => [cr.other, cr] as const)),
  );

  const domains: Array<ReadonlyArray<string>> = slots.map((s) =>
    wordsOfLength(pool, s.length),
  );
  // Words that survive AC-3. Only used to reject candidates: slot choice and
  // value order still see the unpruned domains, so the fill found is the same.
  let allowed: ReadonlyArray<ReadonlySet<string>> | null = null;
  if (arcConsistency) {
    const pruned = domains.slice();
    if (!enforceArcConsistency(crossings, pruned)) {
      return failed(
        new UnsatisfiableError(
          "No valid solution: arc consistency emptied the candidates of a slot",
        ),
        0,
      );
    }
    allowed = pruned.map((d) => new Set(d));
  }

  const assigned: Array<string | null> = slots.map(() => null);
  const usedWords = new Set<string>();
  const startedAt = clock();
  let assignedCount = 0;
  let steps = 0;

  const stack: Frame[] = [openFrame()];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1]!;
    if (frame.placed !== null) unplace(frame);

    if (frame.cursor >= frame.candidates.length) {
      stack.pop();
      continue;
    }
    const word = frame.candidates[frame.cursor++]!;

    if (steps >= maxSteps) {
      return failed(new SearchBudgetExceededError("steps", maxSteps), steps);
    }
    steps++;

    if (timeoutMs !== undefined && steps % TIME_CHECK_INTERVAL === 0) {
      if (clock() - startedAt > timeoutMs) {
        return failed(new SearchBudgetExceededError("time", timeoutMs), steps);
      }
    }
    if (onProgress && steps % progressInterval === 0) {
      if (!onProgress(steps, grid)) {
        return failed(new SearchCancelledError(), steps);
      }
    }

    if (!isConsistent(frame.slot, word)) continue;
    if (!place(frame, word)) {
      unplace(frame);
      continue;
    }

    if (assignedCount === slots.length) {
      const assignment = new Map<string, string>();
      slots.forEach((slot, i) => {
        const w = assigned[i];
        if (w != null) assignment.set(slot.id, w);
      });
      return { ok: true, grid: cloneGrid(grid), assignment, steps };
    }
    stack.push(openFrame());
  }

  return failed(
    new UnsatisfiableError(
      `Could not find a valid solution after ${steps.toLocaleString("en-US")} steps. The grid pattern may be too constrained.`,
    ),
    steps,
  );

  function openFrame(): Frame {
    const slot = pickNextSlot();
    return {
      slot,
      candidates: admissible(slot, orderValues(slot, liveDomain(slot))),
      cursor: 0,
      placed: null,
      changes: [],
      saved: [],
    };
  }

  function admissible(i: number, words: ReadonlyArray<string>): ReadonlyArray<string> {
    const keep = allowed?.[i];
    return keep ? words.filter((w) => keep.has(w)) : words;
  }

  // Smallest domain, then most crossings into filled slots, then slot order.
  function pickNextSlot(): number {
    let best = -1;
    let bestSize = Infinity;
    let bestDegree = -1;
    for (let i = 0; i < slots.length; i++) {
      if (assigned[i] !== null) continue;
      const size = liveDomain(i).length;
      const degree = filledNeighbours(i);
      if (size < bestSize || (size === bestSize && degree > bestDegree)) {
        best = i;
        bestSize = size;
        bestDegree = degree;
      }
    }
    return best;
  }

  function filledNeighbours(i: number): number {
    let n = 0;
    for (const cr of crossings[i] ?? []) {
      if (assigned[cr.other] !== null) n++;
    }
    return n;
  }

  // Forward-checked domains are already live; otherwise filter on demand so
  // both modes see the same candidates in the same order.
  function liveDomain(i: number): ReadonlyArray<string> {
    const domain = domains[i] ?? [];
    if (forwardChecking) return domain;
    return domain.filter((w) => isConsistent(i, w));
  }

  function isConsistent(i: number, word: string): boolean {
    if (usedWords.has(word)) return false;
    for (const cr of crossings[i] ?? []) {
      const other = assigned[cr.other];
      if (other != null && other[cr.otherOffset] !== word[cr.offset]) return false;
    }
    return true;
  }

  // Returns false when forward checking wipes out a domain; the caller undoes.
  function place(frame: Frame, word: string): boolean {
    const i = frame.slot;
    assigned[i] = word;
    usedWords.add(word);
    assignedCount++;
    frame.placed = word;
    frame.changes = placeLetters(grid, slots[i]!, word);

    if (!forwardChecking) return true;

    for (let j = 0; j < slots.length; j++) {
      if (assigned[j] !== null) continue;
      const domain = domains[j] ?? [];
      const cr = crossAt[i]?.get(j);
      const kept = cr
        ? domain.filter((w) => w !== word && w[cr.otherOffset] === word[cr.offset])
        : slots[j]!.length === word.length
          ? domain.filter((w) => w !== word)
          : domain;
      if (kept.length === domain.length) continue;
      frame.saved.push([j, domain]);
      domains[j] = kept;
      if (kept.length === 0) return false;
      const keep = allowed?.[j];
      if (keep && !kept.some((w) => keep.has(w))) return false;
    }
    return true;
  }

  function unplace(frame: Frame): void {
    for (let k = frame.saved.length - 1; k >= 0; k--) {
      const [j, domain] = frame.saved[k]!;
      domains[j] = domain;
    }
    frame.saved = [];
    undoPlacement(grid, frame.changes);
    frame.changes = [];
    if (frame.placed !== null) {
      usedWords.delete(frame.placed);
      assigned[frame.slot] = null;
      assignedCount--;
      frame.placed = null;
    }
  }

  function orderValues(i: number, candidates: ReadonlyArray<string>): ReadonlyArray<string> {
    if (valueOrder === "random") {
      const random = createSeededRandom(frameSeed(options.seed, i, assignedCount));
      return shuffled(candidates, random);
    }
    if (valueOrder === "pool") return candidates;

    const open = (crossings[i] ?? []).filter((cr) => assigned[cr.other] === null);
    const neighbourDomains = open.map((cr) => liveDomain(cr.other));
    const cost = (word: string) =>
      open.reduce(
        (sum, cr, k) =>
          sum + countRuledOut(word, cr, neighbourDomains[k] ?? []),
        0,
      );
    return candidates
      .map((word, idx) => ({ word, idx, cost: cost(word) }))
      .sort((a, b) => a.cost - b.cost || a.idx - b.idx)
      .map(({ word }) => word);
  }
}

function countRuledOut(
  word: string,
  cr: IndexedCrossing,
  neighbourDomain: ReadonlyArray<string>,
): number {
  let count = 0;
  for (const w of neighbourDomain) {
    if (w === word || w[cr.otherOffset] !== word[cr.offset]) count++;
  }
  return count;
}

export function findPoolShortfalls(
  slots: ReadonlyArray<Slot>,
  pool: DictionaryIndex,
): PoolShortfall[] {
  const slotCounts = new Map<number, number>();
  for (const slot of slots) {
    slotCounts.set(slot.length, (slotCounts.get(slot.length) ?? 0) + 1);
  }

  const shortfalls: PoolShortfall[] = [];
  for (const [length, slotCount] of slotCounts) {
    const wordCount = wordsOfLength(pool, length).length;
    if (wordCount < slotCount) shortfalls.push({ length, slotCount, wordCount });
  }
  return shortfalls.sort((a, b) => a.length - b.length);
}

function failed(error: FillFailure, steps: number): FillCrosswordOutcome {
  return { ok: false, error, reason: error.message, steps };
}

type RandomFn = () => number;

// Each frame shuffles with its own stream keyed by slot and depth, so the
// order at a node does not depend on how many frames were opened before it.
function frameSeed(seed: number | undefined, slot: number, depth: number): number | undefined {
  if (seed === undefined) return undefined;
  return (seed ^ Math.imul(slot + 1, 0x9e3779b1) ^ Math.imul(depth + 1, 0x85ebca6b)) >>> 0;
}

function createSeededRandom(seed?: number): RandomFn {
  if (seed === undefined) return Math.random;
  let state = (seed >>> 0) || 0x6d2b79f5;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

function shuffled<T>(arr: ReadonlyArray<T>, random: RandomFn): T[] {
  const a = arr.slice();
  for (let i = a.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const tmp = a[i]!;
    a[i] = a[j]!;
    a[j] = tmp;
  }
  return a;
}
