export type DictionaryIndex = Readonly<{
  normalizedWords: ReadonlyArray<string>;
  wordsByLength: ReadonlyMap<number, ReadonlyArray<string>>;
}>;

/**
 * Normalizes a raw word list into the pool the fill engine draws from:
 * uppercase, letters only, first occurrence wins.
 */
export function buildDictionaryIndex(
  dictionary: ReadonlyArray<string>,
): DictionaryIndex {
  const normalizedWords = normalizeDictionary(dictionary);
  const wordsByLength = indexByLength(normalizedWords);
  return { normalizedWords, wordsByLength };
}

export function normalizeWord(word: string): string | null {
  const up = word.trim().toUpperCase();
  if (up.length === 0) return null;
  if (!/^[A-Z]+$/.test(up)) return null;
  return up;
}

export function normalizeDictionary(words: ReadonlyArray<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const w of words) {
    const up = normalizeWord(w);
    if (up === null || seen.has(up)) continue;
    seen.add(up);
    out.push(up);
  }
  return out;
}

export function wordsOfLength(
  index: DictionaryIndex,
  length: number,
): ReadonlyArray<string> {
  return index.wordsByLength.get(length) ?? [];
}

/** Pool minus the given words; used when probing smaller pools. */
export function withoutWords(
  index: DictionaryIndex,
  removed: ReadonlyArray<string>,
): DictionaryIndex {
  const drop = new Set(removed.map((w) => w.toUpperCase()));
  return buildDictionaryIndex(
    index.normalizedWords.filter((w) => !drop.has(w)),
  );
}

function indexByLength(words: ReadonlyArray<string>): Map<number, string[]> {
  const m = new Map<number, string[]>();
  for (const w of words) {
    const arr = m.get(w.length);
    if (arr) arr.push(w);
    else m.set(w.length, [w]);
  }
  return m;
}
