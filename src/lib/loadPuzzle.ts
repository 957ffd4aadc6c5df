import { readFile } from "node:fs/promises";
import { normalizeWord } from "./wordPool";

export const OPEN_CELL = "_";

export type PuzzleInput = Readonly<{
  shape: boolean[][];
  words: string[];
}>;

/**
 * One row per line, `_` for an open cell and any other character for a
 * closed one. Short lines are padded with closed cells to the widest line;
 * trailing blank lines are ignored.
 */
export function parseStructure(text: string): boolean[][] {
  const lines = text.split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1]!.trim() === "") lines.pop();

  const width = lines.reduce((max, line) => Math.max(max, line.length), 0);
  return lines.map((line) =>
    Array.from({ length: width }, (_, c) => line[c] === OPEN_CELL),
  );
}

/** One word per line; words with anything other than letters are skipped. */
export function parseWordList(text: string): string[] {
  const words: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const word = normalizeWord(line);
    if (word !== null) words.push(word);
  }
  return words;
}

export async function loadPuzzleFiles(
  structurePath: string,
  wordsPath: string,
): Promise<PuzzleInput> {
  const [structureText, wordsText] = await Promise.all([
    readFile(structurePath, "utf-8"),
    readFile(wordsPath, "utf-8"),
  ]);
  return {
    shape: parseStructure(structureText),
    words: parseWordList(wordsText),
  };
}

export type NormalizedWordList = Readonly<{
  words: string[];
  lineCount: number;
}>;

/**
 * Cleans a raw word list for use as a words file: separators such as
 * underscores, hyphens and apostrophes are stripped, words are uppercased and
 * de-duplicated. Any other non-letter character is an error naming the line.
 */
export function normalizeWordListText(content: string): NormalizedWordList {
  const lines = content.split(/\r?\n/);
  const seen = new Set<string>();
  const words: string[] = [];
  let lineNumber = 0;

  for (const line of lines) {
    lineNumber++;
    const trimmedLine = line.trim();
    if (trimmedLine === "") continue;

    const stripped = trimmedLine.replace(/[_'\-\s,./=]/g, "");
    if (!/^[a-zA-Z]*$/.test(stripped)) {
      const invalidChars = stripped.match(/[^a-zA-Z]/g) ?? [];
      throw new Error(
        `Line ${lineNumber}: Non-alpha character detected after stripping separators.\n` +
          `  Original: "${trimmedLine}"\n` +
          `  Stripped: "${stripped}"\n` +
          `  Invalid characters: ${invalidChars.join(", ")}`,
      );
    }

    const word = stripped.toUpperCase();
    if (word === "" || seen.has(word)) continue;
    seen.add(word);
    words.push(word);
  }

  return { words, lineCount: lines.length };
}
