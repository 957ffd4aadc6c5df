import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  loadPuzzleFiles,
  normalizeWordListText,
  parseStructure,
  parseWordList,
} from "./loadPuzzle";

describe("parseStructure", () => {
  it("reads underscores as open cells and anything else as closed", () => {
    expect(parseStructure("#_#\n___\n#_#\n")).toEqual([
      [false, true, false],
      [true, true, true],
      [false, true, false],
    ]);
  });

  it("pads short lines with closed cells and ignores trailing blank lines", () => {
    expect(parseStructure("___\r\n_\r\n\r\n\r\n")).toEqual([
      [true, true, true],
      [true, false, false],
    ]);
  });

  it("returns an empty shape for empty text", () => {
    expect(parseStructure("")).toEqual([]);
  });
});

describe("parseWordList", () => {
  it("uppercases words and skips blanks and entries with other characters", () => {
    expect(parseWordList("cat\n  Dog \n\nno way\nit's\nACE\r\n")).toEqual([
      "CAT",
      "DOG",
      "ACE",
    ]);
  });
});

describe("normalizeWordListText", () => {
  it("strips separators and removes repeats", () => {
    expect(normalizeWordListText("ice-cream\nIt's\n\ncat\nCAT\n")).toEqual({
      words: ["ICECREAM", "ITS", "CAT"],
      lineCount: 6,
    });
  });

  it("names the line of an entry with other characters", () => {
    expect(() => normalizeWordListText("ok\nabc1\n")).toThrow(
      /^Line 2: Non-alpha character detected/,
    );
  });
});

describe("loadPuzzleFiles", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "crossword-load-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads the structure and word list from disk", async () => {
    const structurePath = join(dir, "structure.txt");
    const wordsPath = join(dir, "words.txt");
    await writeFile(structurePath, "___\n#_#\n#_#\n");
    await writeFile(wordsPath, "cat\ndog\nace\n");

    await expect(loadPuzzleFiles(structurePath, wordsPath)).resolves.toEqual({
      shape: [
        [true, true, true],
        [false, true, false],
        [false, true, false],
      ],
      words: ["CAT", "DOG", "ACE"],
    });
  });

  it("rejects when a file is missing", async () => {
    await expect(
      loadPuzzleFiles(join(dir, "nope.txt"), join(dir, "also-nope.txt")),
    ).rejects.toThrow(/ENOENT/);
  });
});
