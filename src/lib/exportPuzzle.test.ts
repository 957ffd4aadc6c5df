import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { UnsupportedOutputError } from "./errors";
import {
  buildExportData,
  outputFormatFor,
  renderPdf,
  renderPng,
  writePuzzleOutput,
} from "./exportPuzzle";
import { buildGridTopology } from "./gridTopology";
import { letterGrid } from "./letterGrid";

const TEE = buildGridTopology([
  [true, true, true],
  [false, true, false],
  [false, true, false],
]);
const ASSIGNMENT = new Map([
  ["A:0:0", "CAT"],
  ["D:0:1", "ACE"],
]);
const GRID = letterGrid(TEE, ASSIGNMENT);

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

describe("buildExportData", () => {
  it("lists numbered clues with their answers", () => {
    const data = buildExportData(TEE, GRID, ASSIGNMENT, new Date("2024-01-02T03:04:05.000Z"));

    expect(data).toEqual({
      version: 1,
      createdAt: "2024-01-02T03:04:05.000Z",
      gridSize: { rows: 3, cols: 3 },
      shape: [
        [true, true, true],
        [false, true, false],
        [false, true, false],
      ],
      filledGrid: [
        ["C", "A", "T"],
        ["#", "C", "#"],
        ["#", "E", "#"],
      ],
      clues: {
        across: [{ number: 1, word: "CAT", row: 0, col: 0, length: 3 }],
        down: [{ number: 2, word: "ACE", row: 0, col: 1, length: 3 }],
      },
    });
  });

  it("skips slots without a word", () => {
    const data = buildExportData(TEE, GRID, new Map([["A:0:0", "CAT"]]));

    expect(data.clues.down).toEqual([]);
  });
});

describe("outputFormatFor", () => {
  it("picks the format from the extension, ignoring case", () => {
    expect(outputFormatFor("out/puzzle.PNG")).toBe("png");
    expect(outputFormatFor("puzzle.pdf")).toBe("pdf");
    expect(outputFormatFor("puzzle.json")).toBe("json");
  });

  it("rejects other extensions", () => {
    expect(() => outputFormatFor("puzzle.gif")).toThrow(UnsupportedOutputError);
  });
});

describe("renderers", () => {
  it("encodes a PNG image", () => {
    const png = renderPng(TEE, GRID, { cellSize: 20, padding: 4 });

    expect([...png.subarray(0, 8)]).toEqual(PNG_SIGNATURE);
  });

  it("encodes a PDF document", async () => {
    const pdf = await renderPdf(TEE, GRID, ASSIGNMENT);

    expect(Buffer.from(pdf.subarray(0, 5)).toString("latin1")).toBe("%PDF-");
  });
});

describe("writePuzzleOutput", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "crossword-export-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes JSON export data", async () => {
    const outputPath = join(dir, "puzzle.json");

    await expect(writePuzzleOutput(outputPath, TEE, GRID, ASSIGNMENT)).resolves.toBe("json");

    const written: unknown = JSON.parse(await readFile(outputPath, "utf-8"));
    expect(written).toMatchObject({
      gridSize: { rows: 3, cols: 3 },
      clues: {
        across: [{ number: 1, word: "CAT" }],
        down: [{ number: 2, word: "ACE" }],
      },
    });
  });

  it("writes a PNG file", async () => {
    const outputPath = join(dir, "puzzle.png");

    await expect(writePuzzleOutput(outputPath, TEE, GRID, ASSIGNMENT)).resolves.toBe("png");

    const written = await readFile(outputPath);
    expect([...written.subarray(0, 8)]).toEqual(PNG_SIGNATURE);
  });
});
