import { writeFile } from "node:fs/promises";
import { extname } from "node:path";
import { createCanvas } from "@napi-rs/canvas";
import { DEFAULT_RENDER_CONFIG, type RenderConfig } from "@/config/renderConfig";
import { UnsupportedOutputError } from "./errors";
import { getClueNumbers, type GridTopology } from "./gridTopology";
import { BLOCKED } from "./letterGrid";

export type ClueExport = {
  number: number;
  word: string;
  row: number;
  col: number;
  length: number;
};

export interface PuzzleExportData {
  version: 1;
  createdAt: string;
  gridSize: { rows: number; cols: number };
  shape: boolean[][];
  filledGrid: string[][];
  clues: {
    across: ClueExport[];
    down: ClueExport[];
  };
}

export type OutputFormat = "png" | "pdf" | "json";

export type RenderOptions = Partial<RenderConfig>;

export function buildExportData(
  topology: GridTopology,
  filledGrid: ReadonlyArray<ReadonlyArray<string>>,
  assignment: ReadonlyMap<string, string>,
  createdAt: Date = new Date(),
): PuzzleExportData {
  const across: ClueExport[] = [];
  const down: ClueExport[] = [];
  const slotsById = new Map(topology.slots.map((s) => [s.id, s]));

  for (const entry of topology.entries) {
    for (const [slotId, list] of [
      [entry.across, across],
      [entry.down, down],
    ] as const) {
      if (slotId === null) continue;
      const slot = slotsById.get(slotId);
      const word = assignment.get(slotId);
      if (!slot || word === undefined) continue;
      list.push({
        number: entry.number,
        word,
        row: entry.cell.r,
        col: entry.cell.c,
        length: slot.length,
      });
    }
  }

  return {
    version: 1,
    createdAt: createdAt.toISOString(),
    gridSize: { rows: topology.height, cols: topology.width },
    shape: topology.shape.map((row) => row.slice()),
    filledGrid: filledGrid.map((row) => row.slice()),
    clues: { across, down },
  };
}

export function exportAsJson(
  topology: GridTopology,
  filledGrid: ReadonlyArray<ReadonlyArray<string>>,
  assignment: ReadonlyMap<string, string>,
): string {
  const data = buildExportData(topology, filledGrid, assignment);
  return JSON.stringify(data, null, 2);
}

export function renderPng(
  topology: GridTopology,
  filledGrid: ReadonlyArray<ReadonlyArray<string>>,
  options: RenderOptions = {},
): Buffer {
  const { cellSize, padding, showAnswers, showNumbers } = {
    ...DEFAULT_RENDER_CONFIG,
    ...options,
  };
  const clueNumbers = getClueNumbers(topology);

  const h = topology.height;
  const w = topology.width;
  const canvasWidth = w * cellSize + padding * 2;
  const canvasHeight = h * cellSize + padding * 2;

  const canvas = createCanvas(canvasWidth, canvasHeight);
  const ctx = canvas.getContext("2d");

  ctx.fillStyle = "#ffffff";
  ctx.fillRect(0, 0, canvasWidth, canvasHeight);

  for (let r = 0; r < h; r++) {
    for (let c = 0; c < w; c++) {
      const x = padding + c * cellSize;
      const y = padding + r * cellSize;
      const isWhite = topology.shape[r]?.[c] === true;

      ctx.fillStyle = isWhite ? "#ffffff" : "#1a1a1a";
      ctx.fillRect(x, y, cellSize, cellSize);

      ctx.strokeStyle = "#1a1a1a";
      ctx.lineWidth = 1;
      ctx.strokeRect(x, y, cellSize, cellSize);

      if (!isWhite) continue;

      const clueNum = clueNumbers.get(`${r}:${c}`);
      if (showNumbers && clueNum) {
        ctx.fillStyle = "#666666";
        ctx.font = `${cellSize * 0.22}px sans-serif`;
        ctx.textAlign = "left";
        ctx.textBaseline = "top";
        ctx.fillText(String(clueNum), x + 3, y + 2);
      }

      const letter = filledGrid[r]?.[c];
      if (showAnswers && letter && letter !== BLOCKED) {
        ctx.fillStyle = "#1a1a1a";
        ctx.font = `bold ${cellSize * 0.55}px serif`;
        ctx.textAlign = "center";
        ctx.textBaseline = "middle";
        ctx.fillText(letter, x + cellSize / 2, y + cellSize / 2);
      }
    }
  }

  // Outer border (thicker)
  ctx.strokeStyle = "#1a1a1a";
  ctx.lineWidth = 2;
  ctx.strokeRect(padding, padding, w * cellSize, h * cellSize);

  return canvas.toBuffer("image/png");
}

export async function renderPdf(
  topology: GridTopology,
  filledGrid: ReadonlyArray<ReadonlyArray<string>>,
  assignment: ReadonlyMap<string, string>,
  options: RenderOptions = {},
): Promise<Uint8Array> {
  const { showAnswers, showNumbers, title } = { ...DEFAULT_RENDER_CONFIG, ...options };
  const { jsPDF } = await import("jspdf");

  const clueNumbers = getClueNumbers(topology);
  const h = topology.height;
  const w = topology.width;

  // A4 dimensions in mm
  const pageWidth = 210;
  const pageHeight = 297;
  const margin = 15;

  const pdf = new jsPDF({
    orientation: "portrait",
    unit: "mm",
    format: "a4",
  });

  pdf.setFontSize(20);
  pdf.setFont("helvetica", "bold");
  pdf.text(title, pageWidth / 2, margin + 5, { align: "center" });

  const maxGridWidth = pageWidth - margin * 2;
  const maxGridHeight = 120; // Leave room for clues
  const cellSize = Math.min(maxGridWidth / Math.max(w, 1), maxGridHeight / Math.max(h, 1), 8);
  const gridWidth = w * cellSize;
  const gridHeight = h * cellSize;
  const gridX = (pageWidth - gridWidth) / 2;
  const gridY = margin + 15;

  for (let r = 0; r < h; r++) {
    for (let c = 0; c < w; c++) {
      const x = gridX + c * cellSize;
      const y = gridY + r * cellSize;
      const isWhite = topology.shape[r]?.[c] === true;

      if (isWhite) {
        pdf.setFillColor(255, 255, 255);
      } else {
        pdf.setFillColor(30, 30, 30);
      }
      pdf.rect(x, y, cellSize, cellSize, "FD");

      if (!isWhite) continue;

      const clueNum = clueNumbers.get(`${r}:${c}`);
      if (showNumbers && clueNum) {
        pdf.setFontSize(cellSize * 0.3 * 2.83); // mm to pt, roughly
        pdf.setFont("helvetica", "normal");
        pdf.setTextColor(100, 100, 100);
        pdf.text(String(clueNum), x + 0.5, y + cellSize * 0.25);
      }

      const letter = filledGrid[r]?.[c];
      if (showAnswers && letter && letter !== BLOCKED) {
        pdf.setFontSize(cellSize * 0.6 * 2.83);
        pdf.setFont("helvetica", "bold");
        pdf.setTextColor(0, 0, 0);
        pdf.text(letter, x + cellSize / 2, y + cellSize * 0.7, {
          align: "center",
        });
      }
    }
  }

  pdf.setDrawColor(30, 30, 30);
  pdf.setLineWidth(0.5);
  pdf.rect(gridX, gridY, gridWidth, gridHeight);

  const data = buildExportData(topology, filledGrid, assignment);
  const cluesY = gridY + gridHeight + 15;
  const colWidth = (pageWidth - margin * 2) / 2;

  const columns = [
    { heading: "ACROSS", clues: data.clues.across, x: margin },
    { heading: "DOWN", clues: data.clues.down, x: margin + colWidth },
  ];
  for (const { heading, clues, x } of columns) {
    pdf.setFontSize(12);
    pdf.setFont("helvetica", "bold");
    pdf.setTextColor(0, 0, 0);
    pdf.text(heading, x, cluesY);

    pdf.setFontSize(9);
    pdf.setFont("helvetica", "normal");
    let y = cluesY + 5;
    for (const clue of clues) {
      if (y > pageHeight - margin) break;
      const answer = showAnswers ? clue.word : "_".repeat(clue.length);
      pdf.text(`${clue.number}. ${answer} (${clue.length})`, x, y);
      y += 4;
    }
  }

  return new Uint8Array(pdf.output("arraybuffer"));
}

export function outputFormatFor(outputPath: string): OutputFormat {
  const ext = extname(outputPath).toLowerCase();
  if (ext === ".png") return "png";
  if (ext === ".pdf") return "pdf";
  if (ext === ".json") return "json";
  throw new UnsupportedOutputError(
    `Unsupported output file "${outputPath}": expected .png, .pdf or .json`,
  );
}

/** Renders by file extension and writes the result to `outputPath`. */
export async function writePuzzleOutput(
  outputPath: string,
  topology: GridTopology,
  filledGrid: ReadonlyArray<ReadonlyArray<string>>,
  assignment: ReadonlyMap<string, string>,
  options: RenderOptions = {},
): Promise<OutputFormat> {
  const format = outputFormatFor(outputPath);
  switch (format) {
    case "png":
      await writeFile(outputPath, renderPng(topology, filledGrid, options));
      break;
    case "pdf":
      await writeFile(outputPath, await renderPdf(topology, filledGrid, assignment, options));
      break;
    case "json":
      await writeFile(outputPath, exportAsJson(topology, filledGrid, assignment), "utf-8");
      break;
  }
  return format;
}
