#!/usr/bin/env node

import { readFileSync, writeFileSync } from "fs";
import { normalizeWordListText } from "../src/lib/loadPuzzle";

const USAGE = "Usage: normalize-words <input_path> [output_path]";

function normalizeWords(args: ReadonlyArray<string>) {
  const [inputPath, maybeOutputPath] = args;
  if (!inputPath) throw new Error(USAGE);
  const outputPath = maybeOutputPath ?? inputPath.replace(/(\.txt)?$/, ".normalized.txt");

  console.log(`Reading ${inputPath}...`);
  const content = readFileSync(inputPath, "utf-8");
  const { words, lineCount } = normalizeWordListText(content);

  writeFileSync(outputPath, words.join("\n") + "\n", "utf-8");

  console.log(`Successfully normalized ${lineCount} lines into ${words.length} unique words`);
  console.log(`Output written to ${outputPath}`);
}

try {
  normalizeWords(process.argv.slice(2));
} catch (error) {
  console.error("Error:", error instanceof Error ? error.message : error);
  process.exit(1);
}
