import { loadFillConfig } from "@/config/fillConfig";
import { analyzeCrosswordShape } from "@/lib/analyzeShape";
import { fillGrid } from "@/lib/crosswordFill";
import { CrosswordError } from "@/lib/errors";
import { outputFormatFor, writePuzzleOutput } from "@/lib/exportPuzzle";
import { buildGridTopology } from "@/lib/gridTopology";
import { renderText } from "@/lib/letterGrid";
import { loadPuzzleFiles } from "@/lib/loadPuzzle";
import { buildDictionaryIndex } from "@/lib/wordPool";

export const USAGE =
  "Usage: generate <structure_path> <words_path> <output_image_path>";

const PROGRESS_LOG_EVERY = 100_000;

/** Runs the `generate` command and resolves to its exit code. */
export async function runGenerate(
  args: ReadonlyArray<string>,
  env: Readonly<Record<string, string | undefined>> = process.env,
): Promise<number> {
  const [structurePath, wordsPath, outputPath] = args;
  if (args.length !== 3 || !structurePath || !wordsPath || !outputPath) {
    console.error(USAGE);
    return 1;
  }

  try {
    const config = loadFillConfig(env);
    outputFormatFor(outputPath);

    const { shape, words } = await loadPuzzleFiles(structurePath, wordsPath);
    const pool = buildDictionaryIndex(words);

    const analysis = analyzeCrosswordShape({
      shape,
      dictionaryIndex: pool,
      minSlotLength: config.minSlotLength,
    });
    for (const issue of analysis.issues) {
      if (issue.severity === "warning") console.warn(`[Crossword Shape] ${issue.message}`);
    }

    const topology = buildGridTopology(shape, config);
    console.log(
      `Filling ${topology.slots.length} slot(s) from ${pool.normalizedWords.length.toLocaleString("en-US")} word(s)...`,
    );

    const startTime = performance.now();
    const result = fillGrid(topology, pool, config, (steps) => {
      if (steps % PROGRESS_LOG_EVERY === 0) {
        console.log(`  ${steps.toLocaleString("en-US")} steps...`);
      }
      return true;
    });
    const elapsedMs = Math.round(performance.now() - startTime);

    if (!result.ok) {
      console.error(`[Crossword Generation Failed] ${result.reason}`);
      return 1;
    }

    console.log(renderText(result.grid));
    const format = await writePuzzleOutput(
      outputPath,
      topology,
      result.grid,
      result.assignment,
    );
    console.log(
      `Output written to ${outputPath} (${format}, ${result.steps.toLocaleString("en-US")} steps, ${elapsedMs} ms)`,
    );
    return 0;
  } catch (error) {
    if (error instanceof CrosswordError) {
      console.error(`[Crossword Generation Failed] ${error.message}`);
      return 1;
    }
    console.error("Error:", error instanceof Error ? error.message : error);
    return 1;
  }
}
