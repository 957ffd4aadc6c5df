import { z } from "zod";
import { ConfigError } from "@/lib/errors";

export interface FillConfig {
  /** Shortest run of open cells that counts as a slot */
  minSlotLength: number;
  /** What to do with open cells that belong to no slot */
  orphanCells: "ignore" | "reject";
  forwardChecking: boolean;
  arcConsistency: boolean;
  preflight: boolean;
  valueOrder: "pool" | "least-constraining" | "random";
  /** Seed for random value ordering */
  seed?: number;
  /** Upper bound on tentative word placements */
  maxSteps: number;
  /** Wall-clock bound on the search, in milliseconds */
  timeoutMs?: number;
  /** Steps between progress callbacks */
  progressInterval: number;
}

export const DEFAULT_FILL_CONFIG: FillConfig = {
  minSlotLength: 2,
  orphanCells: "ignore",
  forwardChecking: true,
  arcConsistency: false,
  preflight: true,
  valueOrder: "pool",
  maxSteps: 2_000_000,
  progressInterval: 100,
};

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const positiveInt = z.coerce.number().int().positive();

const FillEnvSchema = z.object({
  CROSSWORD_MIN_SLOT_LENGTH: z.coerce.number().int().min(2).optional(),
  CROSSWORD_ORPHAN_CELLS: z.enum(["ignore", "reject"]).optional(),
  CROSSWORD_FORWARD_CHECKING: booleanFlag.optional(),
  CROSSWORD_ARC_CONSISTENCY: booleanFlag.optional(),
  CROSSWORD_VALUE_ORDER: z.enum(["pool", "least-constraining", "random"]).optional(),
  CROSSWORD_SEED: z.coerce.number().int().optional(),
  CROSSWORD_MAX_STEPS: positiveInt.optional(),
  CROSSWORD_TIMEOUT_MS: positiveInt.optional(),
});

/**
 * Applies `CROSSWORD_*` environment overrides on top of the defaults.
 * Empty values are treated as unset.
 */
export function loadFillConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
): FillConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([key, value]) => key.startsWith("CROSSWORD_") && value !== undefined && value.trim() !== "",
    ),
  );
  const parsed = FillEnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid crossword configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    minSlotLength: e.CROSSWORD_MIN_SLOT_LENGTH ?? DEFAULT_FILL_CONFIG.minSlotLength,
    orphanCells: e.CROSSWORD_ORPHAN_CELLS ?? DEFAULT_FILL_CONFIG.orphanCells,
    forwardChecking: e.CROSSWORD_FORWARD_CHECKING ?? DEFAULT_FILL_CONFIG.forwardChecking,
    arcConsistency: e.CROSSWORD_ARC_CONSISTENCY ?? DEFAULT_FILL_CONFIG.arcConsistency,
    preflight: DEFAULT_FILL_CONFIG.preflight,
    valueOrder: e.CROSSWORD_VALUE_ORDER ?? DEFAULT_FILL_CONFIG.valueOrder,
    seed: e.CROSSWORD_SEED ?? DEFAULT_FILL_CONFIG.seed,
    maxSteps: e.CROSSWORD_MAX_STEPS ?? DEFAULT_FILL_CONFIG.maxSteps,
    timeoutMs: e.CROSSWORD_TIMEOUT_MS ?? DEFAULT_FILL_CONFIG.timeoutMs,
    progressInterval: DEFAULT_FILL_CONFIG.progressInterval,
  };
}
