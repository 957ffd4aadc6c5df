export type CrosswordErrorCode =
  | "malformed_grid"
  | "unsatisfiable"
  | "insufficient_pool"
  | "search_budget_exceeded"
  | "search_cancelled"
  | "unsupported_output"
  | "config";

export abstract class CrosswordError extends Error {
  abstract readonly code: CrosswordErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The shape or a hand-built topology is structurally invalid. */
export class MalformedGridError extends CrosswordError {
  readonly code = "malformed_grid";
}

/** Every branch of the search was explored without a complete fill. */
export class UnsatisfiableError extends CrosswordError {
  readonly code: CrosswordErrorCode = "unsatisfiable";
}

export type PoolShortfall = Readonly<{
  length: number;
  slotCount: number;
  wordCount: number;
}>;

/**
 * Raised before search when some slot length has fewer distinct words than
 * slots. Still an {@link UnsatisfiableError}: no fill exists.
 */
export class InsufficientPoolError extends UnsatisfiableError {
  override readonly code = "insufficient_pool";
  readonly shortfalls: ReadonlyArray<PoolShortfall>;

  constructor(shortfalls: ReadonlyArray<PoolShortfall>) {
    const details = shortfalls
      .map(
        ({ length, slotCount, wordCount }) =>
          `${slotCount} slot(s) of length ${length} but ${wordCount} unique word(s)`,
      )
      .join("; ");
    super(`Word list cannot cover the grid: ${details}`);
    this.shortfalls = shortfalls;
  }
}

export type SearchBudgetKind = "steps" | "time";

export class SearchBudgetExceededError extends CrosswordError {
  readonly code = "search_budget_exceeded";
  readonly kind: SearchBudgetKind;
  readonly limit: number;

  constructor(kind: SearchBudgetKind, limit: number) {
    super(
      kind === "steps"
        ? `Maximum steps exceeded: ${limit.toLocaleString("en-US")} steps reached without finding a solution`
        : `Time limit exceeded: no solution found within ${limit.toLocaleString("en-US")} ms`,
    );
    this.kind = kind;
    this.limit = limit;
  }
}

export class SearchCancelledError extends CrosswordError {
  readonly code = "search_cancelled";

  constructor() {
    super("Generation was cancelled");
  }
}

export class UnsupportedOutputError extends CrosswordError {
  readonly code = "unsupported_output";
}

export class ConfigError extends CrosswordError {
  readonly code = "config";
}
