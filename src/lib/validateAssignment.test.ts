import { describe, it, expect } from "vitest";
import { buildGridTopology } from "./gridTopology";
import { validateAssignment } from "./validateAssignment";
import { buildDictionaryIndex } from "./wordPool";

const TEE = buildGridTopology([
  [true, true, true],
  [false, true, false],
  [false, true, false],
]);
const POOL = buildDictionaryIndex(["CAT", "DOG", "ACE"]);

describe("validateAssignment", () => {
  it("accepts a consistent fill", () => {
    const assignment = new Map([
      ["A:0:0", "CAT"],
      ["D:0:1", "ACE"],
    ]);

    expect(validateAssignment(TEE, POOL, assignment)).toEqual([]);
  });

  it("reports a letter conflict at the shared cell", () => {
    const assignment = new Map([
      ["A:0:0", "CAT"],
      ["D:0:1", "DOG"],
    ]);

    expect(validateAssignment(TEE, POOL, assignment)).toEqual([
      {
        kind: "letter_conflict",
        across: "A:0:0",
        down: "D:0:1",
        r: 0,
        c: 1,
        acrossLetter: "A",
        downLetter: "D",
      },
    ]);
  });

  it("reports missing and unknown slots", () => {
    const assignment = new Map([
      ["A:0:0", "CAT"],
      ["A:9:9", "DOG"],
    ]);

    expect(validateAssignment(TEE, POOL, assignment)).toEqual([
      { kind: "unknown_slot", slotId: "A:9:9" },
      { kind: "missing_slot", slotId: "D:0:1" },
    ]);
  });

  it("reports a word used twice, outside the pool and of the wrong length", () => {
    const reused = new Map([
      ["A:0:0", "ACE"],
      ["D:0:1", "ACE"],
    ]);
    expect(validateAssignment(TEE, POOL, reused)).toEqual([
      { kind: "reused_word", word: "ACE", slotIds: ["A:0:0", "D:0:1"] },
      {
        kind: "letter_conflict",
        across: "A:0:0",
        down: "D:0:1",
        r: 0,
        c: 1,
        acrossLetter: "C",
        downLetter: "A",
      },
    ]);

    const foreign = new Map([
      ["A:0:0", "BAT"],
      ["D:0:1", "AXES"],
    ]);
    expect(validateAssignment(TEE, POOL, foreign)).toEqual([
      { kind: "not_in_pool", slotId: "A:0:0", word: "BAT" },
      { kind: "length_mismatch", slotId: "D:0:1", word: "AXES", expected: 3 },
      { kind: "not_in_pool", slotId: "D:0:1", word: "AXES" },
    ]);
  });
});
