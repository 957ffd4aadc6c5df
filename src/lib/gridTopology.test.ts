import { describe, it, expect } from "vitest";
import { ConfigError, MalformedGridError } from "./errors";
import {
  assertDistinctSlots,
  buildGridTopology,
  crossingsBySlot,
  getClueNumbers,
  type Slot,
} from "./gridTopology";

const T = true;
const F = false;

/**
 *  . X .
 *  X X X
 *  . X .
 */
const CROSS = [
  [F, T, F],
  [T, T, T],
  [F, T, F],
];

describe("buildGridTopology", () => {
  it("finds one across and one down slot crossing at their middles", () => {
    const topology = buildGridTopology(CROSS);

    expect(topology.slots.map((s) => s.id)).toEqual(["A:1:0", "D:0:1"]);
    expect(topology.slots[0]?.cells).toEqual([
      { r: 1, c: 0 },
      { r: 1, c: 1 },
      { r: 1, c: 2 },
    ]);
    expect(topology.intersections).toEqual([
      {
        across: "A:1:0",
        down: "D:0:1",
        cell: { r: 1, c: 1 },
        acrossOffset: 1,
        downOffset: 1,
      },
    ]);
  });

  it("records each crossing from both sides", () => {
    const crossings = crossingsBySlot(buildGridTopology(CROSS));

    expect(crossings.get("A:1:0")).toEqual([
      { otherSlotId: "D:0:1", offset: 1, otherOffset: 1 },
    ]);
    expect(crossings.get("D:0:1")).toEqual([
      { otherSlotId: "A:1:0", offset: 1, otherOffset: 1 },
    ]);
  });

  it("builds every across/down crossing of an open 3x3 grid", () => {
    const topology = buildGridTopology([
      [T, T, T],
      [T, T, T],
      [T, T, T],
    ]);

    expect(topology.slots).toHaveLength(6);
    expect(topology.intersections).toHaveLength(9);
    for (const x of topology.intersections) {
      expect(x.across.startsWith("A:")).toBe(true);
      expect(x.down.startsWith("D:")).toBe(true);
      expect(x.acrossOffset).toBe(x.cell.c);
      expect(x.downOffset).toBe(x.cell.r);
    }
  });

  it("numbers clue starts in row-major order", () => {
    const topology = buildGridTopology([
      [T, T, T],
      [T, T, T],
      [T, T, T],
    ]);

    expect(topology.entries).toEqual([
      { number: 1, cell: { r: 0, c: 0 }, across: "A:0:0", down: "D:0:0" },
      { number: 2, cell: { r: 0, c: 1 }, across: null, down: "D:0:1" },
      { number: 3, cell: { r: 0, c: 2 }, across: null, down: "D:0:2" },
      { number: 4, cell: { r: 1, c: 0 }, across: "A:1:0", down: null },
      { number: 5, cell: { r: 2, c: 0 }, across: "A:2:0", down: null },
    ]);
    expect(getClueNumbers(buildGridTopology(CROSS))).toEqual(
      new Map([
        ["0:1", 1],
        ["1:0", 2],
      ]),
    );
  });

  it("drops runs shorter than the minimum slot length", () => {
    const topology = buildGridTopology(
      [
        [T, T, F, T, T, T],
        [F, F, F, F, F, F],
      ],
      { minSlotLength: 3 },
    );

    expect(topology.slots.map((s) => s.id)).toEqual(["A:0:3"]);
  });

  it("returns no slots for a grid with every cell closed", () => {
    const topology = buildGridTopology([
      [F, F],
      [F, F],
    ]);

    expect(topology.slots).toEqual([]);
    expect(topology.intersections).toEqual([]);
    expect(topology.entries).toEqual([]);
    expect(topology.height).toBe(2);
    expect(topology.width).toBe(2);
  });

  it("rejects a non-rectangular shape", () => {
    expect(() => buildGridTopology([[T, T], [T]])).toThrow(MalformedGridError);
  });

  it("rejects a minimum slot length below 2", () => {
    expect(() => buildGridTopology(CROSS, { minSlotLength: 1 })).toThrow(ConfigError);
  });

  describe("open cells outside every slot", () => {
    const lonely = [
      [T, F],
      [F, F],
    ];

    it("leaves them as filler by default", () => {
      expect(buildGridTopology(lonely).slots).toEqual([]);
    });

    it("throws when asked to reject them", () => {
      expect(() => buildGridTopology(lonely, { orphanCells: "reject" })).toThrow(
        "1 open cell(s) belong to no slot of length ≥ 2: (0, 0)",
      );
    });

    it("does not count a cell that is only unchecked in one direction", () => {
      expect(() => buildGridTopology(CROSS, { orphanCells: "reject" })).not.toThrow();
    });
  });
});

describe("assertDistinctSlots", () => {
  const slot = (id: string): Slot => ({
    id,
    dir: "across",
    start: { r: 0, c: 0 },
    cells: [
      { r: 0, c: 0 },
      { r: 0, c: 1 },
    ],
    length: 2,
  });

  it("rejects a repeated id", () => {
    expect(() => assertDistinctSlots([slot("A:0:0"), slot("A:0:0")])).toThrow(
      "Duplicate slot id: A:0:0",
    );
  });

  it("rejects two slots over the same cells in one direction", () => {
    expect(() => assertDistinctSlots([slot("A:0:0"), slot("extra")])).toThrow(
      "Slot extra covers the same cells as another across slot",
    );
  });

  it("accepts the slots of a built topology", () => {
    expect(() => assertDistinctSlots(buildGridTopology(CROSS).slots)).not.toThrow();
  });
});
