import { describe, it, expect } from "vitest";
import * as ROT from "rot-js";
import { Grid } from "../src/sim/grid.js";
import { generateMaze, createMazeGrid, clampMazeStart } from "../src/sim/maze.js";
import { createRng } from "../src/sim/rng.js";
import type { Position } from "../src/shared/types.js";
import { unwrap, cellsOf } from "./helpers.js";

function wallGrid(width: number, height: number): Grid {
  return unwrap(Grid.filled(width, height, "#"));
}

/**
 * Floor cells reachable from `start`, and the number of floor-floor
 * adjacencies in the whole grid.
 */
function floorGraph(grid: Grid, start: Position): { floor: number; reachable: number; edges: number } {
  const floorCells = cellsOf(grid, ["."]);
  const isFloor = (r: number, c: number) => grid.symbolAt({ row: r, col: c }) === ".";

  let edges = 0;
  for (const { row, col } of floorCells) {
    if (isFloor(row, col + 1)) edges++;
    if (isFloor(row + 1, col)) edges++;
  }

  const seen = new Set<string>([`${start.row},${start.col}`]);
  const queue: Position[] = [start];
  while (queue.length > 0) {
    const cur = queue.pop();
    if (!cur) break;
    for (const [dr, dc] of [[1, 0], [-1, 0], [0, 1], [0, -1]]) {
      const r = cur.row + dr;
      const c = cur.col + dc;
      if (isFloor(r, c) && !seen.has(`${r},${c}`)) {
        seen.add(`${r},${c}`);
        queue.push({ row: r, col: c });
      }
    }
  }

  return { floor: floorCells.length, reachable: seen.size, edges };
}

describe("Maze generation", () => {
  describe("5x5 from (1,1)", () => {
    const grid = wallGrid(5, 5);
    const report = generateMaze(grid, { start: { row: 1, col: 1 }, seed: 42 });
    const rows = grid.rows();

    it("visits all four nodes", () => {
      expect(report.start).toEqual({ row: 1, col: 1 });
      expect(report.visited).toBe(4);
      expect(report.carved).toBe(7);
    });

    it("leaves the outer border as walls", () => {
      expect(rows[0]).toBe("#####");
      expect(rows[4]).toBe("#####");
      for (const row of rows) {
        expect(row[0]).toBe("#");
        expect(row[4]).toBe("#");
      }
    });

    it("produces a connected floor region touching (1,1)", () => {
      expect(grid.symbolAt({ row: 1, col: 1 })).toBe(".");
      const graph = floorGraph(grid, { row: 1, col: 1 });
      expect(graph.floor).toBe(7);
      expect(graph.reachable).toBe(7);
    });

    it("never carves the centre pillar", () => {
      expect(grid.symbolAt({ row: 2, col: 2 })).toBe("#");
    });
  });

  describe("perfect maze property", () => {
    const seeds = [1, 7, 42, 2024];

    seeds.forEach((seed) => {
      it(`seed ${seed}: every floor cell is reachable and there are no cycles`, () => {
        const { grid, report } = unwrap(createMazeGrid(21, 11, { seed, start: { row: 1, col: 1 } }));
        const graph = floorGraph(grid, { row: 1, col: 1 });

        expect(report.visited).toBe(50);
        expect(report.carved).toBe(99);
        expect(graph.floor).toBe(99);
        expect(graph.reachable).toBe(graph.floor);
        expect(graph.edges).toBe(graph.floor - 1);
      });
    });
  });

  describe("determinism", () => {
    it("produces identical grids for the same seed", () => {
      const a = unwrap(createMazeGrid(31, 15, { seed: 7 }));
      const b = unwrap(createMazeGrid(31, 15, { seed: 7 }));
      expect(a.grid.rows()).toEqual(b.grid.rows());
      expect(a.report).toEqual(b.report);
    });

    it("treats a seed and an injected RNG with that seed the same", () => {
      const seeded = wallGrid(15, 9);
      const injected = wallGrid(15, 9);
      generateMaze(seeded, { seed: 99 });
      generateMaze(injected, { rng: createRng(99) });
      expect(injected.rows()).toEqual(seeded.rows());
    });

    it("produces different layouts for different seeds", () => {
      const a = unwrap(createMazeGrid(41, 21, { seed: 1, start: { row: 1, col: 1 } }));
      const b = unwrap(createMazeGrid(41, 21, { seed: 2, start: { row: 1, col: 1 } }));
      expect(a.grid.rows()).not.toEqual(b.grid.rows());
    });

    it("leaves the global rot-js RNG untouched when seeded", () => {
      const before = ROT.RNG.getState();
      createMazeGrid(15, 9, { seed: 5 });
      expect(ROT.RNG.getState()).toEqual(before);
    });
  });

  describe("start cell", () => {
    it("clamps into the interior and snaps to odd coordinates", () => {
      expect(clampMazeStart({ row: 0, col: 0 }, 7, 7)).toEqual({ row: 1, col: 1 });
      expect(clampMazeStart({ row: 100, col: -5 }, 7, 7)).toEqual({ row: 5, col: 1 });
      expect(clampMazeStart({ row: 2, col: 6 }, 9, 9)).toEqual({ row: 1, col: 5 });
      expect(clampMazeStart({ row: 4, col: 4 }, 7, 7)).toEqual({ row: 3, col: 3 });
    });

    it("reports the clamped start", () => {
      const grid = wallGrid(7, 7);
      const report = generateMaze(grid, { start: { row: 2, col: 2 }, seed: 3 });
      expect(report.start).toEqual({ row: 1, col: 1 });
    });

    it("clamps non-finite coordinates instead of failing", () => {
      expect(clampMazeStart({ row: NaN, col: Infinity }, 7, 7)).toEqual({ row: 1, col: 5 });
      expect(clampMazeStart({ row: -Infinity, col: NaN }, 9, 9)).toEqual({ row: 1, col: 1 });

      const grid = wallGrid(7, 7);
      const report = generateMaze(grid, { seed: 1, start: { row: NaN, col: 1 } });
      expect(report.start).toEqual({ row: 1, col: 1 });
      expect(report.visited).toBe(9);
      expect(grid.symbolAt({ row: 1, col: 1 })).toBe(".");
    });

    it("picks an odd interior start when none is given", () => {
      const { report } = unwrap(createMazeGrid(15, 9, { seed: 3 }));
      expect(report.start).not.toBeNull();
      if (report.start) {
        expect(report.start.row % 2).toBe(1);
        expect(report.start.col % 2).toBe(1);
        expect(report.start.row).toBeLessThanOrEqual(7);
        expect(report.start.col).toBeLessThanOrEqual(13);
      }
    });
  });

  describe("edge cases", () => {
    it("carves a single node in a 3x3 grid", () => {
      const grid = wallGrid(3, 3);
      const report = generateMaze(grid, { seed: 1 });
      expect(report).toEqual({ start: { row: 1, col: 1 }, visited: 1, carved: 1 });
      expect(grid.rows()).toEqual(["###", "#.#", "###"]);
    });

    it("carves nothing in grids smaller than 3x3", () => {
      for (const [w, h] of [[2, 2], [1, 5], [5, 2]]) {
        const grid = wallGrid(w, h);
        const before = grid.rows();
        const report = generateMaze(grid, { seed: 1, start: { row: 1, col: 1 } });
        expect(report).toEqual({ start: null, visited: 0, carved: 0 });
        expect(grid.rows()).toEqual(before);
      }
    });

    it("keeps the last even row and column walled", () => {
      const grid = wallGrid(6, 6);
      const report = generateMaze(grid, { seed: 11, start: { row: 1, col: 1 } });
      const rows = grid.rows();
      expect(report.visited).toBe(4);
      expect(rows[4]).toBe("######");
      expect(rows[5]).toBe("######");
      for (const row of rows) {
        expect(row[4]).toBe("#");
        expect(row[5]).toBe("#");
      }
    });

    it("uses a custom floor symbol", () => {
      const grid = wallGrid(3, 3);
      generateMaze(grid, { seed: 1, floor: " " });
      expect(grid.rows()[1]).toBe("# #");
    });
  });
});
