import * as ROT from "rot-js";
import type { Position } from "../shared/types.js";
import type { Result } from "../shared/result.js";
import { ok } from "../shared/result.js";
import { GLYPHS } from "../shared/constants.js";
import { Grid } from "./grid.js";
import type { RandomSource } from "./rng.js";
import { createRng, randomInt, shuffle } from "./rng.js";

export interface MazeOptions {
  /** Starting node; clamped into the interior and snapped to odd coordinates. */
  start?: Position;
  /** Seed for a private RNG. Ignored when `rng` is given. */
  seed?: number;
  rng?: RandomSource;
  floor?: string;
}

export interface MazeReport {
  /** Node the walk started from, or null when the grid has no interior. */
  start: Position | null;
  /** Maze nodes reached by the walk. */
  visited: number;
  /** Cells written to floor: every node plus one connector per tree edge. */
  carved: number;
}

// Compass steps in ROT.DIRS[4] order (north, east, south, west)
const STEPS: readonly Position[] = ROT.DIRS[4].map(([dx, dy]) => ({ row: dy, col: dx }));

function alignOdd(value: number, size: number): number {
  // NaN falls back to the first interior cell; infinities clamp normally
  const v = Number.isNaN(value) ? 1 : Math.trunc(value);
  const clamped = Math.min(Math.max(v, 1), size - 2);
  return clamped % 2 === 1 ? clamped : clamped - 1;
}

/**
 * Clamp a requested start into the carvable interior (1..size-2) and snap
 * each coordinate down to the nearest odd value. Requires width, height >= 3.
 */
export function clampMazeStart(start: Position, width: number, height: number): Position {
  return { row: alignOdd(start.row, height), col: alignOdd(start.col, width) };
}

function randomMazeStart(rng: RandomSource, width: number, height: number): Position {
  // Odd interior values are 1, 3, ..., count = floor((size - 1) / 2)
  const rowSlots = Math.floor((height - 1) / 2);
  const colSlots = Math.floor((width - 1) / 2);
  return {
    row: 1 + 2 * randomInt(rng, 0, rowSlots - 1),
    col: 1 + 2 * randomInt(rng, 0, colSlots - 1),
  };
}

/**
 * Carve a perfect maze into a wall-filled grid with a randomized
 * depth-first backtracking walk.
 *
 * Nodes sit on odd (row, col); a wall cell always separates two nodes
 * until the walk carves the connector between them. The outer border is
 * never touched. Neighbour order is reshuffled on every step, so the
 * result is fully determined by the random source.
 */
export function generateMaze(grid: Grid, options: MazeOptions = {}): MazeReport {
  const { width, height } = grid.dimensions();
  if (width < 3 || height < 3) {
    return { start: null, visited: 0, carved: 0 };
  }

  const floor = options.floor ?? GLYPHS.floor;
  const rng: RandomSource = options.rng
    ?? (options.seed !== undefined ? createRng(options.seed) : ROT.RNG);
  const start = options.start
    ? clampMazeStart(options.start, width, height)
    : randomMazeStart(rng, width, height);

  const visited: boolean[][] = [];
  for (let r = 0; r < height; r++) {
    visited.push(new Array<boolean>(width).fill(false));
  }

  const isCarvable = (pos: Position): boolean =>
    pos.row >= 1 && pos.row <= height - 2 && pos.col >= 1 && pos.col <= width - 2;

  let carved = 0;
  const carve = (pos: Position): void => {
    if (grid.set(pos.row, pos.col, floor).ok) carved++;
  };

  visited[start.row][start.col] = true;
  carve(start);
  let visitedCount = 1;
  const stack: Position[] = [start];

  while (stack.length > 0) {
    const current = stack[stack.length - 1];
    let next: Position | null = null;
    let step: Position | null = null;

    for (const candidate of shuffle(rng, [...STEPS])) {
      const target = {
        row: current.row + candidate.row * 2,
        col: current.col + candidate.col * 2,
      };
      if (isCarvable(target) && !visited[target.row][target.col]) {
        next = target;
        step = candidate;
        break;
      }
    }

    if (!next || !step) {
      // Dead end: resume from the previous node
      stack.pop();
      continue;
    }

    carve({ row: current.row + step.row, col: current.col + step.col });
    visited[next.row][next.col] = true;
    carve(next);
    visitedCount++;
    stack.push(next);
  }

  return { start, visited: visitedCount, carved };
}

/**
 * Build a wall-filled grid of the given size and carve a maze into it.
 */
export function createMazeGrid(
  width: number,
  height: number,
  options: MazeOptions & { wall?: string; id?: string } = {},
): Result<{ grid: Grid; report: MazeReport }> {
  const filled = Grid.filled(width, height, options.wall ?? GLYPHS.wall, options.id);
  if (!filled.ok) return filled;
  const report = generateMaze(filled.value, options);
  return ok({ grid: filled.value, report });
}
