import type { Result } from "../src/shared/result.js";
import type { Position } from "../src/shared/types.js";
import { Grid } from "../src/sim/grid.js";

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new Error(`${result.error.kind}: ${result.error.message}`);
  return result.value;
}

export function floorGrid(width: number, height: number, id?: string): Grid {
  return unwrap(Grid.filled(width, height, ".", id));
}

const STEPS: Position[] = [
  { row: -1, col: 0 },
  { row: 1, col: 0 },
  { row: 0, col: -1 },
  { row: 0, col: 1 },
];

/** Positions of every cell holding one of `symbols`. */
export function cellsOf(grid: Grid, symbols: string[]): Position[] {
  const found: Position[] = [];
  grid.rows().forEach((row, r) => {
    Array.from(row).forEach((symbol, c) => {
      if (symbols.includes(symbol)) found.push({ row: r, col: c });
    });
  });
  return found;
}

/**
 * Shortest 4-way path from `from` to `to` over cells not in `walls`,
 * as a list of positions excluding `from`. Null when unreachable.
 */
export function findPath(grid: Grid, from: Position, to: Position, walls: string[]): Position[] | null {
  const key = (p: Position) => `${p.row},${p.col}`;
  const prev = new Map<string, Position | null>([[key(from), null]]);
  const queue: Position[] = [from];
  while (queue.length > 0) {
    const current = queue.shift();
    if (!current) break;
    if (current.row === to.row && current.col === to.col) {
      const path: Position[] = [];
      let p: Position | null | undefined = current;
      while (p && key(p) !== key(from)) {
        path.unshift(p);
        p = prev.get(key(p));
      }
      return path;
    }
    for (const step of STEPS) {
      const next = { row: current.row + step.row, col: current.col + step.col };
      const symbol = grid.symbolAt(next);
      if (symbol === null || walls.includes(symbol) || prev.has(key(next))) continue;
      prev.set(key(next), current);
      queue.push(next);
    }
  }
  return null;
}
