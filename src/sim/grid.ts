import type { Position } from "../shared/types.js";
import type { Result } from "../shared/result.js";
import { ok, err } from "../shared/result.js";

let nextGridId = 1;

function splitSymbols(row: string | readonly string[]): string[] {
  return typeof row === "string" ? Array.from(row) : [...row];
}

/** A cell holds exactly one code point. */
export function isSymbol(value: string): boolean {
  return Array.from(value).length === 1;
}

/**
 * Rectangular symbol map for one level. Rows are fixed at construction;
 * swapping maps means building a new Grid.
 */
export class Grid {
  readonly id: string;
  readonly width: number;
  readonly height: number;
  private readonly cells: string[][];
  private discarded = false;

  private constructor(cells: string[][], id: string) {
    this.cells = cells;
    this.id = id;
    this.height = cells.length;
    this.width = cells[0].length;
  }

  /**
   * Build a grid from text rows or symbol arrays. Every row must have the
   * same, non-zero length.
   */
  static fromRows(rows: readonly (string | readonly string[])[], id?: string): Result<Grid> {
    if (rows.length === 0) {
      return err("InvalidGridShape", "grid needs at least one row");
    }
    const cells = rows.map(splitSymbols);
    const width = cells[0].length;
    if (width === 0) {
      return err("InvalidGridShape", "grid rows must not be empty");
    }
    for (let r = 0; r < cells.length; r++) {
      if (cells[r].length !== width) {
        return err(
          "InvalidGridShape",
          `row ${r} has ${cells[r].length} cells, expected ${width}`,
        );
      }
      const c = cells[r].findIndex((symbol) => !isSymbol(symbol));
      if (c >= 0) {
        return err(
          "InvalidGridShape",
          `cell (${r},${c}) holds ${JSON.stringify(cells[r][c])}, expected one symbol`,
        );
      }
    }
    return ok(new Grid(cells, id ?? `grid_${nextGridId++}`));
  }

  static filled(width: number, height: number, symbol: string, id?: string): Result<Grid> {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      return err("InvalidGridShape", `cannot build a ${width}x${height} grid`);
    }
    if (!isSymbol(symbol)) {
      return err("InvalidGridShape", `fill ${JSON.stringify(symbol)} is not one symbol`);
    }
    const rows: string[][] = [];
    for (let r = 0; r < height; r++) {
      rows.push(new Array<string>(width).fill(symbol));
    }
    return Grid.fromRows(rows, id);
  }

  inBounds(row: number, col: number): boolean {
    return (
      Number.isInteger(row) && Number.isInteger(col) &&
      row >= 0 && row < this.height && col >= 0 && col < this.width
    );
  }

  get(row: number, col: number): Result<string> {
    if (!this.inBounds(row, col)) return this.outOfBounds(row, col);
    return ok(this.cells[row][col]);
  }

  /** Write a symbol and return the one it replaced. */
  set(row: number, col: number, symbol: string): Result<string> {
    if (!this.inBounds(row, col)) return this.outOfBounds(row, col);
    if (!isSymbol(symbol)) {
      return err("InvalidSymbol", `${JSON.stringify(symbol)} is not one symbol`);
    }
    const previous = this.cells[row][col];
    this.cells[row][col] = symbol;
    return ok(previous);
  }

  /** Non-failing lookup: null outside the grid. */
  symbolAt(pos: Readonly<Position>): string | null {
    return this.inBounds(pos.row, pos.col) ? this.cells[pos.row][pos.col] : null;
  }

  dimensions(): { width: number; height: number } {
    return { width: this.width, height: this.height };
  }

  rows(): string[] {
    return this.cells.map((row) => row.join(""));
  }

  clone(id?: string): Grid {
    return new Grid(this.cells.map((row) => [...row]), id ?? `grid_${nextGridId++}`);
  }

  /**
   * Mark the grid as no longer in use by the host. Transitions into a
   * discarded grid fail instead of relocating onto it.
   */
  discard(): void {
    this.discarded = true;
  }

  get isDiscarded(): boolean {
    return this.discarded;
  }

  private outOfBounds<T>(row: number, col: number): Result<T> {
    return err(
      "OutOfBounds",
      `(${row},${col}) is outside ${this.id} (${this.width}x${this.height})`,
    );
  }
}
