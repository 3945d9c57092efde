import type { Entity, EntityId, Footprint, FootprintCell, Position } from "../shared/types.js";
import { TRANSPARENT_GLYPH } from "../shared/constants.js";
import type { Grid } from "./grid.js";
import { artLines } from "./entity.js";

/**
 * Draw the entity's art onto `grid` with its top-left at the entity position.
 * Cells outside the grid are clipped and transparent cells are skipped.
 *
 * The returned footprint holds the symbols that were overwritten; pass it to
 * `remove` before drawing the same entity again. Placing twice without a
 * removal in between records the entity's own glyphs as "prior" symbols.
 */
export function place(grid: Grid, entity: Entity, transparent: string = TRANSPARENT_GLYPH): Footprint {
  const { row: top, col: left } = entity.location.pos;
  const cells: FootprintCell[] = [];
  const lines = artLines(entity.art);

  for (let y = 0; y < lines.length; y++) {
    for (let x = 0; x < lines[y].length; x++) {
      const symbol = lines[y][x];
      if (symbol === transparent) continue;
      const row = top + y;
      const col = left + x;
      const previous = grid.set(row, col, symbol);
      if (previous.ok) {
        cells.push({ row, col, symbol: previous.value });
      }
    }
  }

  return { entityId: entity.id, grid, cells };
}

/**
 * Undo a `place`. Writes nothing and returns false when the footprint was
 * recorded on another grid.
 */
export function remove(grid: Grid, footprint: Footprint): boolean {
  if (footprint.grid !== grid) return false;
  for (let i = footprint.cells.length - 1; i >= 0; i--) {
    const cell = footprint.cells[i];
    grid.set(cell.row, cell.col, cell.symbol);
  }
  return true;
}

/** What to look beneath: one footprint, or every footprint in a layer. */
export type Underlay = Footprint | FootprintLayer;

function recordedAt(footprint: Footprint, grid: Grid, pos: Position): string | null {
  if (footprint.grid !== grid) return null;
  const cell = footprint.cells.find((c) => c.row === pos.row && c.col === pos.col);
  return cell ? cell.symbol : null;
}

/**
 * Symbol at `pos` as it would read with the underlay erased. Null outside
 * the grid.
 */
export function symbolBeneath(grid: Grid, pos: Position, underlay: Underlay | null): string | null {
  if (underlay instanceof FootprintLayer) return underlay.terrainAt(grid, pos);
  if (underlay) {
    const recorded = recordedAt(underlay, grid, pos);
    if (recorded !== null) return recorded;
  }
  return grid.symbolAt(pos);
}

/**
 * Ordered stack of drawn footprints. Redrawing one entity unwinds the whole
 * stack newest-first and replays it, so overlapping art never leaves stale
 * glyphs behind. The redrawn entity ends up on top.
 */
export class FootprintLayer {
  private readonly records = new Map<EntityId, { entity: Entity; footprint: Footprint }>();

  constructor(private readonly transparent: string = TRANSPARENT_GLYPH) {}

  get(id: EntityId): Footprint | null {
    return this.records.get(id)?.footprint ?? null;
  }

  has(id: EntityId): boolean {
    return this.records.has(id);
  }

  get size(): number {
    return this.records.size;
  }

  /** Draw (or redraw) the entity on its current grid, on top of the stack. */
  draw(entity: Entity): Footprint {
    const others = this.unwind();
    this.records.clear();
    for (const { entity: other } of others) {
      if (other.id === entity.id) continue;
      this.stamp(other);
    }
    return this.stamp(entity);
  }

  /**
   * Symbol at `pos` with every footprint erased. The oldest footprint
   * covering a cell recorded the grid's own symbol there.
   */
  terrainAt(grid: Grid, pos: Position): string | null {
    for (const { footprint } of this.records.values()) {
      const recorded = recordedAt(footprint, grid, pos);
      if (recorded !== null) return recorded;
    }
    return grid.symbolAt(pos);
  }

  /** Erase the entity's footprint; false if it was not drawn. */
  erase(id: EntityId): boolean {
    if (!this.records.has(id)) return false;
    const others = this.unwind();
    this.records.clear();
    for (const { entity } of others) {
      if (entity.id === id) continue;
      this.stamp(entity);
    }
    return true;
  }

  /** Erase everything, leaving each grid as it was before any draw. */
  clear(): void {
    this.unwind();
    this.records.clear();
  }

  private unwind(): { entity: Entity; footprint: Footprint }[] {
    const ordered = [...this.records.values()];
    for (let i = ordered.length - 1; i >= 0; i--) {
      const { footprint } = ordered[i];
      remove(footprint.grid, footprint);
    }
    return ordered;
  }

  private stamp(entity: Entity): Footprint {
    const footprint = place(entity.location.grid, entity, this.transparent);
    this.records.set(entity.id, { entity, footprint });
    return footprint;
  }
}
