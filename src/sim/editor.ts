import type { Delta, Entity, EntityId } from "../shared/types.js";
import { MoveResult } from "../shared/types.js";
import type { Result } from "../shared/result.js";
import { ok, err } from "../shared/result.js";
import { GLYPHS, TRANSPARENT_GLYPH } from "../shared/constants.js";
import { Grid } from "./grid.js";
import { CollisionIndex, attemptMove } from "./collision.js";
import { FootprintLayer } from "./placer.js";

export interface FrameGlyphs {
  floor: string;
  horizontal: string;
  vertical: string;
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
}

const DEFAULT_FRAME: FrameGlyphs = {
  floor: GLYPHS.floor,
  horizontal: GLYPHS.frameHorizontal,
  vertical: GLYPHS.frameVertical,
  topLeft: GLYPHS.frameTopLeft,
  topRight: GLYPHS.frameTopRight,
  bottomLeft: GLYPHS.frameBottomLeft,
  bottomRight: GLYPHS.frameBottomRight,
};

/**
 * Floor grid surrounded by a box-drawing border.
 */
export function createFrame(width: number, height: number, glyphs: Partial<FrameGlyphs> = {}): Result<Grid> {
  const g = { ...DEFAULT_FRAME, ...glyphs };
  if (width < 2 || height < 2) {
    return err("InvalidGridShape", `frame must be at least 2x2, got ${width}x${height}`);
  }
  const rows: string[][] = [];
  for (let r = 0; r < height; r++) {
    const row: string[] = [];
    for (let c = 0; c < width; c++) {
      if (r === 0 || r === height - 1) row.push(g.horizontal);
      else if (c === 0 || c === width - 1) row.push(g.vertical);
      else row.push(g.floor);
    }
    rows.push(row);
  }
  rows[0][0] = g.topLeft;
  rows[0][width - 1] = g.topRight;
  rows[height - 1][0] = g.bottomLeft;
  rows[height - 1][width - 1] = g.bottomRight;
  return Grid.fromRows(rows);
}

/**
 * Arranges draggable art elements on a framed grid. Elements stay inside
 * the frame and may overlap each other; one element is selected at a time.
 */
export class GridEditor {
  readonly grid: Grid;
  private readonly elements: Entity[] = [];
  private readonly layer: FootprintLayer;
  private readonly collisions: CollisionIndex;
  private readonly blockers: ReadonlySet<string> = new Set();
  private selectedIndex = 0;

  constructor(grid: Grid, transparent: string = TRANSPARENT_GLYPH) {
    this.grid = grid;
    this.layer = new FootprintLayer(transparent);
    this.collisions = new CollisionIndex(transparent);
  }

  get size(): number {
    return this.elements.length;
  }

  get selected(): Entity | null {
    return this.elements[this.selectedIndex] ?? null;
  }

  list(): readonly Entity[] {
    return this.elements;
  }

  /**
   * Add an element, confining it to the frame interior, and draw it.
   * The element's location is moved onto the editor grid.
   */
  addElement(element: Entity): Result<Entity> {
    if (this.elements.some((e) => e.id === element.id)) {
      return err("DuplicateEntity", `element ${element.id} already exists`);
    }
    const { pos } = element.location;
    if (!this.grid.inBounds(pos.row, pos.col)) {
      return err("OutOfBounds", `(${pos.row},${pos.col}) is outside the editor grid`);
    }
    element.bounds = { top: 1, left: 1, bottom: this.grid.height - 2, right: this.grid.width - 2 };
    element.location = { grid: this.grid, pos: { ...pos } };
    this.elements.push(element);
    this.collisions.add(element);
    this.layer.draw(element);
    return ok(element);
  }

  removeElement(id: EntityId): boolean {
    const index = this.elements.findIndex((e) => e.id === id);
    if (index < 0) return false;
    this.layer.erase(id);
    this.collisions.delete(id);
    this.elements.splice(index, 1);
    if (this.selectedIndex >= this.elements.length) {
      this.selectedIndex = Math.max(0, this.elements.length - 1);
    }
    return true;
  }

  selectNext(): Entity | null {
    if (this.elements.length > 0) {
      this.selectedIndex = (this.selectedIndex + 1) % this.elements.length;
    }
    return this.selected;
  }

  selectPrevious(): Entity | null {
    if (this.elements.length > 0) {
      this.selectedIndex = (this.selectedIndex - 1 + this.elements.length) % this.elements.length;
    }
    return this.selected;
  }

  moveSelected(delta: Delta): MoveResult {
    const element = this.selected;
    if (!element) return MoveResult.Blocked;
    const result = attemptMove(element, delta, {
      blockers: this.blockers,
      occupancy: this.collisions,
      underlay: this.layer,
    });
    if (result === MoveResult.Moved) this.layer.draw(element);
    return result;
  }

  rows(): string[] {
    return this.grid.rows();
  }
}
