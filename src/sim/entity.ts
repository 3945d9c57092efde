import type {
  Bounds, Delta, Entity, EntityId, EntityKind, EntityKindType, Position,
} from "../shared/types.js";
import { Direction } from "../shared/types.js";
import { GLYPHS, TRANSPARENT_GLYPH } from "../shared/constants.js";
import type { Grid } from "./grid.js";

const DIRECTION_DELTAS: Record<Direction, Delta> = {
  [Direction.North]: { row: -1, col: 0 },
  [Direction.South]: { row: 1, col: 0 },
  [Direction.East]: { row: 0, col: 1 },
  [Direction.West]: { row: 0, col: -1 },
};

export function getDirectionDelta(dir: Direction): Delta {
  return DIRECTION_DELTAS[dir];
}

/**
 * Whether an entity of this kind may share a cell with another entity.
 * Sharing requires both sides to allow it.
 */
const CO_OCCUPANCY: Record<EntityKindType, boolean> = {
  player: false,
  npc: false,
  element: true,
};

export function allowsCoOccupancy(kind: EntityKind): boolean {
  return CO_OCCUPANCY[kind.type];
}

export interface EntitySpec {
  id: EntityId;
  kind: EntityKind;
  grid: Grid;
  pos: Position;
  art?: string;
  bounds?: Bounds | null;
  props?: Record<string, unknown>;
}

export function createEntity(spec: EntitySpec): Entity {
  return {
    id: spec.id,
    kind: spec.kind,
    location: { grid: spec.grid, pos: { ...spec.pos } },
    art: spec.art ?? (spec.kind.type === "player" ? GLYPHS.player : "?"),
    bounds: spec.bounds ?? null,
    props: spec.props ?? {},
  };
}

export function withinBounds(bounds: Bounds, pos: Position): boolean {
  return (
    pos.row >= bounds.top && pos.row <= bounds.bottom &&
    pos.col >= bounds.left && pos.col <= bounds.right
  );
}

export function offset(pos: Position, delta: Delta): Position {
  return { row: pos.row + delta.row, col: pos.col + delta.col };
}

/**
 * Split art into rows of symbols. Blank lines at the very start and end are
 * dropped so template literals can start on their own line.
 */
export function artLines(art: string): string[][] {
  const lines = art.split("\n");
  if (lines.length > 0 && lines[0] === "") lines.shift();
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines.map((line) => Array.from(line));
}

/**
 * Cells the entity's art covers when anchored at `pos` (defaults to its
 * current position). Transparent cells are not part of the footprint.
 * Cells may fall outside the grid; callers clip.
 */
export function footprintCells(
  entity: Entity,
  pos: Position = entity.location.pos,
  transparent: string = TRANSPARENT_GLYPH,
): Position[] {
  const cells: Position[] = [];
  const lines = artLines(entity.art);
  for (let y = 0; y < lines.length; y++) {
    for (let x = 0; x < lines[y].length; x++) {
      if (lines[y][x] === transparent) continue;
      cells.push({ row: pos.row + y, col: pos.col + x });
    }
  }
  return cells;
}
