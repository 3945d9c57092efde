import type { Delta, Entity, EntityId, Position } from "../shared/types.js";
import { MoveResult } from "../shared/types.js";
import type { Grid } from "./grid.js";
import { allowsCoOccupancy, footprintCells, offset, withinBounds } from "./entity.js";
import { symbolBeneath } from "./placer.js";
import type { Underlay } from "./placer.js";

/**
 * Entities known to the movement code, for occupancy queries.
 * Footprints come from each entity's art at its current location.
 */
export class CollisionIndex {
  private readonly entities = new Map<EntityId, Entity>();

  constructor(private readonly transparent?: string) {}

  add(entity: Entity): void {
    this.entities.set(entity.id, entity);
  }

  delete(id: EntityId): boolean {
    return this.entities.delete(id);
  }

  has(id: EntityId): boolean {
    return this.entities.has(id);
  }

  /** Entities on `grid` whose footprint covers `pos`. */
  occupantsAt(grid: Grid, pos: Position): Entity[] {
    const found: Entity[] = [];
    for (const [, entity] of this.entities) {
      if (entity.location.grid !== grid) continue;
      const cells = footprintCells(entity, entity.location.pos, this.transparent);
      if (cells.some((c) => c.row === pos.row && c.col === pos.col)) {
        found.push(entity);
      }
    }
    return found;
  }

  isOccupied(grid: Grid, pos: Position, exceptId?: EntityId): boolean {
    return this.occupantsAt(grid, pos).some((e) => e.id !== exceptId);
  }
}

/**
 * Whether `pos` on `grid` may be entered.
 *
 * - Out-of-bounds cells are never enterable.
 * - Blocker symbols are impassable. The symbol checked is the one beneath
 *   `underlay`: the mover's own footprint, or a whole layer so that art
 *   drawn by other entities never counts as terrain.
 * - Another entity's footprint blocks unless both kinds allow co-occupancy.
 *   Without a mover, any occupant blocks.
 */
export function canEnter(
  grid: Grid,
  pos: Position,
  blockers: ReadonlySet<string>,
  occupancy: CollisionIndex | null,
  mover?: Entity,
  underlay: Underlay | null = null,
): boolean {
  const symbol = symbolBeneath(grid, pos, underlay);
  if (symbol === null) return false;
  if (blockers.has(symbol)) return false;

  if (occupancy) {
    for (const other of occupancy.occupantsAt(grid, pos)) {
      if (mover && other.id === mover.id) continue;
      if (!mover) return false;
      if (!allowsCoOccupancy(mover.kind) || !allowsCoOccupancy(other.kind)) return false;
    }
  }
  return true;
}

export interface MoveContext {
  blockers: ReadonlySet<string>;
  occupancy?: CollisionIndex | null;
  /** The mover's drawn footprint, or the layer holding every footprint. */
  underlay?: Underlay | null;
}

/**
 * Try to shift the entity by `delta` on its current grid. On Blocked the
 * entity is left exactly as it was.
 */
export function attemptMove(entity: Entity, delta: Delta, context: MoveContext): MoveResult {
  const { grid, pos } = entity.location;
  const target = offset(pos, delta);

  if (entity.bounds && !withinBounds(entity.bounds, target)) return MoveResult.Blocked;
  if (!canEnter(grid, target, context.blockers, context.occupancy ?? null, entity, context.underlay ?? null)) {
    return MoveResult.Blocked;
  }

  entity.location = { grid, pos: target };
  return MoveResult.Moved;
}
