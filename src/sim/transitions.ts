import type { Entity, Location, Position } from "../shared/types.js";
import type { Result } from "../shared/result.js";
import { ok, err } from "../shared/result.js";
import type { Grid } from "./grid.js";
import { symbolBeneath } from "./placer.js";
import type { Underlay } from "./placer.js";

/**
 * Directed portal edge: stepping onto `portal` on `source` sends the entity
 * to `spawn` on `destination`. Many links may share a destination.
 */
export interface TransitionLink {
  readonly source: Grid;
  readonly portal: string;
  readonly destination: Grid;
  readonly spawn: Readonly<Position>;
}

export function createTransitionLink(
  source: Grid,
  portal: string,
  destination: Grid,
  spawn: Position,
): TransitionLink {
  return Object.freeze({
    source,
    portal,
    destination,
    spawn: Object.freeze({ row: spawn.row, col: spawn.col }),
  });
}

/**
 * Move the entity to the link's destination. Grid and position change in a
 * single assignment. The spawn cell is not checked for further portals.
 */
export function applyTransition(link: TransitionLink, entity: Entity): Result<Location> {
  const { destination, spawn } = link;
  if (destination.isDiscarded) {
    return err(
      "DanglingTransition",
      `portal "${link.portal}" on ${link.source.id} leads to discarded grid ${destination.id}`,
    );
  }
  if (!destination.inBounds(spawn.row, spawn.col)) {
    return err(
      "OutOfBounds",
      `spawn (${spawn.row},${spawn.col}) is outside ${destination.id}`,
    );
  }
  const location: Location = { grid: destination, pos: { row: spawn.row, col: spawn.col } };
  entity.location = location;
  return ok(location);
}

/**
 * Portal registry keyed by source grid and portal symbol.
 */
export class TransitionTable {
  private readonly links = new Map<Grid, Map<string, TransitionLink>>();

  /** Register a link; returns the link it replaced, if any. */
  register(link: TransitionLink): TransitionLink | null {
    let bySymbol = this.links.get(link.source);
    if (!bySymbol) {
      bySymbol = new Map();
      this.links.set(link.source, bySymbol);
    }
    const previous = bySymbol.get(link.portal) ?? null;
    bySymbol.set(link.portal, link);
    return previous;
  }

  unregister(source: Grid, portal: string): boolean {
    const bySymbol = this.links.get(source);
    if (!bySymbol) return false;
    const removed = bySymbol.delete(portal);
    if (bySymbol.size === 0) this.links.delete(source);
    return removed;
  }

  /** Drop every link leaving `source`. */
  unregisterAll(source: Grid): number {
    const count = this.links.get(source)?.size ?? 0;
    this.links.delete(source);
    return count;
  }

  linksFrom(source: Grid): TransitionLink[] {
    return [...(this.links.get(source)?.values() ?? [])];
  }

  linksInto(destination: Grid): TransitionLink[] {
    const found: TransitionLink[] = [];
    for (const [, bySymbol] of this.links) {
      for (const [, link] of bySymbol) {
        if (link.destination === destination) found.push(link);
      }
    }
    return found;
  }

  /**
   * The link triggered by standing at `pos`, or null when the cell is not a
   * registered portal. Pass a footprint or layer to look beneath drawn art.
   */
  checkTransition(grid: Grid, pos: Position, underlay: Underlay | null = null): TransitionLink | null {
    const bySymbol = this.links.get(grid);
    if (!bySymbol) return null;
    const symbol = symbolBeneath(grid, pos, underlay);
    if (symbol === null) return null;
    return bySymbol.get(symbol) ?? null;
  }
}
