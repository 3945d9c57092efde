import type {
  Delta, Entity, EntityId, Footprint, Location, Position, WorldCommand,
} from "../shared/types.js";
import { MoveResult } from "../shared/types.js";
import type { Result } from "../shared/result.js";
import { ok, err } from "../shared/result.js";
import { DEFAULT_BLOCKERS, TRANSPARENT_GLYPH } from "../shared/constants.js";
import type { Grid } from "./grid.js";
import { CollisionIndex, attemptMove, canEnter } from "./collision.js";
import { FootprintLayer } from "./placer.js";
import type { TransitionLink } from "./transitions.js";
import { TransitionTable, applyTransition, createTransitionLink } from "./transitions.js";
import { SystemRegistry } from "./systems.js";
import type { TurnContext } from "./systems.js";
import { withinBounds } from "./entity.js";

export interface WorldOptions {
  /** Blockers for grids added without their own set. */
  blockers?: Iterable<string>;
  /** Art symbol treated as see-through when drawing. */
  transparent?: string;
  /** Diagnostic sink; defaults to `[world]` lines on stderr. */
  log?: (message: string) => void;
}

export interface TurnOutcome {
  entityId: EntityId;
  result: MoveResult;
  /** Link taken this turn, if the move landed on a portal. */
  transition: TransitionLink | null;
  location: Location;
  turn: number;
}

function defaultLog(message: string): void {
  process.stderr.write(`[world] ${message}\n`);
}

/**
 * Owns grids, entities and portals for one running game and performs each
 * move as a single critical section:
 *
 *   collision check → position update → transition → erase/redraw
 *
 * Nothing else touches the same grid or entity between those steps.
 */
export class World {
  readonly transitions = new TransitionTable();
  readonly collisions: CollisionIndex;
  readonly systems = new SystemRegistry();
  readonly log: (message: string) => void;

  private readonly layer: FootprintLayer;
  private readonly grids = new Map<string, Grid>();
  private readonly blockers = new Map<Grid, ReadonlySet<string>>();
  private readonly defaultBlockers: ReadonlySet<string>;
  private readonly entities = new Map<EntityId, Entity>();
  private playerId: EntityId | null = null;
  private turnCount = 0;

  constructor(options: WorldOptions = {}) {
    const transparent = options.transparent ?? TRANSPARENT_GLYPH;
    this.defaultBlockers = new Set(options.blockers ?? DEFAULT_BLOCKERS);
    this.log = options.log ?? defaultLog;
    this.layer = new FootprintLayer(transparent);
    this.collisions = new CollisionIndex(transparent);
  }

  get turn(): number {
    return this.turnCount;
  }

  // ── Grids ──────────────────────────────────────────────────

  addGrid(grid: Grid, blockers?: Iterable<string>): void {
    this.grids.set(grid.id, grid);
    if (blockers) this.setBlockers(grid, blockers);
  }

  getGrid(id: string): Grid | null {
    return this.grids.get(id) ?? null;
  }

  setBlockers(grid: Grid, symbols: Iterable<string>): void {
    this.blockers.set(grid, new Set(symbols));
  }

  blockersFor(grid: Grid): ReadonlySet<string> {
    return this.blockers.get(grid) ?? this.defaultBlockers;
  }

  /**
   * Stop using a grid. Links leaving it are dropped; links still pointing
   * into it stay registered and fail as dangling when taken.
   */
  discardGrid(grid: Grid): void {
    grid.discard();
    this.grids.delete(grid.id);
    this.blockers.delete(grid);
    this.transitions.unregisterAll(grid);

    const inbound = this.transitions.linksInto(grid).length;
    if (inbound > 0) {
      this.log(`discarded ${grid.id} is still the destination of ${inbound} portal link(s)`);
    }
    const stranded = [...this.entities.values()].filter((e) => e.location.grid === grid).length;
    if (stranded > 0) {
      this.log(`discarded ${grid.id} still holds ${stranded} entit${stranded === 1 ? "y" : "ies"}`);
    }
  }

  /** Register a one-way portal from `source` to `destination`. */
  connect(source: Grid, portal: string, destination: Grid, spawn: Position): TransitionLink {
    const link = createTransitionLink(source, portal, destination, spawn);
    const replaced = this.transitions.register(link);
    if (replaced) {
      this.log(`portal "${portal}" on ${source.id} now leads to ${destination.id} (was ${replaced.destination.id})`);
    }
    return link;
  }

  // ── Entities ───────────────────────────────────────────────

  get player(): Entity | null {
    return this.playerId !== null ? this.entities.get(this.playerId) ?? null : null;
  }

  entity(id: EntityId): Entity | null {
    return this.entities.get(id) ?? null;
  }

  footprintOf(id: EntityId): Footprint | null {
    return this.layer.get(id);
  }

  /** Register an entity and draw it at its current location. */
  spawn(entity: Entity): Result<Footprint> {
    const valid = this.checkSpawn(entity, null);
    if (!valid.ok) return valid;
    const { grid } = entity.location;
    if (!this.grids.has(grid.id)) this.addGrid(grid);

    this.entities.set(entity.id, entity);
    this.collisions.add(entity);
    return ok(this.layer.draw(entity));
  }

  /**
   * Fill the single player slot, despawning any previous player. On
   * failure the previous player stays in place.
   */
  setPlayer(entity: Entity): Result<Footprint> {
    const previous = this.playerId !== null && this.playerId !== entity.id ? this.playerId : null;
    const valid = this.checkSpawn(entity, previous);
    if (!valid.ok) return valid;

    if (previous !== null) this.despawn(previous);
    const spawned = this.spawn(entity);
    if (spawned.ok) this.playerId = entity.id;
    return spawned;
  }

  despawn(id: EntityId): boolean {
    if (!this.entities.has(id)) return false;
    this.layer.erase(id);
    this.collisions.delete(id);
    this.entities.delete(id);
    if (this.playerId === id) this.playerId = null;
    return true;
  }

  // ── Turns ──────────────────────────────────────────────────

  moveEntity(id: EntityId, delta: Delta): Result<TurnOutcome> {
    const entity = this.entities.get(id);
    if (!entity) return err("UnknownEntity", `no entity ${id}`);

    const before = entity.location;

    // 1-2. Collision check and position update, against terrain beneath all art
    const result = attemptMove(entity, delta, {
      blockers: this.blockersFor(before.grid),
      occupancy: this.collisions,
      underlay: this.layer,
    });
    if (result === MoveResult.Blocked) {
      return ok(this.outcome(entity, result, null));
    }

    // 3. Portal
    const link = this.transitions.checkTransition(entity.location.grid, entity.location.pos, this.layer);
    if (link) {
      const applied = applyTransition(link, entity);
      if (!applied.ok) {
        entity.location = before;
        this.log(`${id} stays at (${before.pos.row},${before.pos.col}): ${applied.error.message}`);
        return applied;
      }
    }

    // 4. Erase and redraw
    this.layer.draw(entity);
    this.turnCount++;
    return ok(this.outcome(entity, result, link));
  }

  /**
   * Put an entity at an absolute position on its current grid. Uses the
   * same collision rules as a move; portals are not triggered.
   */
  placeEntity(id: EntityId, pos: Position): Result<TurnOutcome> {
    const entity = this.entities.get(id);
    if (!entity) return err("UnknownEntity", `no entity ${id}`);

    const { grid } = entity.location;
    if (!grid.inBounds(pos.row, pos.col)) {
      return err("OutOfBounds", `(${pos.row},${pos.col}) is outside ${grid.id}`);
    }
    if (entity.bounds && !withinBounds(entity.bounds, pos)) {
      return ok(this.outcome(entity, MoveResult.Blocked, null));
    }
    if (!canEnter(grid, pos, this.blockersFor(grid), this.collisions, entity, this.layer)) {
      return ok(this.outcome(entity, MoveResult.Blocked, null));
    }

    entity.location = { grid, pos: { row: pos.row, col: pos.col } };
    this.layer.draw(entity);
    this.turnCount++;
    return ok(this.outcome(entity, MoveResult.Moved, null));
  }

  dispatch(command: WorldCommand): Result<TurnOutcome> {
    switch (command.type) {
      case "move":
        return this.moveEntity(command.entityId, command.delta);
      case "place":
        return this.placeEntity(command.entityId, command.pos);
    }
  }

  /** Give every registered system its per-turn update. */
  update(): void {
    const context: TurnContext = {
      turn: this.turnCount,
      player: this.player,
      systems: this.systems,
      log: this.log,
    };
    this.systems.update(context);
  }

  /** `replacing` is an entity about to be despawned, so its id is free. */
  private checkSpawn(entity: Entity, replacing: EntityId | null): Result<null> {
    if (this.entities.has(entity.id) && entity.id !== replacing) {
      return err("DuplicateEntity", `entity ${entity.id} already exists`);
    }
    const { grid, pos } = entity.location;
    if (!grid.inBounds(pos.row, pos.col)) {
      return err("OutOfBounds", `cannot spawn ${entity.id} at (${pos.row},${pos.col}) on ${grid.id}`);
    }
    return ok(null);
  }

  private outcome(entity: Entity, result: MoveResult, transition: TransitionLink | null): TurnOutcome {
    return {
      entityId: entity.id,
      result,
      transition,
      location: entity.location,
      turn: this.turnCount,
    };
  }
}
