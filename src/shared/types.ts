import type { Grid } from "../sim/grid.js";

// ── Coordinates ──────────────────────────────────────────────
export interface Position {
  row: number;
  col: number;
}

export type Delta = Position;

/** Inclusive movement envelope. */
export interface Bounds {
  top: number;
  left: number;
  bottom: number;
  right: number;
}

export enum Direction {
  North = "north",
  South = "south",
  East = "east",
  West = "west",
}

// ── Entities ─────────────────────────────────────────────────
export type EntityId = string;

export type EntityKind =
  | { type: "player"; name: string }
  | { type: "element"; label: string }
  | { type: "npc"; role: string };

export type EntityKindType = EntityKind["type"];

/**
 * Grid reference and position travel together: relocation replaces the
 * whole record, never one field.
 */
export interface Location {
  readonly grid: Grid;
  readonly pos: Readonly<Position>;
}

export interface Entity {
  id: EntityId;
  kind: EntityKind;
  location: Location;
  art: string;
  bounds: Bounds | null;
  props: Record<string, unknown>;
}

// ── Movement ─────────────────────────────────────────────────
export enum MoveResult {
  Moved = "moved",
  Blocked = "blocked",
}

// ── Footprints ───────────────────────────────────────────────
export interface FootprintCell {
  row: number;
  col: number;
  /** Symbol that was in the grid before the art was drawn. */
  symbol: string;
}

export interface Footprint {
  readonly entityId: EntityId;
  readonly grid: Grid;
  readonly cells: readonly FootprintCell[];
}

// ── Commands ─────────────────────────────────────────────────
export type WorldCommand =
  | { type: "move"; entityId: EntityId; delta: Delta }
  | { type: "place"; entityId: EntityId; pos: Position };
