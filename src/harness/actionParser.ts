import type { EntityId, WorldCommand } from "../shared/types.js";
import { Direction } from "../shared/types.js";
import { getDirectionDelta } from "../sim/entity.js";
import type { HarnessAction } from "./types.js";

// ── Direction mapping ────────────────────────────────────────

const DIR_MAP: Record<string, Direction> = {
  N: Direction.North,
  S: Direction.South,
  E: Direction.East,
  W: Direction.West,
};

function isHarnessAction(value: unknown): value is HarnessAction {
  if (!value || typeof value !== "object") return false;
  return "action" in value && typeof value.action === "string";
}

// ── Action parsing ───────────────────────────────────────────

/**
 * Parse a JSON line into a command for `entityId`, or an error.
 *
 * Expected input format:
 *   {"action": "MOVE", "params": {"dir": "N"}}
 *   {"action": "PLACE", "params": {"row": 3, "col": 5}}
 */
export function parseAction(input: string, entityId: EntityId): WorldCommand | { error: string } {
  let parsed: unknown;

  // Step 1: parse JSON
  try {
    parsed = JSON.parse(input.trim());
  } catch {
    return { error: `Invalid JSON: ${input.trim()}` };
  }

  if (!isHarnessAction(parsed)) {
    return { error: `Missing or invalid "action" field` };
  }

  // Step 2: map to a command
  switch (parsed.action.toUpperCase()) {
    case "MOVE": {
      const dirStr = parsed.params?.dir;
      if (typeof dirStr !== "string") {
        return { error: `MOVE requires params.dir (one of N, S, E, W)` };
      }
      const direction = DIR_MAP[dirStr.toUpperCase()];
      if (!direction) {
        return { error: `Unknown direction "${dirStr}". Use N, S, E, W.` };
      }
      return { type: "move", entityId, delta: getDirectionDelta(direction) };
    }

    case "PLACE": {
      const row = parsed.params?.row;
      const col = parsed.params?.col;
      if (typeof row !== "number" || typeof col !== "number" || !Number.isInteger(row) || !Number.isInteger(col)) {
        return { error: `PLACE requires integer params.row and params.col` };
      }
      return { type: "place", entityId, pos: { row, col } };
    }

    default:
      return { error: `Unknown action "${parsed.action}". Valid: MOVE, PLACE.` };
  }
}

export function describeCommand(command: WorldCommand): string {
  switch (command.type) {
    case "move":
      return `Move ${command.entityId} by (${command.delta.row},${command.delta.col})`;
    case "place":
      return `Place ${command.entityId} at (${command.pos.row},${command.pos.col})`;
  }
}
