import { GLYPHS } from "../shared/constants.js";
import type { Result } from "../shared/result.js";
import { ok } from "../shared/result.js";
import type { Grid } from "../sim/grid.js";
import { createMazeGrid } from "../sim/maze.js";
import type { MazeReport } from "../sim/maze.js";
import { createFrame } from "../sim/editor.js";
import { createEntity } from "../sim/entity.js";
import { World } from "../sim/world.js";
import type { WorldOptions } from "../sim/world.js";

export const HUB_WIDTH = 16;
export const HUB_HEIGHT = 7;

export interface DemoWorld {
  world: World;
  maze: Grid;
  hub: Grid;
  report: MazeReport;
}

function lastOdd(size: number): number {
  return (size - 2) % 2 === 1 ? size - 2 : size - 3;
}

/**
 * Two linked grids for the harness: a seeded maze with the player at (1,1)
 * and a portal in its far corner, and a framed hub whose own portal leads
 * back to the maze entrance.
 */
export function buildDemoWorld(
  seed: number,
  width: number,
  height: number,
  options: WorldOptions = {},
): Result<DemoWorld> {
  const mazeResult = createMazeGrid(width, height, { seed, start: { row: 1, col: 1 }, id: "maze" });
  if (!mazeResult.ok) return mazeResult;
  const { grid: maze, report } = mazeResult.value;

  const hubResult = createFrame(HUB_WIDTH, HUB_HEIGHT);
  if (!hubResult.ok) return hubResult;
  const hub = hubResult.value;

  const mazePortal = { row: lastOdd(height), col: lastOdd(width) };
  maze.set(mazePortal.row, mazePortal.col, GLYPHS.portal);
  hub.set(HUB_HEIGHT - 2, HUB_WIDTH - 2, GLYPHS.portal);

  const world = new World(options);
  world.addGrid(maze, [GLYPHS.wall]);
  world.addGrid(hub);
  world.connect(maze, GLYPHS.portal, hub, { row: 1, col: 1 });
  world.connect(hub, GLYPHS.portal, maze, { row: 1, col: 1 });

  const player = createEntity({
    id: "player",
    kind: { type: "player", name: "Player" },
    grid: maze,
    pos: { row: 1, col: 1 },
  });
  const spawned = world.setPlayer(player);
  if (!spawned.ok) return spawned;

  return ok({ world, maze, hub, report });
}
