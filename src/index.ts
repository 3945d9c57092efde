export * from "./shared/types.js";
export * from "./shared/result.js";
export * from "./shared/constants.js";
export { Grid, isSymbol } from "./sim/grid.js";
export { createRng, shuffle } from "./sim/rng.js";
export type { RNG, RandomSource } from "./sim/rng.js";
export { generateMaze, createMazeGrid, clampMazeStart } from "./sim/maze.js";
export type { MazeOptions, MazeReport } from "./sim/maze.js";
export {
  createEntity, withinBounds, artLines, footprintCells, allowsCoOccupancy, getDirectionDelta,
} from "./sim/entity.js";
export type { EntitySpec } from "./sim/entity.js";
export { CollisionIndex, canEnter, attemptMove } from "./sim/collision.js";
export type { MoveContext } from "./sim/collision.js";
export { TransitionTable, createTransitionLink, applyTransition } from "./sim/transitions.js";
export type { TransitionLink } from "./sim/transitions.js";
export { place, remove, symbolBeneath, FootprintLayer } from "./sim/placer.js";
export type { Underlay } from "./sim/placer.js";
export { SystemRegistry } from "./sim/systems.js";
export type { TurnContext, WorldSystem } from "./sim/systems.js";
export { GridEditor, createFrame } from "./sim/editor.js";
export type { FrameGlyphs } from "./sim/editor.js";
export { World } from "./sim/world.js";
export type { WorldOptions, TurnOutcome } from "./sim/world.js";
export { renderToString, renderWithRuler } from "./render/terminal.js";
