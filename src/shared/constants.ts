// ── Map defaults ─────────────────────────────────────────────
export const DEFAULT_MAZE_WIDTH = 41;
export const DEFAULT_MAZE_HEIGHT = 21;

// ── Editor frame ─────────────────────────────────────────────
export const DEFAULT_FRAME_WIDTH = 30;
export const DEFAULT_FRAME_HEIGHT = 12;

// ── Golden seed ──────────────────────────────────────────────
export const GOLDEN_SEED = 184201;

// ── Glyphs ───────────────────────────────────────────────────
export const GLYPHS = {
  player: "@",
  floor: ".",
  wall: "#",
  portal: "D",
  frameHorizontal: "═",
  frameVertical: "║",
  frameTopLeft: "╔",
  frameTopRight: "╗",
  frameBottomLeft: "╚",
  frameBottomRight: "╝",
} as const;

// Transparent art cells are skipped when drawing
export const TRANSPARENT_GLYPH = " ";

/**
 * Symbols impassable on a grid whose host supplied no blocker set.
 */
export const DEFAULT_BLOCKERS: readonly string[] = [
  GLYPHS.wall,
  GLYPHS.frameHorizontal,
  GLYPHS.frameVertical,
  GLYPHS.frameTopLeft,
  GLYPHS.frameTopRight,
  GLYPHS.frameBottomLeft,
  GLYPHS.frameBottomRight,
];
