import type { Grid } from "../sim/grid.js";

/**
 * Render a grid to a plain-text string (for headless/harness use).
 * The host owns real terminal output.
 */
export function renderToString(grid: Grid, status?: string): string {
  const lines = grid.rows();
  if (status) lines.push(status);
  return lines.join("\n");
}

/**
 * Grid with column headers (tens and units) and row numbers, for dumps.
 */
export function renderWithRuler(grid: Grid): string {
  let header1 = "    ";
  let header2 = "    ";
  for (let x = 0; x < grid.width; x++) {
    header1 += (x % 10 === 0) ? Math.floor(x / 10).toString() : " ";
    header2 += (x % 10).toString();
  }
  const lines = [header1, header2];
  grid.rows().forEach((row, y) => {
    lines.push(y.toString().padStart(3) + " " + row);
  });
  return lines.join("\n");
}
