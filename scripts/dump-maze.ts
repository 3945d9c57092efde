import { createMazeGrid } from "../src/sim/maze.js";
import { renderWithRuler } from "../src/render/terminal.js";
import { DEFAULT_MAZE_HEIGHT, DEFAULT_MAZE_WIDTH, GOLDEN_SEED } from "../src/shared/constants.js";

const seed = process.argv[2] ? parseInt(process.argv[2], 10) : GOLDEN_SEED;

const result = createMazeGrid(DEFAULT_MAZE_WIDTH, DEFAULT_MAZE_HEIGHT, { seed });
if (!result.ok) {
  console.error(`${result.error.kind}: ${result.error.message}`);
  process.exit(1);
}

const { grid, report } = result.value;

console.log("=== MAZE ===");
console.log(`Seed: ${seed}  Size: ${grid.width}x${grid.height}`);
console.log(`Start: (${report.start?.row},${report.start?.col})  Nodes: ${report.visited}  Carved: ${report.carved}`);
console.log("");
console.log(renderWithRuler(grid));
