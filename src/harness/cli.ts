import { createInterface } from "node:readline";
import { readFileSync } from "node:fs";
import { renderToString } from "../render/terminal.js";
import { DEFAULT_MAZE_HEIGHT, DEFAULT_MAZE_WIDTH, GOLDEN_SEED } from "../shared/constants.js";
import type { World } from "../sim/world.js";
import { buildDemoWorld } from "./demo.js";
import { parseAction, describeCommand } from "./actionParser.js";
import type { CliArgs } from "./types.js";

// ── Arg parsing ──────────────────────────────────────────────

function parseIntArg(flag: string, raw: string | undefined, min: number): number {
  const value = parseInt(raw ?? "", 10);
  if (Number.isNaN(value) || value < min) {
    console.error(`ERROR: ${flag} requires an integer >= ${min}`);
    process.exit(1);
  }
  return value;
}

function parseArgs(): CliArgs {
  const argv = process.argv.slice(2);
  const opts: CliArgs = {
    seed: GOLDEN_SEED,
    width: DEFAULT_MAZE_WIDTH,
    height: DEFAULT_MAZE_HEIGHT,
    maxTurns: 500,
    script: null,
  };

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case "--seed":
        opts.seed = parseIntArg("--seed", argv[++i], 1);
        break;
      case "--width":
        opts.width = parseIntArg("--width", argv[++i], 5);
        break;
      case "--height":
        opts.height = parseIntArg("--height", argv[++i], 5);
        break;
      case "--max-turns":
        opts.maxTurns = parseIntArg("--max-turns", argv[++i], 1);
        break;
      case "--script":
        opts.script = argv[++i] ?? null;
        break;
      default:
        console.error(`WARNING: Unknown argument "${argv[i]}"`);
        break;
    }
  }

  return opts;
}

// ── Observation ──────────────────────────────────────────────

function emitObservation(world: World): void {
  const player = world.player;
  console.log("===OBSERVATION_START===");
  if (player) {
    const { grid, pos } = player.location;
    console.log(renderToString(grid, `Turn: ${world.turn}  Grid: ${grid.id}  Pos: (${pos.row},${pos.col})`));
  } else {
    console.log("No player.");
  }
  console.log("===OBSERVATION_END===");
}

/** Apply one action line; returns false once the turn limit is reached. */
function playLine(world: World, line: string, maxTurns: number): boolean {
  const player = world.player;
  if (!player) return false;

  const command = parseAction(line, player.id);
  if ("error" in command) {
    console.log(`===ERROR=== ${command.error}`);
    return true;
  }

  const outcome = world.dispatch(command);
  if (!outcome.ok) {
    console.log(`===ERROR=== ${outcome.error.kind}: ${outcome.error.message}`);
    return true;
  }

  console.log(`${describeCommand(command)} -> ${outcome.value.result}`);
  if (outcome.value.transition) {
    console.log(`Portal: ${outcome.value.transition.source.id} -> ${outcome.value.transition.destination.id}`);
  }
  world.update();
  emitObservation(world);

  if (world.turn >= maxTurns) {
    console.log(`MAX TURNS (${maxTurns}) reached.`);
    return false;
  }
  return true;
}

// ── Script mode ──────────────────────────────────────────────

function runScript(scriptPath: string, world: World, maxTurns: number): void {
  let rawLines: string[];
  try {
    const content = readFileSync(scriptPath, "utf-8");
    rawLines = content.split("\n").map(l => l.trim()).filter(l => l.length > 0 && !l.startsWith("//"));
  } catch (err) {
    console.error(`ERROR: Could not read script file "${scriptPath}": ${err}`);
    process.exit(1);
  }

  emitObservation(world);
  for (const line of rawLines) {
    if (!playLine(world, line, maxTurns)) break;
  }
}

// ── Interactive stdin mode ───────────────────────────────────

async function runInteractive(world: World, maxTurns: number): Promise<void> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: false,
  });

  emitObservation(world);

  for await (const line of rl) {
    const trimmed = line.trim();
    if (trimmed.length === 0) continue;
    if (trimmed.toLowerCase() === "quit" || trimmed.toLowerCase() === "exit") break;
    if (!playLine(world, trimmed, maxTurns)) break;
  }

  rl.close();
}

// ── Main ─────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = parseArgs();

  console.log(`Gridworld Harness v0.1`);
  console.log(`Seed: ${args.seed}  Size: ${args.width}x${args.height}  Max turns: ${args.maxTurns}`);
  console.log("");

  const demo = buildDemoWorld(args.seed, args.width, args.height);
  if (!demo.ok) {
    console.error(`ERROR: ${demo.error.kind}: ${demo.error.message}`);
    process.exit(1);
  }

  if (args.script) {
    runScript(args.script, demo.value.world, args.maxTurns);
  } else {
    await runInteractive(demo.value.world, args.maxTurns);
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
