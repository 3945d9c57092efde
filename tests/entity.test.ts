import { describe, it, expect } from "vitest";
import {
  createEntity, artLines, footprintCells, withinBounds, getDirectionDelta, allowsCoOccupancy,
} from "../src/sim/entity.js";
import { Direction } from "../src/shared/types.js";
import { floorGrid } from "./helpers.js";

describe("Entities", () => {
  const grid = floorGrid(8, 8);

  it("defaults the player art to @ and has no bounds", () => {
    const player = createEntity({ id: "p", kind: { type: "player", name: "Ash" }, grid, pos: { row: 2, col: 3 } });
    expect(player.art).toBe("@");
    expect(player.bounds).toBeNull();
    expect(player.location.grid).toBe(grid);
    expect(player.location.pos).toEqual({ row: 2, col: 3 });
    expect(player.props).toEqual({});
  });

  it("copies the starting position", () => {
    const pos = { row: 1, col: 1 };
    const e = createEntity({ id: "e", kind: { type: "element", label: "tree" }, grid, pos, art: "T" });
    pos.row = 5;
    expect(e.location.pos).toEqual({ row: 1, col: 1 });
  });

  it("splits art into symbol rows, dropping blank first and last lines", () => {
    expect(artLines("\n/\\\n||\n")).toEqual([["/", "\\"], ["|", "|"]]);
    expect(artLines("@")).toEqual([["@"]]);
    expect(artLines("╔╗")).toEqual([["╔", "╗"]]);
  });

  it("lists footprint cells, skipping transparent ones", () => {
    const e = createEntity({
      id: "hut",
      kind: { type: "element", label: "hut" },
      grid,
      pos: { row: 2, col: 4 },
      art: "/\\\n| ",
    });
    expect(footprintCells(e)).toEqual([
      { row: 2, col: 4 },
      { row: 2, col: 5 },
      { row: 3, col: 4 },
    ]);
    expect(footprintCells(e, { row: 0, col: 0 })).toEqual([
      { row: 0, col: 0 },
      { row: 0, col: 1 },
      { row: 1, col: 0 },
    ]);
  });

  it("checks inclusive bounds", () => {
    const bounds = { top: 1, left: 1, bottom: 3, right: 4 };
    expect(withinBounds(bounds, { row: 1, col: 1 })).toBe(true);
    expect(withinBounds(bounds, { row: 3, col: 4 })).toBe(true);
    expect(withinBounds(bounds, { row: 0, col: 2 })).toBe(false);
    expect(withinBounds(bounds, { row: 2, col: 5 })).toBe(false);
  });

  it("maps directions to row/col deltas", () => {
    expect(getDirectionDelta(Direction.North)).toEqual({ row: -1, col: 0 });
    expect(getDirectionDelta(Direction.South)).toEqual({ row: 1, col: 0 });
    expect(getDirectionDelta(Direction.East)).toEqual({ row: 0, col: 1 });
    expect(getDirectionDelta(Direction.West)).toEqual({ row: 0, col: -1 });
  });

  it("only lets elements share cells", () => {
    expect(allowsCoOccupancy({ type: "element", label: "rock" })).toBe(true);
    expect(allowsCoOccupancy({ type: "player", name: "Ash" })).toBe(false);
    expect(allowsCoOccupancy({ type: "npc", role: "merchant" })).toBe(false);
  });
});
