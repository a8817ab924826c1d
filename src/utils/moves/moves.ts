import type { PuzzleConfig } from "../../interfaces/interfaces";
import type { Move } from "../../types/types";
import { goalTiles, stateKey } from "../puzzle/puzzle";
import { rcOf, rngLCG } from "../utils";

export type Direction = Exclude<Move, "START">;

// Generation order, which is also the tie-break order among equal costs
export const DIRECTIONS: Direction[] = ["UP", "DOWN", "LEFT", "RIGHT"];

const INVERSE: Record<Direction, Direction> = {
  UP: "DOWN",
  DOWN: "UP",
  LEFT: "RIGHT",
  RIGHT: "LEFT",
};

export const inverseMove = (move: Direction): Direction => INVERSE[move];

// Index the blank swaps with, or -1 when it would leave the grid
function targetIndex(blankIndex: number, move: Direction, dim: number) {
  const { r, c } = rcOf(dim, blankIndex);
  switch (move) {
    case "UP":
      return r > 0 ? blankIndex - dim : -1;
    case "DOWN":
      return r < dim - 1 ? blankIndex + dim : -1;
    case "LEFT":
      return c > 0 ? blankIndex - 1 : -1;
    case "RIGHT":
      return c < dim - 1 ? blankIndex + 1 : -1;
  }
}

export function applyMove(
  config: PuzzleConfig,
  move: Direction,
  dim: number
): PuzzleConfig | null {
  const target = targetIndex(config.blankIndex, move, dim);
  if (target < 0) return null;
  const tiles = [...config.tiles];
  tiles[config.blankIndex] = tiles[target];
  tiles[target] = 0;
  return { tiles, key: stateKey(tiles), blankIndex: target, move };
}

export function generateChildren(
  config: PuzzleConfig,
  dim: number
): PuzzleConfig[] {
  const out: PuzzleConfig[] = [];
  for (const move of DIRECTIONS) {
    const child = applyMove(config, move, dim);
    if (child) out.push(child);
  }
  return out;
}

/**
 * Random walk of `steps` blank moves away from the goal. Walking from the
 * goal keeps the result solvable; a move that undoes the previous one is
 * never picked.
 */
export function scramble(dim: number, steps: number, seed: number): number[] {
  const R = rngLCG(seed);
  const tiles = goalTiles(dim);
  let current: PuzzleConfig = {
    tiles,
    key: stateKey(tiles),
    blankIndex: tiles.length - 1,
    move: "START",
  };
  let previous: Direction | null = null;

  for (let i = 0; i < steps; i++) {
    const options: { move: Direction; child: PuzzleConfig }[] = [];
    for (const move of DIRECTIONS) {
      if (previous !== null && move === inverseMove(previous)) continue;
      const child = applyMove(current, move, dim);
      if (child) options.push({ move, child });
    }
    const pick = options[Math.floor(R.next().value * options.length)];
    current = pick.child;
    previous = pick.move;
  }
  return [...current.tiles];
}
