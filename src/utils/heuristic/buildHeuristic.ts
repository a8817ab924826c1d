import type { HeuristicType } from "../../types/types";
import { goalRcOf, rcOf } from "../utils";

export const HEURISTIC_TYPES: HeuristicType[] = [
  "UniformCost",
  "MisplacedTile",
  "Euclidean",
  "Manhattan",
  "ManhattanLinearConflict",
];

export const HEURISTIC_LABELS: Record<HeuristicType, string> = {
  UniformCost: "Uniform Cost Search",
  MisplacedTile: "A* with Misplaced Tile",
  Euclidean: "A* with Euclidean Distance",
  Manhattan: "A* with Manhattan Distance",
  ManhattanLinearConflict: "A* with Manhattan Distance + Linear Conflict",
};

export const misplacedTile = (tiles: readonly number[]) => {
  let cost = 0;
  for (let i = 0; i < tiles.length; i++) {
    if (tiles[i] === 0) continue;
    if (tiles[i] !== i + 1) cost++;
  }
  return cost;
};

export const euclidean = (tiles: readonly number[], dim: number) => {
  let cost = 0;
  for (let i = 0; i < tiles.length; i++) {
    if (tiles[i] === 0) continue;
    const p = rcOf(dim, i);
    const goal = goalRcOf(dim, tiles[i]);
    const dr = p.r - goal.r;
    const dc = p.c - goal.c;
    cost += Math.sqrt(dr * dr + dc * dc);
  }
  return cost;
};

export const manhattan = (tiles: readonly number[], dim: number) => {
  let cost = 0;
  for (let i = 0; i < tiles.length; i++) {
    if (tiles[i] === 0) continue;
    const p = rcOf(dim, i);
    const goal = goalRcOf(dim, tiles[i]);
    cost += Math.abs(goal.r - p.r) + Math.abs(goal.c - p.c);
  }
  return cost;
};

/**
 * Number of linear conflicts: pairs of tiles that are both in their goal
 * row (or column) with the larger value ahead of the smaller one. Each tile
 * is only compared with tiles after it, so a pair is counted once.
 */
export const linearConflicts = (tiles: readonly number[], dim: number) => {
  const len = tiles.length;
  let conflicts = 0;
  for (let i = 0; i < len; i++) {
    if (tiles[i] === 0) continue;
    const p = rcOf(dim, i);
    const goal = goalRcOf(dim, tiles[i]);

    if (goal.r === p.r) {
      const rowEnd = p.r * dim + dim;
      for (let j = i + 1; j < rowEnd; j++) {
        if (tiles[j] === 0) continue;
        if (goalRcOf(dim, tiles[j]).r !== p.r) continue;
        if (tiles[j] < tiles[i]) conflicts++;
      }
    }

    if (goal.c === p.c) {
      for (let j = i + dim; j < len; j += dim) {
        if (tiles[j] === 0) continue;
        if (goalRcOf(dim, tiles[j]).c !== p.c) continue;
        if (tiles[j] < tiles[i]) conflicts++;
      }
    }
  }
  return conflicts;
};

export const manhattanLinearConflict = (
  tiles: readonly number[],
  dim: number
) => manhattan(tiles, dim) + 2 * linearConflicts(tiles, dim);

export function buildHeuristic(
  dim: number,
  type: HeuristicType
): (tiles: readonly number[]) => number {
  switch (type) {
    case "MisplacedTile":
      return misplacedTile;
    case "Euclidean":
      return (tiles) => euclidean(tiles, dim);
    case "Manhattan":
      return (tiles) => manhattan(tiles, dim);
    case "ManhattanLinearConflict":
      return (tiles) => manhattanLinearConflict(tiles, dim);
    default:
      return () => 0;
  }
}

// Menu numbering 1..5; anything else degrades to uniform cost
export function heuristicFromChoice(choice: number): HeuristicType {
  return HEURISTIC_TYPES[choice - 1] ?? "UniformCost";
}

const isHeuristicType = (value: string): value is HeuristicType =>
  HEURISTIC_TYPES.some((t) => t === value);

export function parseHeuristic(value: string): HeuristicType {
  const trimmed = value.trim();
  if (isHeuristicType(trimmed)) return trimmed;
  if (/^\d+$/.test(trimmed)) return heuristicFromChoice(Number(trimmed));
  return "UniformCost";
}
