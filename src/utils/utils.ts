import type { PuzzleState } from "../interfaces/interfaces";
import type { Cell } from "../types/types";

export const rcOf = (dim: number, id: number): Cell => ({
  r: Math.floor(id / dim),
  c: id % dim,
});

// Goal cell of a tile value (value v belongs at index v - 1)
export const goalRcOf = (dim: number, value: number): Cell =>
  rcOf(dim, value - 1);

// Deterministic RNG, 32-bit LCG
export function* rngLCG(seed: number): Generator<number, never, void> {
  let s = seed >>> 0 || 1;
  while (true) {
    s = (1664525 * s + 1013904223) >>> 0;
    yield s / 2 ** 32;
  }
}

// Reconstruct path by walking parent keys through the explored registry
export function reconstructPath(
  explored: ReadonlyMap<string, PuzzleState>,
  goal: PuzzleState
): PuzzleState[] {
  const path: PuzzleState[] = [goal];
  let parentKey = goal.parentKey;
  while (parentKey !== null) {
    const parent = explored.get(parentKey);
    if (!parent) {
      throw new Error(`Parent state ${parentKey} is not in the explored set`);
    }
    path.push(parent);
    parentKey = parent.parentKey;
  }
  return path.reverse();
}
