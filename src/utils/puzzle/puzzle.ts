import type { PuzzleInstance, PuzzleState } from "../../interfaces/interfaces";

export class InvalidGridError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidGridError";
  }
}

// Comma-separated so that two-digit tiles never collide ("1,12" vs "11,2")
export const stateKey = (tiles: readonly number[]) => tiles.join(",");

export function sameTiles(a: readonly number[], b: readonly number[]) {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function goalTiles(dim: number): number[] {
  const len = dim * dim;
  const tiles: number[] = [];
  for (let i = 1; i < len; i++) tiles.push(i);
  tiles.push(0);
  return tiles;
}

// Every non-blank tile sits at index value - 1
export function isGoal(tiles: readonly number[]) {
  for (let i = 0; i < tiles.length; i++) {
    if (tiles[i] === 0) continue;
    if (tiles[i] !== i + 1) return false;
  }
  return true;
}

export function countInversions(tiles: readonly number[]) {
  let inversions = 0;
  for (let i = 0; i < tiles.length; i++) {
    if (tiles[i] === 0) continue;
    for (let j = i + 1; j < tiles.length; j++) {
      if (tiles[j] === 0) continue;
      if (tiles[j] < tiles[i]) inversions++;
    }
  }
  return inversions;
}

/**
 * Parity test for reachability of the goal.
 * Odd widths need an even inversion count. Even widths also depend on the
 * blank's row counted from the bottom (1-based): the inversion parity and
 * that row's parity must differ.
 */
export function isSolvable(tiles: readonly number[], dim: number) {
  const inversions = countInversions(tiles);
  if (dim % 2 === 1) return inversions % 2 === 0;

  const blankIndex = tiles.indexOf(0);
  const rowFromBottom = dim - Math.floor(blankIndex / dim);
  if (inversions % 2 === 1 && rowFromBottom % 2 === 0) return true;
  if (inversions % 2 === 0 && rowFromBottom % 2 === 1) return true;
  return false;
}

export function validateGrid(grid: readonly number[]): number {
  const len = grid.length;
  if (len === 0) throw new InvalidGridError("Grid is empty");

  const dim = Math.round(Math.sqrt(len));
  if (dim * dim !== len) {
    throw new InvalidGridError(`Grid length ${len} is not a perfect square`);
  }
  if (dim < 2) throw new InvalidGridError("Grid must be at least 2x2");

  // len distinct values in 0..len-1 is a permutation, so exactly one 0
  const seen = new Uint8Array(len);
  for (const v of grid) {
    if (!Number.isInteger(v) || v < 0 || v >= len) {
      throw new InvalidGridError(`Tile ${v} is outside 0..${len - 1}`);
    }
    if (seen[v]) throw new InvalidGridError(`Tile ${v} appears more than once`);
    seen[v] = 1;
  }
  return dim;
}

export function createPuzzle(grid: readonly number[]): PuzzleInstance {
  const dim = validateGrid(grid);
  const tiles = [...grid];
  const start: PuzzleState = {
    tiles,
    key: stateKey(tiles),
    blankIndex: tiles.indexOf(0),
    move: "START",
    g: 0,
    h: 0,
    f: 0,
    parentKey: null,
  };
  return {
    size: tiles.length - 1,
    len: tiles.length,
    dim,
    start,
    solvable: isSolvable(tiles, dim),
  };
}
