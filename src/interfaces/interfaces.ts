import type { HeuristicType, Move, SearchStatus } from "../types/types";

// One tile arrangement as produced by the transition generator
export interface PuzzleConfig {
  tiles: readonly number[];
  key: string;
  blankIndex: number;
  move: Move;
}

export interface PuzzleState extends PuzzleConfig {
  g: number; // moves from start
  h: number; // heuristic estimate
  f: number; // g + h
  parentKey: string | null; // null for the start state
}

export interface PuzzleInstance {
  readonly size: number; // N tiles
  readonly len: number; // N + 1 cells
  readonly dim: number;
  readonly start: PuzzleState;
  readonly solvable: boolean;
}

export interface SearchStep {
  current: PuzzleState; // state expanded this tick
  nodesExpanded: number;
  frontierSize: number;
  exploredSize: number;
  peakFrontier: number;
  lastRuntimeMs: number;
}

export interface SolutionResult {
  status: SearchStatus;
  heuristic: HeuristicType;
  path: PuzzleState[]; // start → goal, empty unless solved
  nodesExpanded: number;
  maxFrontierSize: number;
  goalDepth: number; // moves on the path
  runtimeMs: number;
}

export interface SolveOptions {
  maxExpansions?: number;
}
