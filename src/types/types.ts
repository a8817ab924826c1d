export type Cell = { r: number; c: number };

export type Move = "START" | "UP" | "DOWN" | "LEFT" | "RIGHT";

export type HeuristicType =
  | "UniformCost"
  | "MisplacedTile"
  | "Euclidean"
  | "Manhattan"
  | "ManhattanLinearConflict";

export type SearchStatus = "solved" | "unsolvable" | "exhausted" | "aborted";
