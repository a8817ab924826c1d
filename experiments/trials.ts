import { solve } from "../src/algorithms/AStar";
import type { PuzzleInstance, SolutionResult } from "../src/interfaces/interfaces";
import type { HeuristicType } from "../src/types/types";
import { scramble } from "../src/utils/moves/moves";
import { createPuzzle } from "../src/utils/puzzle/puzzle";

export interface TrialConfig {
  id: string; // preset id or scramble description
  grid: number[];
}

export interface TrialResult {
  trial: TrialConfig;
  dim: number;
  results: SolutionResult[];
  baselineDepth: number | null;
}

export const CSV_HEADER = [
  "trial",
  "dim",
  "heuristic",
  "status",
  "runtimeMs",
  "nodesExpanded",
  "maxFrontierSize",
  "goalDepth",
  "optimal",
];

export function scrambledTrials(
  dim: number,
  steps: number,
  count: number,
  seedBase: number
): TrialConfig[] {
  const out: TrialConfig[] = [];
  for (let t = 0; t < count; t++) {
    const seed = seedBase + t;
    out.push({ id: `scramble/${dim}x${dim}/${steps}/${seed}`, grid: scramble(dim, steps, seed) });
  }
  return out;
}

// Run every heuristic on one puzzle; depth of the strongest one is the baseline
export function runTrial(
  trial: TrialConfig,
  heuristics: HeuristicType[],
  maxExpansions: number
): TrialResult {
  const instance: PuzzleInstance = createPuzzle(trial.grid);
  const results = heuristics.map((h) => solve(instance, h, { maxExpansions }));
  const baseline =
    results.find((r) => r.heuristic === "ManhattanLinearConflict" && r.status === "solved") ??
    results.find((r) => r.status === "solved");
  return {
    trial,
    dim: instance.dim,
    results,
    baselineDepth: baseline ? baseline.goalDepth : null,
  };
}

export function toCsvRows({ trial, dim, results, baselineDepth }: TrialResult): string[] {
  return results.map((r) =>
    [
      trial.id,
      dim.toString(),
      r.heuristic,
      r.status,
      r.runtimeMs.toFixed(4),
      r.nodesExpanded.toString(),
      r.maxFrontierSize.toString(),
      r.status === "solved" ? r.goalDepth.toString() : "",
      baselineDepth === null || r.status !== "solved"
        ? ""
        : r.goalDepth === baselineDepth
        ? "1"
        : "0",
    ].join(",")
  );
}
