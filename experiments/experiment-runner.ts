// experiments/experiment-runner.ts
//
// Offline experiments for the N-Puzzle Lab.
// Runs every heuristic on the solvable presets and on seeded scrambles
// and writes a CSV file with timings, expansions, frontier size, depth and optimality.
//
// Run with:
//   npx tsx experiments/experiment-runner.ts
//
// CSV output: experiments/results.csv

import { writeFileSync } from "fs";
import { fileURLToPath } from "url";
import { PRESETS } from "../src/data/presets";
import type { HeuristicType } from "../src/types/types";
import { HEURISTIC_TYPES } from "../src/utils/heuristic/buildHeuristic";
import { createPuzzle } from "../src/utils/puzzle/puzzle";
import { CSV_HEADER, runTrial, scrambledTrials, toCsvRows, type TrialConfig } from "./trials";

// ---------- Experiment parameters (EDIT THESE AS YOU LIKE) ----------
const OUTPUT_CSV = fileURLToPath(new URL("./results.csv", import.meta.url));

// scrambles per (dim, steps) pair
const NUM_TRIALS = 20;

// [dim, random moves away from the goal]
const SCRAMBLES: [number, number][] = [
  [3, 20],
  [3, 60],
  [4, 30],
];

const HEURISTICS: HeuristicType[] = HEURISTIC_TYPES;

// uniform cost on a hard 15-puzzle does not finish in memory; stop here instead
const MAX_EXPANSIONS = 500_000;

function main() {
  const trials: TrialConfig[] = PRESETS.filter((p) => createPuzzle(p.grid).solvable).map((p) => ({
    id: p.id,
    grid: p.grid,
  }));
  SCRAMBLES.forEach(([dim, steps], i) => {
    trials.push(...scrambledTrials(dim, steps, NUM_TRIALS, 1000 * (i + 1)));
  });

  const rows = [CSV_HEADER.join(",")];
  trials.forEach((trial, i) => {
    const result = runTrial(trial, HEURISTICS, MAX_EXPANSIONS);
    rows.push(...toCsvRows(result));
    console.log(
      `Done trial ${i + 1}/${trials.length} :: ${trial.id}, depth=${result.baselineDepth ?? "?"}`
    );
  });

  writeFileSync(OUTPUT_CSV, rows.join("\n"), "utf8");
  console.log(`\n✅ Wrote ${rows.length - 1} rows to ${OUTPUT_CSV}`);
}

main();
