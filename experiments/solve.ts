// experiments/solve.ts
//
// Console solver: solve one puzzle and print every board on the way.
//
// Run with:
//   npx tsx experiments/solve.ts --preset eight/ohBoy --heuristic 5
//   npx tsx experiments/solve.ts --grid "1 2 0 4 5 3 7 8 6" --heuristic Manhattan
//   npx tsx experiments/solve.ts --list

import { parseArgs } from "node:util";
import { algoAStar, solve } from "../src/algorithms/AStar";
import { findPreset, PRESETS } from "../src/data/presets";
import type { PuzzleInstance, SolutionResult, SolveOptions } from "../src/interfaces/interfaces";
import type { HeuristicType } from "../src/types/types";
import { formatSolution, formatState, parseExpansionLimit, parseGrid } from "../src/utils/format/format";
import { HEURISTIC_LABELS, parseHeuristic } from "../src/utils/heuristic/buildHeuristic";
import { createPuzzle, InvalidGridError } from "../src/utils/puzzle/puzzle";

const DEFAULT_PRESET = "fifteen/waitForIt";

// Same search, printing each expanded board with its g(n) and h(n)
function solveVerbose(
  instance: PuzzleInstance,
  heuristic: HeuristicType,
  options: SolveOptions
): SolutionResult {
  console.log(instance.solvable ? "SOLVING PUZZLE...\n" : "PUZZLE IS NOT SOLVABLE");
  const run = algoAStar(instance, heuristic, options);
  let step = run.next();
  while (!step.done) {
    const { current } = step.value;
    console.log(
      current.parentKey === null
        ? "Expanding state"
        : `The best state to expand with g(n) = ${current.g} and h(n) = ${current.h} is...`
    );
    console.log(formatState(current.tiles, instance.dim));
    console.log(current.parentKey === null ? "" : "Expanding this node...\n");
    step = run.next();
  }
  return step.value;
}

function main() {
  const { values } = parseArgs({
    options: {
      preset: { type: "string", short: "p" },
      grid: { type: "string", short: "g" },
      heuristic: { type: "string", short: "h", default: "5" },
      "max-expansions": { type: "string" },
      verbose: { type: "boolean", short: "v", default: false },
      list: { type: "boolean", default: false },
    },
  });

  if (values.list) {
    for (const p of PRESETS) console.log(`${p.id.padEnd(20)} ${p.name}`);
    return;
  }

  const heuristic = parseHeuristic(values.heuristic ?? "");
  let maxExpansions: number | undefined;
  if (values["max-expansions"] !== undefined) {
    const limit = parseExpansionLimit(values["max-expansions"]);
    if (limit === null) {
      console.error(`--max-expansions must be a positive whole number, got "${values["max-expansions"]}"`);
      process.exitCode = 1;
      return;
    }
    maxExpansions = limit;
  }

  let grid: number[];
  if (values.grid !== undefined) {
    grid = parseGrid(values.grid);
  } else {
    const preset = findPreset(values.preset ?? DEFAULT_PRESET);
    if (!preset) {
      console.error(`Unknown preset "${values.preset}". Use --list to see them.`);
      process.exitCode = 1;
      return;
    }
    grid = preset.grid;
  }

  const instance = createPuzzle(grid);
  console.log(`${HEURISTIC_LABELS[heuristic]} on a ${instance.size}-puzzle\n`);

  const result = values.verbose
    ? solveVerbose(instance, heuristic, { maxExpansions })
    : solve(instance, heuristic, { maxExpansions });

  console.log(formatSolution(result, instance.dim));
  console.log(`Runtime: ${result.runtimeMs.toFixed(1)} ms`);
}

try {
  main();
} catch (e) {
  if (!(e instanceof InvalidGridError)) throw e;
  console.error(`Invalid puzzle: ${e.message}`);
  process.exitCode = 1;
}
