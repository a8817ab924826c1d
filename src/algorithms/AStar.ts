import type {
  PuzzleInstance,
  PuzzleState,
  SearchStep,
  SolutionResult,
  SolveOptions,
} from "../interfaces/interfaces";
import type { HeuristicType, SearchStatus } from "../types/types";
import { buildHeuristic } from "../utils/heuristic/buildHeuristic";
import { MinHeap } from "../utils/MinHeap/MinHeap";
import { generateChildren } from "../utils/moves/moves";
import { isGoal } from "../utils/puzzle/puzzle";
import { reconstructPath } from "../utils/utils";

/**
 * Best-first graph search over tile arrangements, ordered by f = g + h.
 * With the UniformCost heuristic this is plain uniform-cost search.
 *
 * Yields once per expanded state and returns the final result. The goal
 * test runs when a state is popped, so a start state that is already
 * solved is reported with zero expansions.
 *
 * A child already present in the frontier or explored set is dropped even
 * if it was reached by a shorter path. That keeps the first path found to
 * every arrangement, which is optimal only for consistent heuristics.
 *
 * With `maxExpansions`, the search returns "aborted" when it would need to
 * expand one more state than the limit allows.
 */
export function* algoAStar(
  instance: PuzzleInstance,
  heuristicType: HeuristicType,
  options: SolveOptions = {}
): Generator<SearchStep, SolutionResult, void> {
  const limit = options.maxExpansions ?? Infinity;
  const begin = performance.now();
  const meta = { nodesExpanded: 0, peakFrontier: 0 };

  const finish = (status: SearchStatus, path: PuzzleState[]): SolutionResult => ({
    status,
    heuristic: heuristicType,
    path,
    nodesExpanded: meta.nodesExpanded,
    maxFrontierSize: meta.peakFrontier,
    goalDepth: path.length ? path.length - 1 : 0,
    runtimeMs: performance.now() - begin,
  });

  if (!instance.solvable) return finish("unsolvable", []);

  const { dim } = instance;
  const heuristic = buildHeuristic(dim, heuristicType);
  const heap = new MinHeap<PuzzleState>();
  const frontier = new Map<string, PuzzleState>();
  const explored = new Map<string, PuzzleState>();

  const h0 = heuristic(instance.start.tiles);
  const start: PuzzleState = {
    ...instance.start,
    g: 0,
    h: h0,
    f: h0,
    parentKey: null,
  };
  heap.push(start.f, start);
  frontier.set(start.key, start);

  while (heap.size()) {
    const current = heap.pop();
    if (!current) break;
    frontier.delete(current.key);

    if (isGoal(current.tiles)) {
      return finish("solved", reconstructPath(explored, current));
    }
    if (explored.has(current.key)) continue;
    if (meta.nodesExpanded >= limit) return finish("aborted", []);

    meta.nodesExpanded++;
    explored.set(current.key, current);

    for (const child of generateChildren(current, dim)) {
      if (frontier.has(child.key) || explored.has(child.key)) continue;
      const g = current.g + 1;
      const h = heuristic(child.tiles);
      const next: PuzzleState = {
        ...child,
        g,
        h,
        f: g + h,
        parentKey: current.key,
      };
      heap.push(next.f, next);
      frontier.set(next.key, next);
    }
    meta.peakFrontier = Math.max(meta.peakFrontier, heap.size());

    yield {
      current,
      nodesExpanded: meta.nodesExpanded,
      frontierSize: heap.size(),
      exploredSize: explored.size,
      peakFrontier: meta.peakFrontier,
      lastRuntimeMs: performance.now() - begin,
    };
  }

  return finish("exhausted", []);
}

// Run the search to completion, optionally giving up after maxExpansions
export function solve(
  instance: PuzzleInstance,
  heuristicType: HeuristicType,
  options: SolveOptions = {}
): SolutionResult {
  const run = algoAStar(instance, heuristicType, options);
  let step = run.next();
  while (!step.done) step = run.next();
  return step.value;
}
