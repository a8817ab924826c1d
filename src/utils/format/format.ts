import type { SolutionResult } from "../../interfaces/interfaces";
import type { Move } from "../../types/types";
import { HEURISTIC_LABELS } from "../heuristic/buildHeuristic";
import { InvalidGridError } from "../puzzle/puzzle";

// "1 2 0 4 5 3 7 8 6" or "1,2,0, 4,5,3, 7,8,6"
export function parseGrid(text: string): number[] {
  const tokens = text.split(/[\s,]+/).filter((t) => t.length > 0);
  if (!tokens.length) throw new InvalidGridError("Grid is empty");
  return tokens.map((t) => {
    if (!/^\d+$/.test(t)) throw new InvalidGridError(`"${t}" is not a tile number`);
    return Number(t);
  });
}

// Expansion ceiling from the command line: a positive whole number, else null
export function parseExpansionLimit(text: string): number | null {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const limit = Number(trimmed);
  return limit > 0 && Number.isSafeInteger(limit) ? limit : null;
}

export const moveLabel = (move: Move) =>
  move === "START" ? "START" : `MOVE ${move}`;

export function formatState(tiles: readonly number[], dim: number): string {
  const width = String(tiles.length - 1).length;
  const rows: string[] = [];
  for (let r = 0; r < dim; r++) {
    rows.push(
      tiles
        .slice(r * dim, r * dim + dim)
        .map((t) => String(t).padStart(width))
        .join(" ")
    );
  }
  return rows.join("\n");
}

export function formatSolution(result: SolutionResult, dim: number): string {
  const lines = ["*************** SOLUTION ****************", ""];

  if (!result.path.length) {
    lines.push(
      result.status === "aborted"
        ? `-- GAVE UP AFTER ${result.nodesExpanded} EXPANSIONS --`
        : "-- NO SOLUTION --",
      ""
    );
  }
  result.path.forEach((state, i) => {
    lines.push(state.move === "START" ? "-- START --" : `-- ${i}: ${moveLabel(state.move)} --`);
    lines.push(formatState(state.tiles, dim), "");
  });

  lines.push(
    `Heuristic: ${HEURISTIC_LABELS[result.heuristic]}`,
    `Nodes expanded: ${result.nodesExpanded}`,
    `Max frontier size: ${result.maxFrontierSize}`,
    `Goal depth: ${result.goalDepth}`,
    "*****************************************"
  );
  return lines.join("\n");
}
