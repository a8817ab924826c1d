import { describe, expect, it } from "vitest";
import { solve } from "../../algorithms/AStar";
import { createPuzzle, InvalidGridError } from "../puzzle/puzzle";
import { formatSolution, formatState, moveLabel, parseExpansionLimit, parseGrid } from "./format";

describe("parseGrid", () => {
  it("accepts spaces, commas and newlines", () => {
    expect(parseGrid("1 2 0 4 5 3 7 8 6")).toEqual([1, 2, 0, 4, 5, 3, 7, 8, 6]);
    expect(parseGrid(" 1,2,3,\n4, 5 ,6\n7 8 0 ")).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 0]);
  });

  it("rejects empty input and non-numbers", () => {
    expect(() => parseGrid("   ")).toThrow("Grid is empty");
    expect(() => parseGrid("1 2 x 0")).toThrow(InvalidGridError);
    expect(() => parseGrid("1 -2 3 0")).toThrow('"-2" is not a tile number');
  });
});

describe("parseExpansionLimit", () => {
  it("accepts positive whole numbers", () => {
    expect(parseExpansionLimit("500000")).toBe(500000);
    expect(parseExpansionLimit(" 12 ")).toBe(12);
  });

  it("rejects anything else", () => {
    for (const text of ["abc", "", "0", "-5", "1.5", "1e6", "12abc"]) {
      expect(parseExpansionLimit(text)).toBeNull();
    }
  });
});

describe("formatState", () => {
  it("lays out rows", () => {
    expect(formatState([1, 2, 3, 4, 5, 6, 7, 8, 0], 3)).toBe("1 2 3\n4 5 6\n7 8 0");
  });

  it("right-aligns two-digit tiles", () => {
    const tiles = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 0];
    expect(formatState(tiles, 4).split("\n")).toEqual([
      " 1  2  3  4",
      " 5  6  7  8",
      " 9 10 11 12",
      "13 14 15  0",
    ]);
  });
});

describe("formatSolution", () => {
  it("labels every step of the path", () => {
    const result = solve(createPuzzle([1, 2, 0, 4, 5, 3, 7, 8, 6]), "Manhattan");
    expect(formatSolution(result, 3).split("\n")).toEqual([
      "*************** SOLUTION ****************",
      "",
      "-- START --",
      "1 2 0",
      "4 5 3",
      "7 8 6",
      "",
      "-- 1: MOVE DOWN --",
      "1 2 3",
      "4 5 0",
      "7 8 6",
      "",
      "-- 2: MOVE DOWN --",
      "1 2 3",
      "4 5 6",
      "7 8 0",
      "",
      "Heuristic: A* with Manhattan Distance",
      "Nodes expanded: 2",
      "Max frontier size: 3",
      "Goal depth: 2",
      "*****************************************",
    ]);
  });

  it("reports an unsolvable puzzle", () => {
    const result = solve(createPuzzle([1, 2, 3, 4, 5, 6, 8, 7, 0]), "UniformCost");
    const lines = formatSolution(result, 3).split("\n");
    expect(lines[2]).toBe("-- NO SOLUTION --");
    expect(lines).toContain("Nodes expanded: 0");
  });

  it("reports a search that gave up", () => {
    const result = solve(createPuzzle([1, 2, 0, 4, 5, 3, 7, 8, 6]), "Manhattan", {
      maxExpansions: 1,
    });
    expect(formatSolution(result, 3).split("\n")[2]).toBe("-- GAVE UP AFTER 1 EXPANSIONS --");
  });

  it("names moves", () => {
    expect(moveLabel("START")).toBe("START");
    expect(moveLabel("LEFT")).toBe("MOVE LEFT");
  });
});
