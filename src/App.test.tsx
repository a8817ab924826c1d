// @vitest-environment jsdom
import { act, cleanup, fireEvent, render, screen } from "@testing-library/react";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import NPuzzleLab from "./App";

const GRID_LABEL = "Puzzle (row by row, 0 is the blank)";

function fieldValue(label: string) {
  const el = screen.getByLabelText(label);
  if (el instanceof HTMLTextAreaElement || el instanceof HTMLSelectElement) return el.value;
  throw new Error(`${label} is not a form field`);
}

const enterGrid = (text: string) =>
  fireEvent.change(screen.getByLabelText(GRID_LABEL), { target: { value: text } });

const captions = () =>
  screen.getAllByRole("figure").map((f) => f.querySelector("figcaption")?.textContent);

// Animation frames are queued here and run by hand
const frames = new Map<number, FrameRequestCallback>();
let nextHandle = 1;

beforeEach(() => {
  frames.clear();
  vi.stubGlobal("requestAnimationFrame", (cb: FrameRequestCallback) => {
    const handle = nextHandle++;
    frames.set(handle, cb);
    return handle;
  });
  vi.stubGlobal("cancelAnimationFrame", (handle: number) => {
    frames.delete(handle);
  });
});

afterEach(() => {
  cleanup();
  vi.unstubAllGlobals();
});

function runFrame() {
  act(() => {
    const due = [...frames.values()];
    frames.clear();
    for (const cb of due) cb(performance.now());
  });
}

function runAllFrames() {
  while (frames.size) runFrame();
}

const status = () => screen.getByTestId("status").textContent;

describe("NPuzzleLab", () => {
  it("starts idle on the default preset", () => {
    render(<NPuzzleLab />);
    expect(fieldValue(GRID_LABEL)).toBe("8 7 1 6 0 2 5 4 3");
    expect(fieldValue("Preset")).toBe("eight/ohBoy");
    expect(screen.getByTestId("status").textContent).toBe("Idle");
    expect(screen.getByText("No solution to show yet.")).toBeTruthy();
  });

  it("solves an entered puzzle and lists every step", () => {
    render(<NPuzzleLab />);
    enterGrid("1 2 0 4 5 3 7 8 6");
    fireEvent.change(screen.getByLabelText("Heuristic"), { target: { value: "4" } });
    fireEvent.click(screen.getByText("Solve"));
    runAllFrames();

    expect(fieldValue("Preset")).toBe("");
    expect(screen.getByRole("heading", { level: 2 }).textContent).toBe("A* with Manhattan Distance");
    expect(screen.getByTestId("status").textContent).toBe("Solved");
    expect(screen.getByTestId("stat-expanded").textContent).toBe("2");
    expect(screen.getByTestId("stat-frontier").textContent).toBe("3");
    expect(screen.getByTestId("stat-depth").textContent).toBe("2");
    expect(captions()).toEqual(["START", "1: MOVE DOWN", "2: MOVE DOWN"]);
  });

  it("steps through the solution", () => {
    render(<NPuzzleLab />);
    enterGrid("1 2 0 4 5 3 7 8 6");
    fireEvent.click(screen.getByText("Solve"));
    runAllFrames();
    expect(screen.getByLabelText("Current board").textContent).toBe("12453786");

    fireEvent.change(screen.getByLabelText("Step"), { target: { value: "2" } });
    expect(screen.getByLabelText("Current board").textContent).toBe("12345678");
    expect(screen.getAllByRole("figure")[2].className).toBe("step active");
  });

  it("shows why a grid is rejected", () => {
    render(<NPuzzleLab />);
    enterGrid("1 2 0");
    fireEvent.click(screen.getByText("Solve"));
    runAllFrames();
    expect(screen.getByRole("alert").textContent).toBe("Grid length 3 is not a perfect square");
    expect(screen.getByTestId("status").textContent).toBe("Idle");
  });

  it("reports an unsolvable preset", () => {
    render(<NPuzzleLab />);
    fireEvent.change(screen.getByLabelText("Preset"), { target: { value: "eight/impossible" } });
    expect(fieldValue(GRID_LABEL)).toBe("1 2 3 4 5 6 8 7 0");
    fireEvent.click(screen.getByText("Solve"));
    runAllFrames();
    expect(screen.getByTestId("status").textContent).toBe("No solution");
    expect(screen.getByTestId("stat-expanded").textContent).toBe("0");
    expect(screen.getByTestId("stat-depth").textContent).toBe("—");
    expect(screen.queryAllByRole("figure")).toHaveLength(0);
  });

  it("shows live statistics while the search runs", () => {
    render(<NPuzzleLab />);
    enterGrid("1 2 0 4 5 3 7 8 6");
    fireEvent.change(screen.getByLabelText("Heuristic"), { target: { value: "4" } });
    fireEvent.change(screen.getByLabelText("Expansions per frame"), { target: { value: "1" } });
    fireEvent.click(screen.getByText("Solve"));
    expect(status()).toBe("Searching");
    expect(screen.getByTestId("stat-expanded").textContent).toBe("0");

    runFrame();
    expect(status()).toBe("Searching");
    expect(screen.getByTestId("stat-expanded").textContent).toBe("1");
    expect(screen.getByTestId("stat-open").textContent).toBe("2");
    expect(screen.getByLabelText("Current board").textContent).toBe("12453786");
    expect(screen.queryAllByRole("figure")).toHaveLength(0);

    runAllFrames();
    expect(status()).toBe("Solved");
    expect(screen.getByTestId("stat-expanded").textContent).toBe("2");
    expect(screen.getByTestId("stat-frontier").textContent).toBe("3");
    expect(captions()).toEqual(["START", "1: MOVE DOWN", "2: MOVE DOWN"]);
  });

  it("stops a running search", () => {
    render(<NPuzzleLab />);
    fireEvent.change(screen.getByLabelText("Heuristic"), { target: { value: "1" } });
    fireEvent.click(screen.getByText("Solve"));
    runFrame();
    expect(screen.getByTestId("stat-expanded").textContent).toBe("2000");

    fireEvent.click(screen.getByText("Stop"));
    expect(status()).toBe("Stopped after 2000 expansions");
    expect(frames.size).toBe(0);
    expect(screen.getByTestId("stat-depth").textContent).toBe("—");
    expect(screen.getByText("No solution to show yet.")).toBeTruthy();
  });

  it("cancels the pending frame on unmount", () => {
    const { unmount } = render(<NPuzzleLab />);
    fireEvent.change(screen.getByLabelText("Heuristic"), { target: { value: "1" } });
    fireEvent.click(screen.getByText("Solve"));
    runFrame();
    expect(frames.size).toBe(1);
    unmount();
    expect(frames.size).toBe(0);
  });

  it("shuffles from the seed", () => {
    render(<NPuzzleLab />);
    fireEvent.click(screen.getByText("Shuffle"));
    expect(fieldValue(GRID_LABEL)).toBe("2 6 5 4 1 7 8 3 0");
    expect(fieldValue("Preset")).toBe("");
  });
});
