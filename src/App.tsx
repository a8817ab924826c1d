import React, { useEffect, useMemo, useRef, useState } from "react";
import { algoAStar } from "./algorithms/AStar";
import { PRESETS } from "./data/presets";
import type { PuzzleState, SearchStep, SolutionResult } from "./interfaces/interfaces";
import { moveLabel, parseGrid } from "./utils/format/format";
import {
  HEURISTIC_LABELS,
  HEURISTIC_TYPES,
  heuristicFromChoice,
} from "./utils/heuristic/buildHeuristic";
import { scramble } from "./utils/moves/moves";
import { createPuzzle, InvalidGridError } from "./utils/puzzle/puzzle";

// =====================
// N-Puzzle Lab
// - Enter a grid or pick a preset, choose a heuristic and solve
// - Search advances a batch of expansions per animation frame, with live stats
// - Stop abandons a run; the search itself gives up after MAX_EXPANSIONS
// - Solution is shown board by board, with a slider to step through it
// =====================

const MAX_EXPANSIONS = 2_000_000;
const DEFAULT_SPEED = 2000;
const DEFAULT_PRESET = "eight/ohBoy";

function Board({
  tiles,
  dim,
  label,
}: {
  tiles: readonly number[];
  dim: number;
  label: string;
}) {
  return (
    <div
      className="board"
      aria-label={label}
      style={{ gridTemplateColumns: `repeat(${dim}, 2.5rem)` }}
    >
      {tiles.map((t, i) => (
        <div key={i} className={t === 0 ? "tile blank" : "tile"}>
          {t === 0 ? "" : t}
        </div>
      ))}
    </div>
  );
}

function stepCaption(state: PuzzleState, i: number) {
  return state.move === "START" ? "START" : `${i}: ${moveLabel(state.move)}`;
}

export default function NPuzzleLab() {
  const initial = PRESETS.find((p) => p.id === DEFAULT_PRESET) ?? PRESETS[0];
  const [presetId, setPresetId] = useState(initial.id);
  const [gridText, setGridText] = useState(initial.grid.join(" "));
  const [choice, setChoice] = useState(5);
  const [shuffleDim, setShuffleDim] = useState(3);
  const [shuffleSteps, setShuffleSteps] = useState(30);
  const [seed, setSeed] = useState(12345);

  const [speed, setSpeed] = useState(DEFAULT_SPEED);

  const [running, setRunning] = useState(false);
  const [stopped, setStopped] = useState(false);
  const [progress, setProgress] = useState<SearchStep | null>(null);
  const [result, setResult] = useState<SolutionResult | null>(null);
  const [dim, setDim] = useState(3);
  const [step, setStep] = useState(0);
  const [error, setError] = useState<string | null>(null);

  const genRef = useRef<Generator<SearchStep, SolutionResult, void> | null>(null);

  const heuristic = heuristicFromChoice(choice);
  const current = useMemo(() => {
    if (result && result.path.length) return result.path[Math.min(step, result.path.length - 1)];
    return progress?.current ?? null;
  }, [result, progress, step]);

  // Animation loop: `speed` expansions per frame until the search returns
  useEffect(() => {
    if (!running) return;
    let handle = 0;

    const tick = () => {
      const g = genRef.current;
      if (!g) return;
      let latest: SearchStep | null = null;
      for (let i = 0; i < speed; i++) {
        const res = g.next();
        if (res.done) {
          genRef.current = null;
          if (latest) setProgress(latest);
          setResult(res.value);
          setRunning(false);
          return;
        }
        latest = res.value;
      }
      setProgress(latest);
      handle = requestAnimationFrame(tick);
    };

    handle = requestAnimationFrame(tick);
    return () => cancelAnimationFrame(handle);
  }, [running, speed]);

  const pickPreset = (id: string) => {
    setPresetId(id);
    const preset = PRESETS.find((p) => p.id === id);
    if (preset) setGridText(preset.grid.join(" "));
  };

  const shuffle = () => {
    setPresetId("");
    setGridText(scramble(shuffleDim, shuffleSteps, seed).join(" "));
  };

  const runSolve = () => {
    setResult(null);
    setProgress(null);
    setStopped(false);
    setStep(0);
    try {
      const instance = createPuzzle(parseGrid(gridText));
      genRef.current = algoAStar(instance, heuristic, { maxExpansions: MAX_EXPANSIONS });
      setDim(instance.dim);
      setError(null);
      setRunning(true);
    } catch (e) {
      if (!(e instanceof InvalidGridError)) throw e;
      genRef.current = null;
      setError(e.message);
    }
  };

  const stop = () => {
    genRef.current = null;
    setRunning(false);
    setStopped(true);
  };

  const statusText = running
    ? "Searching"
    : stopped
    ? `Stopped after ${progress?.nodesExpanded ?? 0} expansions`
    : !result
    ? "Idle"
    : result.status === "solved"
    ? "Solved"
    : result.status === "aborted"
    ? `Gave up after ${result.nodesExpanded} expansions`
    : "No solution";

  return (
    <div className="min-h-screen">
      <div className="wrapper">
        <header className="mb-6">
          <h1 className="text-3xl font-bold tracking-tight">N-Puzzle Lab</h1>
          <p className="text-slate-600">Uniform cost and A* search on sliding-tile puzzles</p>
        </header>

        <div className="controls">
          <div className="control-card">
            <label className="block text-sm mb-1" htmlFor="preset">Preset</label>
            <select id="preset" value={presetId} onChange={e=>pickPreset(e.target.value)} className="w-full border rounded px-3 py-2">
              <option value="">Custom</option>
              {PRESETS.map((p) => (
                <option key={p.id} value={p.id}>{p.name}</option>
              ))}
            </select>
            <label className="block text-sm mt-3 mb-1" htmlFor="grid">Puzzle (row by row, 0 is the blank)</label>
            <textarea id="grid" value={gridText} rows={3} onChange={e=>{ setPresetId(""); setGridText(e.target.value); }} className="w-full border rounded px-3 py-2 font-mono" />
          </div>

          <div className="control-card">
            <label className="block text-sm mb-1" htmlFor="heuristic">Heuristic</label>
            <select id="heuristic" value={choice} onChange={e=>setChoice(Number(e.target.value))} className="w-full border rounded px-3 py-2">
              {HEURISTIC_TYPES.map((t, i) => (
                <option key={t} value={i + 1}>{i + 1}. {HEURISTIC_LABELS[t]}</option>
              ))}
            </select>
          </div>

          <div className="control-card">
            <label className="block text-sm mb-1" htmlFor="shuffleDim">Shuffle size</label>
            <select id="shuffleDim" value={shuffleDim} onChange={e=>setShuffleDim(Number(e.target.value))} className="w-full border rounded px-3 py-2">
              <option value={3}>3×3</option>
              <option value={4}>4×4</option>
            </select>
            <label className="block text-sm mt-3 mb-1" htmlFor="shuffleSteps">Random moves</label>
            <input id="shuffleSteps" type="number" value={shuffleSteps} min={1} max={200} onChange={e=>setShuffleSteps(Math.max(1, Math.min(200, Number(e.target.value)||30)))} className="w-full border rounded px-3 py-2" />
            <label className="block text-sm mt-3 mb-1" htmlFor="seed">Seed</label>
            <input id="seed" type="number" value={seed} onChange={e=>setSeed(Number(e.target.value)||0)} className="w-full border rounded px-3 py-2" />
            <div className="text-xs text-slate-500 mt-1">Reproducible shuffles</div>
          </div>

          <div className="control-card">
            <label className="block text-sm mb-1" htmlFor="speed">Expansions per frame</label>
            <input id="speed" type="number" value={speed} min={1} max={50000} onChange={e=>setSpeed(Math.max(1, Math.min(50000, Number(e.target.value)||DEFAULT_SPEED)))} className="w-full border rounded px-3 py-2" />
          </div>

          <div className="bg-white rounded-2xl shadow p-4 flex flex-col gap-2">
            <button onClick={runSolve} disabled={running} className="px-4 py-2 rounded-xl bg-emerald-600 text-white">Solve</button>
            <button onClick={stop} disabled={!running} className="px-4 py-2 rounded-xl bg-rose-600 text-white">Stop</button>
            <button onClick={shuffle} disabled={running} className="px-4 py-2 rounded-xl bg-slate-800 text-white">Shuffle</button>
            {error && <div role="alert" className="text-sm text-red-600">{error}</div>}
          </div>
        </div>

        <div className="panels">
          <div className="panel">
            <div className="flex items-center justify-between mb-2">
              <h2 className="font-semibold">{HEURISTIC_LABELS[heuristic]}</h2>
              <div className="text-xs text-slate-500" data-testid="status">{statusText}</div>
            </div>
            {current && <Board tiles={current.tiles} dim={dim} label="Current board" />}
            {!running && result && result.path.length > 1 && (
              <input type="range" aria-label="Step" min={0} max={result.path.length - 1} value={step} onChange={e=>setStep(Number(e.target.value))} className="w-full mt-2" />
            )}
            <div className="stats">
              <div className="text-slate-500">Expanded</div><div className="font-mono" data-testid="stat-expanded">{result?.nodesExpanded ?? progress?.nodesExpanded ?? 0}</div>
              <div className="text-slate-500">Frontier</div><div className="font-mono" data-testid="stat-open">{progress?.frontierSize ?? 0}</div>
              <div className="text-slate-500">Peak frontier</div><div className="font-mono" data-testid="stat-frontier">{result?.maxFrontierSize ?? progress?.peakFrontier ?? 0}</div>
              <div className="text-slate-500">Goal depth</div><div className="font-mono" data-testid="stat-depth">{result?.status === "solved" ? result.goalDepth : "—"}</div>
              <div className="text-slate-500">Runtime</div><div className="font-mono">{(result?.runtimeMs ?? progress?.lastRuntimeMs ?? 0).toFixed(1)} ms</div>
            </div>
          </div>
        </div>

        <div className="solution">
          <h3 className="font-semibold mb-2">Solution</h3>
          {!result || !result.path.length ? (
            <div className="text-sm text-slate-500">No solution to show yet.</div>
          ) : (
            <div className="solution-steps">
              {result.path.map((state, i) => (
                <figure key={state.key} className={i === step ? "step active" : "step"}>
                  <figcaption className="text-xs font-mono">{stepCaption(state, i)}</figcaption>
                  <Board tiles={state.tiles} dim={dim} label={`Step ${i}`} />
                </figure>
              ))}
            </div>
          )}
        </div>
      </div>
    </div>
  );
}
