import presets from "./puzzles.json";

export interface Preset {
  id: string;
  name: string;
  grid: number[];
  depth: number | null; // optimal move count, null when unsolvable
}

export const PRESETS: Preset[] = presets;

export const findPreset = (id: string) => PRESETS.find((p) => p.id === id);
