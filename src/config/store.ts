import { readFile, writeFile } from 'node:fs/promises';
import type { GameConfig } from './schema';
import { validateAndRepair } from '@content/validate';
import { rebuildFromConfig } from '@content/registry';

let current: GameConfig = validateAndRepair({});
const subs = new Set<(cfg: GameConfig) => void>();

function notify(cfg: GameConfig) {
  for (const fn of subs) fn(cfg);
}

function commit(cfg: GameConfig): GameConfig {
  rebuildFromConfig(cfg);
  current = cfg;
  notify(cfg);
  return cfg;
}

// Repairs, checks references (throws ContentValidationError) and swaps the
// registry. The previous config stays active when validation throws.
export function applyConfig(input: unknown): GameConfig {
  return commit(validateAndRepair(input));
}

export async function load(path: string): Promise<GameConfig> {
  const text = await readFile(path, 'utf8');
  return importConfig(text);
}

export async function save(path: string, cfg: GameConfig = current): Promise<GameConfig> {
  const repaired = commit(validateAndRepair(cfg));
  await writeFile(path, `${JSON.stringify(repaired, null, 2)}\n`, 'utf8');
  return repaired;
}

export function exportConfig(): string {
  return JSON.stringify(current, null, 2);
}

export function importConfig(json: string): GameConfig {
  const parsed: unknown = JSON.parse(json);
  return applyConfig(parsed);
}

export function subscribe(fn: (cfg: GameConfig) => void) {
  subs.add(fn);
  fn(current);
  return () => {
    subs.delete(fn);
  };
}

export const CONFIG = () => current;
