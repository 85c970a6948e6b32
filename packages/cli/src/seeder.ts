// packages/cli/src/seeder.ts
//
// Sample data for `pixelctl seed`. Request templates and the palette live in
// data/seed-requests.json; artworks are random splatter on a 32x32 grid.
import fs from 'node:fs';
import { randomUUID } from 'node:crypto';
import { fileURLToPath } from 'node:url';

import type { ArtworkRecord, Color32, PixelEntry, RequestRecord } from '@pixel-records/records';
import { toRequestRecords } from '@pixel-records/persistence';

export const GRID_SIZE = 32;
const WEEK_SECONDS = 86400 * 7;

export const DEFAULT_SEED_FILE = fileURLToPath(new URL('../data/seed-requests.json', import.meta.url));

export type SeedTemplates = {
  requests: RequestRecord[];
  fillerPrompts: string[];
  fillerTimeLimit: number;
  palette: Color32[];
};

export type SeedOptions = {
  /** Unix seconds. */
  now?: number;
  newId?: () => string;
};

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function isColor(x: unknown): x is Color32 {
  return isRecord(x) && ['r', 'g', 'b', 'a'].every((k) => typeof x[k] === 'number');
}

export function loadSeedTemplates(file = DEFAULT_SEED_FILE): SeedTemplates {
  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  if (!isRecord(parsed)) throw new Error(`seed templates: expected an object in ${file}`);

  const fillerPrompts = Array.isArray(parsed.fillerPrompts)
    ? parsed.fillerPrompts.filter((p): p is string => typeof p === 'string' && p.length > 0)
    : [];
  const palette = Array.isArray(parsed.palette) ? parsed.palette.filter(isColor) : [];
  if (palette.length === 0) throw new Error(`seed templates: empty palette in ${file}`);

  return {
    requests: toRequestRecords(parsed.requests),
    fillerPrompts,
    fillerTimeLimit: typeof parsed.fillerTimeLimit === 'number' ? parsed.fillerTimeLimit : 60,
    palette,
  };
}

/** Small LCG so a given index always paints the same splatter. */
export function makeRng(seed: number): (minInclusive: number, maxExclusive: number) => number {
  let s = seed >>> 0;
  return (min, max) => {
    s = (Math.imul(s, 1664525) + 1013904223) >>> 0;
    return min + Math.floor((s / 0x100000000) * (max - min));
  };
}

export function buildRandomSplatter(index: number, palette: readonly Color32[]): PixelEntry[] {
  const rand = makeRng(index * 12345 + 42);
  const byCell = new Map<string, PixelEntry>();

  const blobCount = rand(3, 7);
  for (let b = 0; b < blobCount; b++) {
    const bx = rand(4, 28);
    const by = rand(4, 28);
    const radius = rand(2, 6);
    const color = palette[rand(0, palette.length)];

    for (let y = by - radius; y <= by + radius; y++) {
      for (let x = bx - radius; x <= bx + radius; x++) {
        if (x < 0 || x >= GRID_SIZE || y < 0 || y >= GRID_SIZE) continue;
        const dx = x - bx;
        const dy = y - by;
        if (dx * dx + dy * dy > radius * radius) continue;

        // later blobs paint over earlier ones
        byCell.set(`${x},${y}`, { x, y, color: { ...color } });
      }
    }
  }

  return [...byCell.values()];
}

export function generateArtworks(count: number, templates: SeedTemplates, opts: SeedOptions = {}): ArtworkRecord[] {
  const now = opts.now ?? Math.floor(Date.now() / 1000);
  const newId = opts.newId ?? randomUUID;
  const rand = makeRng(now);

  const out: ArtworkRecord[] = [];
  for (let i = 0; i < count; i++) {
    out.push({
      id: newId(),
      name: `Abstract ${i + 1}`,
      pixels: buildRandomSplatter(i, templates.palette),
      width: GRID_SIZE,
      height: GRID_SIZE,
      createdTimestamp: now - rand(0, WEEK_SECONDS),
      isLiked: false,
    });
  }
  return out;
}

/** Templates first, in file order; then filler prompts (cycled) with a single time limit. */
export function generateRequests(count: number, templates: SeedTemplates, opts: SeedOptions = {}): RequestRecord[] {
  const newId = opts.newId ?? randomUUID;
  const out: RequestRecord[] = [];

  for (const t of templates.requests.slice(0, count)) {
    out.push({ ...t, id: newId(), constraints: t.constraints.map((c) => ({ ...c })), isCompleted: false });
  }

  const fillers = templates.fillerPrompts;
  for (let i = out.length; i < count && fillers.length > 0; i++) {
    out.push({
      id: newId(),
      prompt: `${fillers[i % fillers.length]} (${i + 1})`,
      constraints: [{ type: 'timeLimit', intValue: 0, floatValue: templates.fillerTimeLimit, boolValue: false }],
      isCompleted: false,
    });
  }

  return out;
}
