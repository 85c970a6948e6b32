// packages/persistence/src/json.ts
//
// JSON export/import for artworks and requests.
// A collection is always wrapped in a single-field object ({ artworks: [...] } /
// { requests: [...] }); a bare top-level array is never written or accepted.

import {
  errorMessage,
  isConstraintType,
  type ArtworkRecord,
  type Color32,
  type ConstraintData,
  type Logger,
  type PixelEntry,
  type RequestRecord,
} from '@pixel-records/records';

export type ArtworkListWrapper = {
  artworks: ArtworkRecord[] | null;
};

export type RequestListWrapper = {
  requests: RequestRecord[] | null;
};

export type ImportOptions = {
  logger?: Logger;
};

type Loose = Record<string, unknown>;

function isObject(x: unknown): x is Loose {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function str(x: unknown): string {
  return typeof x === 'string' ? x : '';
}

function num(x: unknown): number {
  return typeof x === 'number' && Number.isFinite(x) ? x : 0;
}

function int(x: unknown): number {
  return Math.trunc(num(x));
}

function byte(x: unknown): number {
  return Math.min(255, Math.max(0, int(x)));
}

function normalizeColor(c: unknown): Color32 {
  const o: Loose = isObject(c) ? c : {};
  return { r: byte(o.r), g: byte(o.g), b: byte(o.b), a: byte(o.a) };
}

function normalizePixel(p: Loose): PixelEntry {
  return { x: byte(p.x), y: byte(p.y), color: normalizeColor(p.color) };
}

function normalizeConstraint(c: Loose): ConstraintData | null {
  const type = c.type;
  if (!isConstraintType(type)) return null;
  return {
    type,
    intValue: int(c.intValue),
    floatValue: num(c.floatValue),
    boolValue: c.boolValue === true,
  };
}

function normalizeArtwork(a: Loose): ArtworkRecord {
  const pixels = Array.isArray(a.pixels) ? a.pixels.filter(isObject).map(normalizePixel) : [];
  return {
    id: str(a.id),
    name: str(a.name),
    pixels,
    width: int(a.width),
    height: int(a.height),
    createdTimestamp: int(a.createdTimestamp),
    isLiked: a.isLiked === true,
  };
}

function normalizeRequest(r: Loose): RequestRecord {
  const constraints: ConstraintData[] = [];
  if (Array.isArray(r.constraints)) {
    for (const c of r.constraints) {
      const n = isObject(c) ? normalizeConstraint(c) : null;
      if (n) constraints.push(n);
    }
  }
  return {
    id: str(r.id),
    prompt: str(r.prompt),
    constraints,
    isCompleted: r.isCompleted === true,
  };
}

/** Normalize an untrusted list; non-object elements are skipped, anything else yields []. */
export function toArtworkRecords(list: unknown): ArtworkRecord[] {
  return Array.isArray(list) ? list.filter(isObject).map(normalizeArtwork) : [];
}

export function toRequestRecords(list: unknown): RequestRecord[] {
  return Array.isArray(list) ? list.filter(isObject).map(normalizeRequest) : [];
}

/**
 * Parse a wrapper document and return the raw value under `field`.
 * Throws on unparseable text or a non-object top level.
 */
function readWrapped(json: string, field: 'artworks' | 'requests'): unknown {
  const parsed: unknown = JSON.parse(json);
  if (!isObject(parsed)) {
    throw new Error(`expected an object with a "${field}" field`);
  }
  return parsed[field];
}

// ---- artworks ---------------------------------------------------------------

export function exportArtworks(artworks: readonly ArtworkRecord[]): string {
  const wrapper: ArtworkListWrapper = { artworks: [...artworks] };
  return JSON.stringify(wrapper, null, 2);
}

/**
 * Never throws. Empty/absent text and malformed text both yield [];
 * malformed text is logged first.
 */
export function importArtworks(json?: string | null, opts: ImportOptions = {}): ArtworkRecord[] {
  if (!json) return [];

  try {
    return toArtworkRecords(readWrapped(json, 'artworks'));
  } catch (e) {
    (opts.logger ?? console).warn(`[json-persistence] Failed to import artworks: ${errorMessage(e)}`);
    return [];
  }
}

// ---- requests ---------------------------------------------------------------

export function exportRequests(requests: readonly RequestRecord[]): string {
  const wrapper: RequestListWrapper = { requests: [...requests] };
  return JSON.stringify(wrapper, null, 2);
}

export function importRequests(json?: string | null, opts: ImportOptions = {}): RequestRecord[] {
  if (!json) return [];

  try {
    return toRequestRecords(readWrapped(json, 'requests'));
  } catch (e) {
    (opts.logger ?? console).warn(`[json-persistence] Failed to import requests: ${errorMessage(e)}`);
    return [];
  }
}
