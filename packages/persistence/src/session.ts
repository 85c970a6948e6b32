// packages/persistence/src/session.ts
import path from 'node:path';

import type { Logger, RecordStore } from '@pixel-records/records';

import { exportArtworks, exportRequests, importArtworks, importRequests } from './json.js';
import { loadFromFile, saveToFile } from './file.js';

export const ARTWORKS_FILENAME = 'artworks.json';
export const REQUESTS_FILENAME = 'requests.json';

export type SavePaths = {
  saveDir: string;
  artworksFile: string;
  requestsFile: string;
};

export function resolveSavePaths(saveDir: string): SavePaths {
  const dir = path.resolve(saveDir);
  return {
    saveDir: dir,
    artworksFile: path.join(dir, ARTWORKS_FILENAME),
    requestsFile: path.join(dir, REQUESTS_FILENAME),
  };
}

export type SaveSummary = {
  artworks: boolean;
  requests: boolean;
};

/**
 * Null means the file was absent and that collection was left as-is in the store.
 */
export type LoadSummary = {
  artworks: number | null;
  requests: number | null;
};

/** Write both collections. Each write is independent and fail-soft. */
export function saveStore(args: { store: RecordStore; paths: SavePaths; logger?: Logger }): SaveSummary {
  const { store, paths, logger } = args;

  return {
    artworks: saveToFile(exportArtworks(store.getAllArtworks()), paths.artworksFile, { logger }),
    requests: saveToFile(exportRequests(store.getAllRequests()), paths.requestsFile, { logger }),
  };
}

/**
 * Read both save files and install whatever is present through the bulk-replace operations.
 * A present but corrupt file installs an empty collection.
 */
export function loadStore(args: { store: RecordStore; paths: SavePaths; logger?: Logger }): LoadSummary {
  const { store, paths, logger } = args;
  const summary: LoadSummary = { artworks: null, requests: null };

  const artworksJson = loadFromFile(paths.artworksFile, { logger });
  if (artworksJson !== null) {
    const artworks = importArtworks(artworksJson, { logger });
    store.setAllArtworks(artworks);
    summary.artworks = artworks.length;
  }

  const requestsJson = loadFromFile(paths.requestsFile, { logger });
  if (requestsJson !== null) {
    const requests = importRequests(requestsJson, { logger });
    store.setAllRequests(requests);
    summary.requests = requests.length;
  }

  return summary;
}
