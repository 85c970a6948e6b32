// packages/persistence/src/index.ts
//
// Public exports for @pixel-records/persistence.

export type { ArtworkListWrapper, RequestListWrapper, ImportOptions } from './json.js';
export {
  exportArtworks,
  importArtworks,
  exportRequests,
  importRequests,
  toArtworkRecords,
  toRequestRecords,
} from './json.js';

export type { FileOptions } from './file.js';
export { saveToFile, loadFromFile } from './file.js';

export type { SavePaths, SaveSummary, LoadSummary } from './session.js';
export { ARTWORKS_FILENAME, REQUESTS_FILENAME, resolveSavePaths, saveStore, loadStore } from './session.js';
