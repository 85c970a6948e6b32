// packages/records/src/store.ts
import { EventEmitter } from 'eventemitter3';

import type { Logger } from './log.js';
import type { CountSinks } from './sinks.js';
import { withCompleted, withLikeToggled, type ArtworkRecord, type RequestRecord } from './types.js';

export type RecordStoreEvents = {
  changed: [];
};

/** Only `predefinedRequests` is read; a full `ChallengeConfig` fits. */
export type PredefinedRequestsSource = {
  predefinedRequests?: readonly RequestRecord[] | null;
};

export type RecordStoreOptions = {
  sinks?: CountSinks | null;
  config?: PredefinedRequestsSource | null;

  logger?: Logger;
};

function freezeCopy<T extends object>(record: T): Readonly<T> {
  return Object.freeze({ ...record });
}

/**
 * In-memory store for artworks and challenge requests.
 *
 * Every runtime mutation runs the same pipeline: mark the active-requests cache dirty,
 * push both counts to the sinks, then emit `changed` exactly once. Observers run inline
 * in registration order; an observer that throws propagates to the mutating caller.
 *
 * Lookups by id are linear scans and always hit the first match in insertion order.
 */
export class RecordStore extends EventEmitter<RecordStoreEvents> {
  private readonly artworks: ArtworkRecord[] = [];
  private readonly requests: RequestRecord[] = [];
  private activeRequestsCache: readonly RequestRecord[] = [];
  private activeRequestsCacheDirty = true;

  private readonly sinks: CountSinks | null;
  private readonly logger: Logger;

  constructor(opts: RecordStoreOptions = {}) {
    super();
    this.sinks = opts.sinks ?? null;
    this.logger = opts.logger ?? console;

    this.loadPredefinedRequests(opts.config ?? null);
  }

  get artworkCount(): number {
    return this.artworks.length;
  }

  get requestCount(): number {
    return this.requests.length;
  }

  // ---- artworks ------------------------------------------------------------

  addArtwork(artwork: ArtworkRecord): void {
    this.artworks.push(freezeCopy(artwork));
    this.dataChanged();
  }

  /** Returns true if a record was removed. */
  removeArtwork(id: string): boolean {
    const i = this.artworks.findIndex((a) => a.id === id);
    if (i < 0) return false;

    this.artworks.splice(i, 1);
    this.dataChanged();
    return true;
  }

  getArtwork(id: string): ArtworkRecord | null {
    return this.artworks.find((a) => a.id === id) ?? null;
  }

  getAllArtworks(): readonly ArtworkRecord[] {
    return this.artworks;
  }

  toggleLike(artworkId: string): void {
    const i = this.artworks.findIndex((a) => a.id === artworkId);
    if (i < 0) {
      this.logger.warn(`[record-store] toggleLike: artwork '${artworkId}' not found.`);
      return;
    }

    this.artworks[i] = Object.freeze(withLikeToggled(this.artworks[i]));
    this.dataChanged();
  }

  /** False for unknown ids too. */
  hasLiked(artworkId: string): boolean {
    return this.getArtwork(artworkId)?.isLiked ?? false;
  }

  // ---- requests ------------------------------------------------------------

  /**
   * Incomplete requests in collection order. Rebuilt at most once per mutation,
   * on the first read after it.
   */
  getActiveRequests(): readonly RequestRecord[] {
    if (this.activeRequestsCacheDirty) this.rebuildActiveRequestsCache();
    return this.activeRequestsCache;
  }

  /** Returns true if the request was found (already-completed requests count as found). */
  completeRequest(id: string): boolean {
    const i = this.requests.findIndex((r) => r.id === id);
    if (i < 0) return false;

    this.requests[i] = Object.freeze(withCompleted(this.requests[i]));
    this.dataChanged();
    return true;
  }

  getAllRequests(): readonly RequestRecord[] {
    return this.requests;
  }

  // ---- bulk ----------------------------------------------------------------

  /** Replace every artwork. null/undefined installs an empty collection. */
  setAllArtworks(artworks?: readonly ArtworkRecord[] | null): void {
    // copy first: the input may be our own live view
    const input: readonly ArtworkRecord[] = artworks ?? [];
    const next = input.map((a) => freezeCopy(a));
    this.artworks.length = 0;
    for (const a of next) this.artworks.push(a);
    this.dataChanged();
  }

  /** Replace every request. null/undefined installs an empty collection. */
  setAllRequests(requests?: readonly RequestRecord[] | null): void {
    const input: readonly RequestRecord[] = requests ?? [];
    const next = input.map((r) => freezeCopy(r));
    this.requests.length = 0;
    for (const r of next) this.requests.push(r);
    this.dataChanged();
  }

  // ---- internals -----------------------------------------------------------

  // Initialization, not a runtime mutation: counts are pushed but `changed` is not emitted.
  private loadPredefinedRequests(config: PredefinedRequestsSource | null): void {
    const predefined = config?.predefinedRequests;
    if (!predefined) return;

    for (const r of predefined) this.requests.push(freezeCopy(r));

    this.activeRequestsCacheDirty = true;
    this.updateSinks();
  }

  private dataChanged(): void {
    this.activeRequestsCacheDirty = true;
    this.updateSinks();
    this.emit('changed');
  }

  private updateSinks(): void {
    if (!this.sinks) return;

    this.sinks.setArtworkCount(this.artworks.length);

    let active = 0;
    for (const r of this.requests) {
      if (!r.isCompleted) active++;
    }
    this.sinks.setActiveRequestCount(active);
  }

  private rebuildActiveRequestsCache(): void {
    this.activeRequestsCache = Object.freeze(this.requests.filter((r) => !r.isCompleted));
    this.activeRequestsCacheDirty = false;
  }
}
