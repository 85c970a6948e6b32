// packages/records/src/like.ts
import type { RecordStore } from './store.js';

export function toggleLike(
  store: RecordStore | null | undefined,
  artworkId: string,
  onArtworkLiked?: (() => void) | null
): void {
  if (!store || !artworkId) return;

  store.toggleLike(artworkId);
  onArtworkLiked?.();
}

export function hasLiked(store: RecordStore | null | undefined, artworkId: string): boolean {
  if (!store || !artworkId) return false;
  return store.hasLiked(artworkId);
}
