// packages/records/src/tests/like.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';

import { RecordStore } from '../store.js';
import { hasLiked, toggleLike } from '../like.js';

function storeWithArtwork(id: string): RecordStore {
  const store = new RecordStore({ logger: { warn: () => {} } });
  store.addArtwork({ id, name: 'Heart', pixels: [], width: 32, height: 32, createdTimestamp: 0, isLiked: false });
  return store;
}

test('toggleLike: toggles through the store and fires the liked callback', () => {
  const store = storeWithArtwork('art-1');
  let liked = 0;

  toggleLike(store, 'art-1', () => {
    liked++;
  });

  assert.equal(hasLiked(store, 'art-1'), true);
  assert.equal(liked, 1);
});

test('toggleLike: empty id or missing store is a no-op', () => {
  const store = storeWithArtwork('art-1');
  let liked = 0;
  let changed = 0;
  store.on('changed', () => {
    changed++;
  });

  toggleLike(store, '', () => {
    liked++;
  });
  toggleLike(null, 'art-1', () => {
    liked++;
  });

  assert.equal(liked, 0);
  assert.equal(changed, 0);
});

test('hasLiked: false for empty id or missing store', () => {
  const store = storeWithArtwork('art-1');
  store.toggleLike('art-1');

  assert.equal(hasLiked(store, ''), false);
  assert.equal(hasLiked(undefined, 'art-1'), false);
});
