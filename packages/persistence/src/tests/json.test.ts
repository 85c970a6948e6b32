// packages/persistence/src/tests/json.test.ts
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import type { ArtworkRecord, RequestRecord } from '@pixel-records/records';

import { exportArtworks, exportRequests, importArtworks, importRequests } from '../json.js';

function collectWarnings() {
  const warnings: string[] = [];
  return { warnings, logger: { warn: (msg: string) => warnings.push(msg) } };
}

const artworks: ArtworkRecord[] = [
  {
    id: 'test-id-1',
    name: 'Test Art 1',
    pixels: [
      { x: 0, y: 0, color: { r: 255, g: 59, b: 48, a: 255 } },
      { x: 31, y: 12, color: { r: 0, g: 122, b: 255, a: 128 } },
    ],
    width: 32,
    height: 32,
    createdTimestamp: 1000,
    isLiked: false,
  },
  {
    id: 'test-id-2',
    name: 'Test Art 2',
    pixels: [],
    width: 16,
    height: 24,
    createdTimestamp: 2000,
    isLiked: true,
  },
];

const requests: RequestRecord[] = [
  {
    id: 'req-1',
    prompt: 'Draw a heart',
    constraints: [{ type: 'colorLimit', intValue: 3, floatValue: 0, boolValue: false }],
    isCompleted: false,
  },
  {
    id: 'req-2',
    prompt: 'Draw a star',
    constraints: [
      { type: 'timeLimit', intValue: 0, floatValue: 30.5, boolValue: false },
      { type: 'symmetryRequired', intValue: 0, floatValue: 0, boolValue: true },
    ],
    isCompleted: true,
  },
];

describe('json persistence: artworks', () => {
  it('wraps an empty list in the artworks container', () => {
    const json = exportArtworks([]);

    assert.equal(json, '{\n  "artworks": []\n}');
    assert.deepEqual(importArtworks(json), []);
  });

  it('round-trips a collection', () => {
    const json = exportArtworks(artworks);

    assert.deepEqual(Object.keys(JSON.parse(json)), ['artworks']);
    assert.deepEqual(importArtworks(json), artworks);
  });

  it('ignores formatting of the intermediate text', () => {
    const compact = JSON.stringify(JSON.parse(exportArtworks(artworks)));
    assert.deepEqual(importArtworks(compact), artworks);
  });

  it('returns [] silently for empty or absent text', () => {
    const { warnings, logger } = collectWarnings();

    assert.deepEqual(importArtworks('', { logger }), []);
    assert.deepEqual(importArtworks(null, { logger }), []);
    assert.deepEqual(importArtworks(undefined, { logger }), []);
    assert.deepEqual(warnings, []);
  });

  it('returns [] and logs for malformed text', () => {
    const { warnings, logger } = collectWarnings();

    assert.deepEqual(importArtworks('not json', { logger }), []);

    assert.equal(warnings.length, 1);
    assert.match(warnings[0] ?? '', /^\[json-persistence\] Failed to import artworks: /);
  });

  it('rejects a bare top-level array', () => {
    const { warnings, logger } = collectWarnings();

    assert.deepEqual(importArtworks(JSON.stringify(artworks), { logger }), []);
    assert.deepEqual(warnings, [
      '[json-persistence] Failed to import artworks: expected an object with a "artworks" field',
    ]);
  });

  it('treats a missing or null container field as empty', () => {
    const { warnings, logger } = collectWarnings();

    assert.deepEqual(importArtworks('{}', { logger }), []);
    assert.deepEqual(importArtworks('{"artworks": null}', { logger }), []);
    assert.deepEqual(importArtworks('{"requests": []}', { logger }), []);
    assert.deepEqual(warnings, []);
  });

  it('fills missing fields and clamps pixel bytes', () => {
    const json = JSON.stringify({
      artworks: [{ id: 'a', pixels: [{ x: 300, y: -1, color: { r: 12.7 } }, 'junk'], isLiked: 'yes' }, 5],
    });

    assert.deepEqual(importArtworks(json), [
      {
        id: 'a',
        name: '',
        pixels: [{ x: 255, y: 0, color: { r: 12, g: 0, b: 0, a: 0 } }],
        width: 0,
        height: 0,
        createdTimestamp: 0,
        isLiked: false,
      },
    ]);
  });
});

describe('json persistence: requests', () => {
  it('wraps an empty list in the requests container', () => {
    const json = exportRequests([]);

    assert.equal(json, '{\n  "requests": []\n}');
    assert.deepEqual(importRequests(json), []);
  });

  it('round-trips a collection', () => {
    assert.deepEqual(importRequests(exportRequests(requests)), requests);
  });

  it('returns [] and logs for malformed text', () => {
    const { warnings, logger } = collectWarnings();

    assert.deepEqual(importRequests('{"requests": [', { logger }), []);
    assert.equal(warnings.length, 1);
    assert.match(warnings[0] ?? '', /^\[json-persistence\] Failed to import requests: /);
  });

  it('drops constraints of unknown type', () => {
    const json = JSON.stringify({
      requests: [
        {
          id: 'r',
          prompt: 'Draw a cat',
          constraints: [{ type: 'rainbowOnly', intValue: 1 }, { type: 'pixelLimit', intValue: 60 }],
        },
      ],
    });

    assert.deepEqual(importRequests(json), [
      {
        id: 'r',
        prompt: 'Draw a cat',
        constraints: [{ type: 'pixelLimit', intValue: 60, floatValue: 0, boolValue: false }],
        isCompleted: false,
      },
    ]);
  });
});
