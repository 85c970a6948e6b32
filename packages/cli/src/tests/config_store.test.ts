import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { challengeConfigFrom, ensureConfigDefaults, readConfig, writeConfig } from '../config_store.js';
import { makeHome } from './helpers.js';

test('readConfig returns null for a missing file', () => {
  const home = makeHome();
  assert.equal(readConfig({ configFile: path.join(home, 'nope.json') }), null);
});

test('readConfig throws on a file that is not JSON', () => {
  const home = makeHome();
  const configFile = path.join(home, 'config.json');
  fs.writeFileSync(configFile, 'not json', 'utf8');

  assert.throws(() => readConfig({ configFile }), SyntaxError);
});

test('ensureConfigDefaults keeps createdAt and drops non-numeric limits', () => {
  const cfg = ensureConfigDefaults({
    createdAt: '2024-01-01T00:00:00.000Z',
    challenge: { maxActiveRequests: 'five', defaultTimeLimit: 30 },
  });

  assert.equal(cfg.version, 1);
  assert.equal(cfg.createdAt, '2024-01-01T00:00:00.000Z');
  assert.deepEqual(cfg.challenge, { defaultTimeLimit: 30 });
});

test('predefined requests in the config are normalized', () => {
  const cfg = ensureConfigDefaults({
    challenge: {
      predefinedRequests: [
        { id: 'r1', prompt: 'Draw a fish', constraints: [{ type: 'glitter', intValue: 1 }] },
        'not a request',
      ],
    },
  });

  assert.deepEqual(cfg.challenge.predefinedRequests, [
    { id: 'r1', prompt: 'Draw a fish', constraints: [], isCompleted: false },
  ]);
});

test('challengeConfigFrom clamps limits into range', () => {
  const cfg = ensureConfigDefaults({
    challenge: { maxActiveRequests: 50, defaultTimeLimit: 1, defaultColorLimit: 0 },
  });

  assert.deepEqual(challengeConfigFrom(cfg), {
    predefinedRequests: [],
    maxActiveRequests: 10,
    defaultTimeLimit: 5,
    defaultColorLimit: 1,
  });
});

test('writeConfig then readConfig round-trips', () => {
  const home = makeHome();
  const configFile = path.join(home, '.pixel-records', 'config.json');
  const config = ensureConfigDefaults({
    createdAt: '2024-01-01T00:00:00.000Z',
    challenge: { maxActiveRequests: 2 },
  });

  writeConfig({ configFile, config });

  assert.deepEqual(readConfig({ configFile }), config);
});
