import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { resolveDataPaths } from '../paths.js';
import { makeHome } from './helpers.js';

test('data paths: --home decides the layout', () => {
  const p = resolveDataPaths({ cwd: '/repo', home: 'work', env: {} });

  assert.equal(p.root, path.resolve('/repo', 'work'));
  assert.equal(p.stateDir, path.resolve('/repo', 'work', '.pixel-records'));
  assert.equal(p.configFile, path.resolve('/repo', 'work', '.pixel-records', 'config.json'));
  assert.equal(p.saveDir, path.resolve('/repo', 'work', '.pixel-records', 'save'));
});

test('--home wins over PIXEL_RECORDS_HOME', () => {
  const p = resolveDataPaths({ cwd: '/repo', home: '/flag', env: { PIXEL_RECORDS_HOME: '/from-env' } });
  assert.equal(p.root, '/flag');
});

test('PIXEL_RECORDS_HOME is used when no --home is given', () => {
  const p = resolveDataPaths({ cwd: '/repo', env: { PIXEL_RECORDS_HOME: '/from-env' } });
  assert.equal(p.root, '/from-env');
});

test('--save-dir override resolves against the root', () => {
  const p = resolveDataPaths({ cwd: '/repo', home: '/data', saveDirOverride: 'custom/save', env: {} });
  assert.equal(p.saveDir, path.resolve('/data', 'custom/save'));
  assert.equal(p.configFile, path.resolve('/data', '.pixel-records', 'config.json'));
});

test('find-up locates the nearest directory holding .pixel-records/config.json', () => {
  const root = makeHome();
  fs.mkdirSync(path.join(root, '.pixel-records'), { recursive: true });
  fs.writeFileSync(path.join(root, '.pixel-records', 'config.json'), '{}', 'utf8');

  const nested = path.join(root, 'a', 'b');
  fs.mkdirSync(nested, { recursive: true });

  const p = resolveDataPaths({ cwd: nested, env: {} });
  assert.equal(p.root, root);
});

test('find-up falls back to cwd when no config exists above it', () => {
  const dir = makeHome();
  const p = resolveDataPaths({ cwd: dir, env: {} });
  assert.equal(p.root, dir);
});
