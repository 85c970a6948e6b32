// packages/cli/src/config_store.ts
import fs from 'node:fs';
import path from 'node:path';

import { ensureChallengeConfigDefaults, type ChallengeConfig, type RequestRecord } from '@pixel-records/records';
import { toRequestRecords } from '@pixel-records/persistence';

export type ChallengeSettingsV1 = {
  predefinedRequests?: RequestRecord[];
  maxActiveRequests?: number;
  defaultTimeLimit?: number;
  defaultColorLimit?: number;
};

export type PixelctlConfigV1 = {
  version: 1;
  createdAt: string;
  challenge: ChallengeSettingsV1;
};

function ensureParentDir(filename: string) {
  fs.mkdirSync(path.dirname(filename), { recursive: true });
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function optionalNumber(x: unknown): number | undefined {
  return typeof x === 'number' && Number.isFinite(x) ? x : undefined;
}

function normalizeChallenge(x: unknown): ChallengeSettingsV1 {
  if (!isRecord(x)) return {};

  const out: ChallengeSettingsV1 = {};
  if (x.predefinedRequests !== undefined) out.predefinedRequests = toRequestRecords(x.predefinedRequests);

  const maxActiveRequests = optionalNumber(x.maxActiveRequests);
  const defaultTimeLimit = optionalNumber(x.defaultTimeLimit);
  const defaultColorLimit = optionalNumber(x.defaultColorLimit);
  if (maxActiveRequests !== undefined) out.maxActiveRequests = maxActiveRequests;
  if (defaultTimeLimit !== undefined) out.defaultTimeLimit = defaultTimeLimit;
  if (defaultColorLimit !== undefined) out.defaultColorLimit = defaultColorLimit;

  return out;
}

export function ensureConfigDefaults(partial?: unknown): PixelctlConfigV1 {
  const p = isRecord(partial) ? partial : {};

  return {
    version: 1,
    createdAt: typeof p.createdAt === 'string' && p.createdAt ? p.createdAt : new Date().toISOString(),
    challenge: normalizeChallenge(p.challenge),
  };
}

/** Null when the file does not exist. A file that is not valid JSON throws. */
export function readConfig(args: { configFile: string }): PixelctlConfigV1 | null {
  const { configFile } = args;
  if (!fs.existsSync(configFile)) return null;

  const raw = fs.readFileSync(configFile, 'utf8');
  const parsed: unknown = JSON.parse(raw);
  return ensureConfigDefaults(parsed);
}

export function writeConfig(args: { configFile: string; config: PixelctlConfigV1 }): void {
  const { configFile, config } = args;
  ensureParentDir(configFile);
  const normalized = ensureConfigDefaults(config);
  fs.writeFileSync(configFile, JSON.stringify(normalized, null, 2) + '\n', 'utf8');
}

export function challengeConfigFrom(config: PixelctlConfigV1): ChallengeConfig {
  return ensureChallengeConfigDefaults(config.challenge);
}
