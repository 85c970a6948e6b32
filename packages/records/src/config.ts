// packages/records/src/config.ts
import type { RequestRecord } from './types.js';

export const MIN_MAX_ACTIVE_REQUESTS = 1;
export const MAX_MAX_ACTIVE_REQUESTS = 10;
export const MIN_TIME_LIMIT = 5;
export const MIN_COLOR_LIMIT = 1;

export type ChallengeConfig = {
  /** Loaded into the store once, at construction. */
  predefinedRequests: RequestRecord[];

  maxActiveRequests: number;
  defaultTimeLimit: number; // seconds
  defaultColorLimit: number;
};

export const DEFAULT_CHALLENGE_CONFIG: ChallengeConfig = {
  predefinedRequests: [],
  maxActiveRequests: 3,
  defaultTimeLimit: 60,
  defaultColorLimit: 4,
};

function finiteOr(x: unknown, fallback: number): number {
  return typeof x === 'number' && Number.isFinite(x) ? x : fallback;
}

/**
 * Fill missing fields and clamp limits into range.
 * Idempotent; a null/undefined input yields the defaults.
 */
export function ensureChallengeConfigDefaults(
  partial?: Partial<ChallengeConfig> | null
): ChallengeConfig {
  const p = partial ?? {};
  const d = DEFAULT_CHALLENGE_CONFIG;

  const maxActive = Math.trunc(finiteOr(p.maxActiveRequests, d.maxActiveRequests));
  const colorLimit = Math.trunc(finiteOr(p.defaultColorLimit, d.defaultColorLimit));

  return {
    predefinedRequests: Array.isArray(p.predefinedRequests) ? p.predefinedRequests : [],
    maxActiveRequests: Math.min(MAX_MAX_ACTIVE_REQUESTS, Math.max(MIN_MAX_ACTIVE_REQUESTS, maxActive)),
    defaultTimeLimit: Math.max(MIN_TIME_LIMIT, finiteOr(p.defaultTimeLimit, d.defaultTimeLimit)),
    defaultColorLimit: Math.max(MIN_COLOR_LIMIT, colorLimit),
  };
}
