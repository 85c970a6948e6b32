// packages/records/src/index.ts
//
// Public exports for @pixel-records/records.

export type {
  Color32,
  PixelEntry,
  ConstraintType,
  ConstraintData,
  ArtworkRecord,
  RequestRecord,
} from './types.js';
export { CONSTRAINT_TYPES, isConstraintType, withLikeToggled, withCompleted } from './types.js';

export type { Logger } from './log.js';
export { errorMessage } from './log.js';

export type { CountSinks, IntVariableEvents } from './sinks.js';
export { IntVariable, countSinksFor } from './sinks.js';

export type { ChallengeConfig } from './config.js';
export {
  DEFAULT_CHALLENGE_CONFIG,
  MIN_MAX_ACTIVE_REQUESTS,
  MAX_MAX_ACTIVE_REQUESTS,
  MIN_TIME_LIMIT,
  MIN_COLOR_LIMIT,
  ensureChallengeConfigDefaults,
} from './config.js';

export type { RecordStoreEvents, RecordStoreOptions, PredefinedRequestsSource } from './store.js';
export { RecordStore } from './store.js';

export { toggleLike, hasLiked } from './like.js';
