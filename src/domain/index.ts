export type { SalesEvent, EventSource, SalesEventType, EventMetadata, Reward } from './event.js';
export { EVENT_SOURCES, EVENT_TYPES } from './event.js';
export { MAX_METADATA_LENGTH, canonicalJson, hashMetadata, admissionKey } from './metadata.js';
export type { LevelProgress, Rank } from './progression.js';
export { LEVEL_WIDTH, RANK_LADDER, deriveLevel, rankForMeetings } from './progression.js';
export type { ValidationIssue } from './errors.js';
export {
  AppError,
  AuthError,
  ValidationError,
  RuleNotFoundError,
  StoreError,
  PoolExhaustedError,
  RateLimitedError,
  ConfigError,
} from './errors.js';
