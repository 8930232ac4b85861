export { ScoreRepository, scorePassed, displayScoreValue } from './repository.js';
export { resolveScoreable, makeScoreable, type ScoreableLookups, type ResolvedScoreable } from './scoreable.js';
export { initScoreSchema } from './schema.js';
export * from './types.js';
