/**
 * Contractor Scoring Service
 *
 * Availability, slot finding, distance lookup and the scoring engine that
 * ranks contractors for a job.
 */

export const VERSION = '1.0.0';

// Scoring
export * from './scoring/scoring-constants.js';
export * from './scoring/normalization.js';
export * from './scoring/worker-pool.js';
export * from './scoring/scoring-engine.js';

// Availability
export * from './availability/time-window.js';
export * from './availability/availability-evaluator.js';
export * from './availability/slot-finder.js';

// Distance providers
export * from './distance/distance-provider.js';
export * from './distance/haversine-distance-provider.js';
export * from './distance/http-distance-provider.js';
export * from './distance/cached-distance-provider.js';

// Repositories
export * from './repositories/repositories.js';
export * from './repositories/in-memory-repositories.js';
