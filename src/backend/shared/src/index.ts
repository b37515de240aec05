/**
 * Shared Package
 *
 * Exports the models, schemas, errors, logging, metrics, cache and
 * configuration used by the scoring service and the API.
 */

// Job models and schemas
export * from './models/job.js';

// Contractor models and schemas
export * from './models/contractor.js';

// Assignment models and schemas
export * from './models/assignment.js';

// Recommendation models and schemas
export * from './models/recommendation.js';

// Domain errors
export * from './errors/domain-errors.js';

// Cache client
export * from './cache/cache-client.js';

// Logging
export * from './logging/logger.js';

// Metrics
export * from './metrics/metrics-collector.js';

// Configuration
export * from './config/app-config.js';

// Cancellation helpers
export * from './utils/abort.js';
