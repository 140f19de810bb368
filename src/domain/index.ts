/**
 * Domain Layer Barrel Export
 *
 * The domain layer has no dependency on the application or infrastructure layers.
 */

// Entities
export { DownloadJob, type CallbackPayload } from './entities/download-job.entity';

// Value Objects
export { JobState, isConcluded } from './value-objects/job-state.vo';

// Errors
export { ValidationError, ConfigurationError } from './errors/domain.errors';

// Events
export * from './events';
