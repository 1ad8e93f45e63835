/**
 * @kitchen-sim/core
 *
 * Stable public API for the Kitchen Simulator server framework
 *
 * @packageDocumentation
 */

// Re-export ONLY public API types
export type {
  // Configuration
  ServerConfig,

  // Routes
  Route,
  RouteGroup,
  RouteHandler,
  RouteContext,

  // Scheduling
  Scheduler,
  Cancellable,

  // Logging
  Logger,
  LogLevel,

  // Errors
  ServiceError,
  ErrorCode,
  OperationResult,

  // Validation
  JSONSchema,
  ValidationResult,
  ValidationError,
} from './types/public-api.js';

// Direct utility exports (convenience)
export {
  createServiceError,
  ok,
  fail,
  notFound,
  invalid,
  errorResponse,
  describeError,
} from './utils/errors.js';
export {
  validateInput,
  validateRecord,
  optionalString,
  optionalNumber,
  optionalRecord,
  optionalStringArray,
} from './utils/validation.js';
export { createLogger, isLogLevel, silentLogger } from './utils/logger.js';
export { jsonResponse, readJson } from './server/responses.js';

// Re-export version
export { VERSION } from './version.js';

// Re-export main server class
export { AppServer, matchPath, type AppServerOptions } from './server/app-server.js';

// Re-export schedulers and the record store
export {
  TimerScheduler,
  ManualScheduler,
  MAX_TIMEOUT_MS,
  type TimerSchedulerOptions,
} from './scheduler/scheduler.js';
export { InMemoryStore, type InMemoryStoreOptions } from './storage/in-memory.js';
