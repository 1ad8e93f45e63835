/**
 * @packageDocumentation
 * Kitchen Simulator Core Public API
 *
 * This file defines the stable public API for @kitchen-sim/core.
 * Only types exported here are guaranteed to be stable.
 *
 * @version 0.1.0
 */

// ============================================================================
// Configuration
// ============================================================================

/**
 * Configuration for the HTTP server framework
 * @public
 */
export interface ServerConfig {
  /** Application metadata */
  app: {
    /** Application name */
    name: string;
    /** Application description */
    description: string;
    /** Application version */
    version: string;
  };

  /** CORS configuration */
  cors?: {
    /** Allowed origins (default: ['*']) */
    origins?: string[];
    /** Allowed HTTP methods (default: GET, POST, PUT, DELETE, OPTIONS) */
    methods?: string[];
    /** Allowed headers (default: Content-Type, Authorization) */
    headers?: string[];
    /** Max age for preflight cache in seconds (default: 86400) */
    maxAge?: number;
  };
}

// ============================================================================
// Route Composition
// ============================================================================

/**
 * Per-request context handed to route handlers
 * @public
 */
export interface RouteContext {
  /** Parsed request URL */
  url: URL;
  /** Values captured by `:name` segments in the route path */
  params: Record<string, string>;
}

/**
 * HTTP route handler function
 * Returns Response if handled, null to pass to next handler
 * @public
 */
export type RouteHandler = (
  request: Request,
  ctx: RouteContext
) => Promise<Response | null> | Response | null;

/**
 * HTTP route definition
 * @public
 */
export interface Route {
  /** HTTP method (or '*' for all methods) */
  method: 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH' | '*';
  /** URL path pattern (exact match, `:name` parameters, or prefix with trailing *) */
  path: string;
  /** Route handler */
  handler: RouteHandler;
  /** Optional: route description for the endpoint index */
  description?: string;
}

/**
 * Route group contributed by a feature module
 * @public
 */
export interface RouteGroup {
  /** Routes in this group */
  routes: Route[];
  /** Optional: prefix all paths in group */
  prefix?: string;
}

// ============================================================================
// Scheduling
// ============================================================================

/**
 * Handle returned for every scheduled callback
 * @public
 */
export interface Cancellable {
  /** Stop the callback from firing again. Safe to call more than once. */
  cancel(): void;
}

/**
 * Timer abstraction used by everything that advances on its own.
 *
 * Production code uses {@link TimerScheduler}; tests drive a
 * {@link ManualScheduler} with virtual time.
 *
 * @public
 */
export interface Scheduler {
  /** Run `callback` once after `delayMs` */
  after(delayMs: number, callback: () => void): Cancellable;
  /** Run `callback` every `intervalMs` until cancelled */
  every(intervalMs: number, callback: () => void): Cancellable;
  /** Current time in milliseconds since the epoch */
  now(): number;
  /** Cancel every pending callback created by this scheduler */
  cancelAll(): void;
  /** Number of callbacks still pending */
  pending(): number;
}

// ============================================================================
// Logging
// ============================================================================

/**
 * Log levels, lowest to highest
 * @public
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Minimal logger accepted by every component
 * @public
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Structured service error
 * @public
 */
export interface ServiceError {
  /** Error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable message */
  message: string;
  /** Whether the caller may retry this operation */
  retryable: boolean;
  /** Extra structured context (field errors, ids) */
  details?: Record<string, unknown>;
}

/**
 * Standard error codes
 * @public
 */
export type ErrorCode =
  | 'VALIDATION_ERROR'      // Malformed or out-of-range input
  | 'NOT_FOUND'             // Unknown session or appliance
  | 'ALREADY_EXISTS'        // Id collision in a record store
  | 'DUPLICATE_SESSION'     // Id collision on session create
  | 'DELIVERY_FAILED'       // One observer could not be reached (retryable)
  | 'INTERNAL_ERROR';       // Unexpected failure

/**
 * Result of a core operation - discriminated union
 *
 * Expected failures travel as values; nothing in the core throws for them.
 *
 * @public
 */
export type OperationResult<T> =
  | { success: true; value: T }
  | { success: false; error: ServiceError };

// ============================================================================
// Validation
// ============================================================================

/**
 * JSON Schema definition (the subset {@link validateInput} understands)
 * @public
 */
export interface JSONSchema {
  type?: 'object' | 'string' | 'number' | 'integer' | 'boolean' | 'array';
  properties?: Record<string, JSONSchema>;
  required?: string[];
  items?: JSONSchema;
  enum?: unknown[];
  minimum?: number;
  maximum?: number;
  minLength?: number;
  minItems?: number;
  description?: string;
  default?: unknown;
}

/**
 * Validation result
 * @public
 */
export interface ValidationResult {
  /** Whether validation passed */
  valid: boolean;
  /** Validation errors (if any) */
  errors?: ValidationError[];
}

/**
 * Validation error
 * @public
 */
export interface ValidationError {
  /** JSON path to invalid field */
  path: string;
  /** Error message */
  message: string;
}
