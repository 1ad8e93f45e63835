/**
 * Cooking service
 *
 * Entry point for "start a cooking session" and "read its status": plans the
 * steps, registers the session, starts its clock.
 */

import {
  optionalNumber,
  optionalString,
  optionalStringArray,
  validateRecord,
  ok,
  type JSONSchema,
  type OperationResult,
} from '@kitchen-sim/core';
import type { CookingClock } from './cooking-clock.js';
import { estimateCookingMinutes, normalizeSteps, planSteps, simulationSteps } from './planner.js';
import type { SessionStore } from './session-store.js';
import type { StatusQuery } from './status-query.js';
import type {
  CookingSession,
  CookingStep,
  HistoryEntry,
  SessionSnapshot,
  StartCookingRequest,
  StartCookingResult,
} from './types.js';

export const DEFAULT_ESTIMATED_MINUTES = 10;
export const DEFAULT_COOKING_METHOD = 'pressure';
export const HISTORY_LIMIT = 20;

export const START_COOKING_SCHEMA: JSONSchema = {
  type: 'object',
  properties: {
    recipeName: { type: 'string', minLength: 1, description: 'Recipe to cook' },
    estimatedMinutes: { type: 'integer', description: 'Estimated total time (default 10)' },
    instructions: { type: 'string', description: 'Free-text recipe instructions' },
    sessionId: { type: 'string', minLength: 1, description: 'Caller-chosen session id' },
    ingredients: {
      type: 'array',
      items: { type: 'string', minLength: 1 },
      description: 'Ingredients, used to estimate the time when estimatedMinutes is absent',
    },
    method: { type: 'string', minLength: 1, description: 'Cooking method for the estimate (default pressure)' },
  },
  required: ['recipeName'],
};

export const START_RECIPE_SCHEMA: JSONSchema = {
  type: 'object',
  properties: {
    recipeName: { type: 'string', minLength: 1 },
    steps: { type: 'array' },
  },
  required: ['steps'],
};

export interface CookingServiceOptions {
  store: SessionStore;
  clock: CookingClock;
  statusQuery: StatusQuery;
  /** Clock used for generated ids (default: Date.now) */
  now?: () => number;
}

/**
 * Parse a JSON body into a start request
 */
export function parseStartCookingRequest(body: unknown): OperationResult<StartCookingRequest> {
  const record = validateRecord(body, START_COOKING_SCHEMA);
  if (!record.success) return record;

  return ok({
    recipeName: (optionalString(record.value, 'recipeName') ?? '').trim(),
    estimatedMinutes: optionalNumber(record.value, 'estimatedMinutes'),
    instructions: optionalString(record.value, 'instructions'),
    sessionId: optionalString(record.value, 'sessionId'),
    ingredients: optionalStringArray(record.value, 'ingredients'),
    method: optionalString(record.value, 'method')?.trim(),
  });
}

export class CookingService {
  private readonly store: SessionStore;
  private readonly clock: CookingClock;
  private readonly statusQuery: StatusQuery;
  private readonly now: () => number;

  constructor(options: CookingServiceOptions) {
    this.store = options.store;
    this.clock = options.clock;
    this.statusQuery = options.statusQuery;
    this.now = options.now ?? Date.now;
  }

  /**
   * Plan and start a session. Without instructions the autocooker demo plan
   * is used. Without an estimate, one is derived from the ingredients, or
   * defaults to 10 minutes.
   */
  startCooking(request: StartCookingRequest): OperationResult<StartCookingResult> {
    const estimatedMinutes = request.estimatedMinutes ?? (request.ingredients
      ? estimateCookingMinutes(request.ingredients, request.method ?? DEFAULT_COOKING_METHOD)
      : DEFAULT_ESTIMATED_MINUTES);
    const steps = request.instructions !== undefined
      ? planSteps(request.instructions, estimatedMinutes)
      : simulationSteps(request.recipeName, estimatedMinutes);

    return this.launch(request.sessionId ?? this.generateId(), request.recipeName, steps, estimatedMinutes);
  }

  /**
   * Start a session from an explicit step list
   */
  startRecipe(recipeName: string, stepsInput: unknown): OperationResult<StartCookingResult> {
    const steps = normalizeSteps(stepsInput);
    if (!steps.success) return steps;

    const estimatedMinutes = steps.value.reduce((sum, step) => sum + step.durationMinutes, 0);
    return this.launch(this.generateId(), recipeName, steps.value, estimatedMinutes);
  }

  stop(sessionId: string): OperationResult<SessionSnapshot> {
    const stopped = this.clock.stop(sessionId);
    if (!stopped.success) return stopped;
    return this.statusQuery.status(sessionId);
  }

  status(sessionId: string): OperationResult<SessionSnapshot> {
    return this.statusQuery.status(sessionId);
  }

  /**
   * Sessions currently counting down, oldest first
   */
  activeSessions(): CookingSession[] {
    return this.store.list().filter(session => session.status === 'cooking');
  }

  /**
   * Finished sessions, newest first
   */
  history(limit = HISTORY_LIMIT): HistoryEntry[] {
    const entries: HistoryEntry[] = [];
    for (const session of this.store.list()) {
      if (session.status !== 'completed' && session.status !== 'stopped') continue;

      const started = session.startedAt ? Date.parse(session.startedAt) : NaN;
      const ended = session.endedAt ? Date.parse(session.endedAt) : NaN;
      entries.push({
        id: session.id,
        recipeName: session.recipeName,
        status: session.status,
        startedAt: session.startedAt ?? null,
        endedAt: session.endedAt ?? null,
        totalMinutes: Number.isNaN(started) || Number.isNaN(ended)
          ? 0
          : Math.round((ended - started) / 60_000),
        stepsCompleted: session.status === 'completed'
          ? session.steps.length
          : Math.max(0, session.currentStepIndex - 1),
      });
    }

    return entries
      .sort((a, b) => (b.endedAt ?? '').localeCompare(a.endedAt ?? ''))
      .slice(0, limit);
  }

  private launch(
    sessionId: string,
    recipeName: string,
    steps: CookingStep[],
    estimatedMinutes: number
  ): OperationResult<StartCookingResult> {
    const created = this.store.create(sessionId, recipeName, steps);
    if (!created.success) return created;

    const started = this.clock.start(sessionId);
    if (!started.success) return started;

    return ok({
      sessionId,
      recipeName,
      totalSteps: steps.length,
      estimatedMinutes,
      currentInstruction: steps[0]?.instruction ?? '',
    });
  }

  private generateId(): string {
    return `session_${this.now().toString(36)}${Math.random().toString(36).slice(2, 6)}`;
  }
}
