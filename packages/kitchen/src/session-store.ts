import { InMemoryStore, invalid, type OperationResult } from '@kitchen-sim/core';
import type { CookingSession, CookingStep } from './types.js';

export interface SessionStoreOptions {
  /** Clock for `createdAt` (default: Date.now) */
  now?: () => number;
}

/**
 * Single source of truth for cooking sessions.
 *
 * Sessions are held by value and never evicted; only the cooking clock
 * mutates them after creation.
 */
export class SessionStore extends InMemoryStore<CookingSession> {
  private readonly now: () => number;

  constructor(options?: SessionStoreOptions) {
    super({ entity: 'Session', duplicateCode: 'DUPLICATE_SESSION' });
    this.now = options?.now ?? Date.now;
  }

  /**
   * Register a new session in the `starting` state.
   * Fails with DUPLICATE_SESSION when the id is taken.
   */
  create(id: string, recipeName: string, steps: CookingStep[]): OperationResult<CookingSession> {
    if (!recipeName.trim()) {
      return invalid('Recipe name must not be blank');
    }
    if (steps.length === 0) {
      return invalid('A cooking session needs at least one step');
    }

    return this.insert(id, {
      id,
      recipeName,
      steps,
      currentStepIndex: 0,
      status: 'starting',
      timeRemainingSeconds: 0,
      createdAt: new Date(this.now()).toISOString(),
    });
  }
}
