import { ok, type OperationResult } from '@kitchen-sim/core';
import type { SessionStore } from './session-store.js';
import type { CookingSession, SessionSnapshot } from './types.js';

/**
 * Client-facing view of one session, read straight from the store so it
 * always matches what the clock last wrote.
 */
export class StatusQuery {
  private readonly store: SessionStore;

  constructor(store: SessionStore) {
    this.store = store;
  }

  status(sessionId: string): OperationResult<SessionSnapshot> {
    const found = this.store.get(sessionId);
    if (!found.success) return found;
    return ok(toSnapshot(found.value));
  }
}

export function toSnapshot(session: CookingSession): SessionSnapshot {
  return {
    id: session.id,
    recipeName: session.recipeName,
    status: session.status,
    currentStepIndex: session.currentStepIndex,
    totalSteps: session.steps.length,
    timeRemainingSeconds: session.timeRemainingSeconds,
    currentInstruction: currentInstruction(session),
  };
}

function currentInstruction(session: CookingSession): string | null {
  switch (session.status) {
    case 'completed': return 'Complete';
    case 'stopped': return 'Stopped';
    case 'starting': return null;
    case 'cooking': return session.steps[session.currentStepIndex - 1]?.instruction ?? null;
  }
}
