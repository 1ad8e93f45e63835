/**
 * Cooking clock
 *
 * Per-session state machine:
 *
 *   starting -> cooking(1) -> cooking(2) -> ... -> completed
 *        \__________\______________\_____________-> stopped
 *
 * One countdown runs per cooking session. Every tick removes a second from the
 * active step; at zero the step completes and the next one starts (or the
 * session completes). All mutations go through the session store and every
 * transition is published on the broadcaster.
 */

import {
  createLogger,
  describeError,
  invalid,
  ok,
  type Cancellable,
  type Logger,
  type OperationResult,
  type Scheduler,
} from '@kitchen-sim/core';
import type { UpdateBroadcaster } from './broadcaster.js';
import type { SessionStore } from './session-store.js';
import type { CookingSession } from './types.js';

export interface CookingClockOptions {
  store: SessionStore;
  broadcaster: UpdateBroadcaster;
  scheduler: Scheduler;
  logger?: Logger;
  /** Length of one tick in ms (default: 1000) */
  tickMs?: number;
  /** Emit `timer_update` when the remaining seconds are a multiple of this (default: 30) */
  timerUpdateEverySeconds?: number;
}

export class CookingClock {
  private readonly store: SessionStore;
  private readonly broadcaster: UpdateBroadcaster;
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;
  private readonly tickMs: number;
  private readonly timerUpdateEvery: number;
  private countdowns = new Map<string, Cancellable>();

  constructor(options: CookingClockOptions) {
    this.store = options.store;
    this.broadcaster = options.broadcaster;
    this.scheduler = options.scheduler;
    this.logger = options.logger ?? createLogger('clock');
    this.tickMs = options.tickMs ?? 1000;
    this.timerUpdateEvery = options.timerUpdateEverySeconds ?? 30;
  }

  /**
   * Begin the first step of a `starting` session.
   */
  start(sessionId: string): OperationResult<CookingSession> {
    const found = this.store.get(sessionId);
    if (!found.success) return found;

    if (found.value.status !== 'starting') {
      return invalid(`Session ${sessionId} is already ${found.value.status}`);
    }

    return this.beginStep(sessionId, 1);
  }

  /**
   * Stop a session early. The session is kept with status `stopped`;
   * stopping a finished session returns it unchanged.
   */
  stop(sessionId: string): OperationResult<CookingSession> {
    const found = this.store.get(sessionId);
    if (!found.success) return found;
    if (found.value.status === 'completed' || found.value.status === 'stopped') {
      return found;
    }

    this.cancelCountdown(sessionId);
    const stopped = this.store.update(sessionId, session => ({
      ...session,
      status: 'stopped',
      timeRemainingSeconds: 0,
      endedAt: this.timestamp(),
    }));
    if (!stopped.success) return stopped;

    this.logger.info(`Stopped ${stopped.value.recipeName} (${sessionId}) at step ${stopped.value.currentStepIndex}`);
    this.broadcaster.publish('cooking_stopped', {
      sessionId,
      recipeName: stopped.value.recipeName,
      stepNumber: stopped.value.currentStepIndex,
    });
    return stopped;
  }

  isRunning(sessionId: string): boolean {
    return this.countdowns.has(sessionId);
  }

  activeCount(): number {
    return this.countdowns.size;
  }

  /**
   * Cancel every countdown. Sessions keep their last state.
   */
  shutdown(): void {
    for (const sessionId of [...this.countdowns.keys()]) {
      this.cancelCountdown(sessionId);
    }
  }

  // ---------------------------------------------------------------------------
  // Transitions
  // ---------------------------------------------------------------------------

  /**
   * Only a live session moves on. A session stopped while its previous step
   * was being published stays stopped.
   */
  private beginStep(sessionId: string, stepNumber: number): OperationResult<CookingSession> {
    const current = this.store.get(sessionId);
    if (!current.success) return current;
    const { status } = current.value;
    if (status !== 'cooking' && !(status === 'starting' && stepNumber === 1)) {
      return invalid(`Session ${sessionId} is ${status}`);
    }

    const startedAt = this.timestamp();
    const updated = this.store.update(sessionId, session => {
      const step = session.steps[stepNumber - 1];
      return {
        ...session,
        status: 'cooking',
        currentStepIndex: stepNumber,
        timeRemainingSeconds: Math.max(0, Math.round((step?.durationMinutes ?? 0) * 60)),
        startedAt: session.startedAt ?? startedAt,
      };
    });
    if (!updated.success) return updated;

    const session = updated.value;
    const step = session.steps[stepNumber - 1];
    this.logger.info(
      `Step ${stepNumber}/${session.steps.length} of ${session.recipeName}: ${step?.instruction ?? ''} (${session.timeRemainingSeconds}s)`
    );
    this.broadcaster.publish('cooking_step_start', {
      sessionId,
      stepNumber,
      instruction: step?.instruction ?? '',
      timeRemaining: session.timeRemainingSeconds,
      duration: step?.durationMinutes ?? 0,
    });

    this.cancelCountdown(sessionId);
    this.countdowns.set(sessionId, this.scheduler.every(this.tickMs, () => this.safeTick(sessionId)));
    return ok(session);
  }

  private complete(sessionId: string): void {
    const current = this.store.get(sessionId);
    if (!current.success || current.value.status !== 'cooking') return;

    const completed = this.store.update(sessionId, session => ({
      ...session,
      status: 'completed',
      currentStepIndex: session.steps.length,
      timeRemainingSeconds: 0,
      endedAt: this.timestamp(),
    }));
    if (!completed.success) return;

    const { recipeName } = completed.value;
    this.logger.info(`Cooking complete: ${recipeName} (${sessionId})`);
    this.broadcaster.publish('cooking_complete', {
      sessionId,
      recipeName,
      message: `${recipeName} is ready!`,
    });
  }

  // ---------------------------------------------------------------------------
  // Countdown
  // ---------------------------------------------------------------------------

  /**
   * A throwing tick is logged and skipped; the countdown keeps running.
   */
  private safeTick(sessionId: string): void {
    try {
      this.tick(sessionId);
    } catch (error) {
      this.logger.error(`Tick for ${sessionId} failed, skipping: ${describeError(error)}`);
    }
  }

  private tick(sessionId: string): void {
    const result = this.store.update(sessionId, session => ({
      ...session,
      timeRemainingSeconds: Math.max(0, session.timeRemainingSeconds - 1),
    }));

    // Session removed or finished behind our back: nothing left to count
    if (!result.success || result.value.status !== 'cooking') {
      this.cancelCountdown(sessionId);
      return;
    }

    const session = result.value;
    const remaining = session.timeRemainingSeconds;

    if (remaining > 0) {
      if (remaining % this.timerUpdateEvery === 0) {
        this.broadcaster.publish('timer_update', {
          sessionId,
          timeRemaining: remaining,
          currentStep: session.currentStepIndex,
        });
      }
      return;
    }

    this.cancelCountdown(sessionId);
    const step = session.steps[session.currentStepIndex - 1];
    this.broadcaster.publish('cooking_step_complete', {
      sessionId,
      stepNumber: session.currentStepIndex,
      instruction: step?.instruction ?? '',
    });

    if (session.currentStepIndex < session.steps.length) {
      this.beginStep(sessionId, session.currentStepIndex + 1);
    } else {
      this.complete(sessionId);
    }
  }

  private cancelCountdown(sessionId: string): void {
    this.countdowns.get(sessionId)?.cancel();
    this.countdowns.delete(sessionId);
  }

  private timestamp(): string {
    return new Date(this.scheduler.now()).toISOString();
  }
}
