/**
 * Scheduler implementations
 *
 * `TimerScheduler` drives real wall-clock timers. `ManualScheduler` keeps a
 * virtual clock that only moves when `advance()` is called, so state machines
 * built on the {@link Scheduler} interface can be tested tick by tick.
 *
 * @internal
 */

import type { Cancellable, Scheduler } from '../types/public-api.js';

/** Longest delay `setTimeout` honours; Node fires anything larger after 1 ms */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface TimerSchedulerOptions {
  /** Longest single timer; longer delays are split into a chain (default: {@link MAX_TIMEOUT_MS}) */
  maxDelayMs?: number;
}

/**
 * Scheduler backed by `setTimeout` / `setInterval`.
 *
 * Every live handle is tracked so shutdown can release all of them at once.
 */
export class TimerScheduler implements Scheduler {
  private handles = new Set<Cancellable>();
  private readonly maxDelayMs: number;

  constructor(options?: TimerSchedulerOptions) {
    this.maxDelayMs = Math.min(Math.max(1, options?.maxDelayMs ?? MAX_TIMEOUT_MS), MAX_TIMEOUT_MS);
  }

  after(delayMs: number, callback: () => void): Cancellable {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const handle: Cancellable = {
      cancel: () => {
        clearTimeout(timer);
        this.handles.delete(handle);
      },
    };

    const arm = (remainingMs: number) => {
      const chunk = Math.min(remainingMs, this.maxDelayMs);
      timer = setTimeout(() => {
        if (remainingMs > chunk) {
          arm(remainingMs - chunk);
          return;
        }
        this.handles.delete(handle);
        callback();
      }, chunk);
    };

    arm(Math.max(0, delayMs));
    this.handles.add(handle);
    return handle;
  }

  every(intervalMs: number, callback: () => void): Cancellable {
    const timer = setInterval(callback, intervalMs);
    const handle: Cancellable = {
      cancel: () => {
        clearInterval(timer);
        this.handles.delete(handle);
      },
    };
    this.handles.add(handle);
    return handle;
  }

  now(): number {
    return Date.now();
  }

  cancelAll(): void {
    for (const handle of [...this.handles]) {
      handle.cancel();
    }
  }

  pending(): number {
    return this.handles.size;
  }
}

interface ManualTask {
  seq: number;
  dueAt: number;
  intervalMs?: number;
  callback: () => void;
}

/**
 * Virtual-time scheduler for tests.
 *
 * @example
 * ```typescript
 * const scheduler = new ManualScheduler();
 * scheduler.every(1000, tick);
 * scheduler.advance(60_000); // tick runs 60 times
 * ```
 */
export class ManualScheduler implements Scheduler {
  private tasks = new Map<number, ManualTask>();
  private nextSeq = 1;
  private currentTime: number;

  constructor(startTime = 0) {
    this.currentTime = startTime;
  }

  after(delayMs: number, callback: () => void): Cancellable {
    return this.add({ dueAt: this.currentTime + Math.max(0, delayMs), callback });
  }

  every(intervalMs: number, callback: () => void): Cancellable {
    // A zero interval would never let virtual time move
    const interval = Math.max(1, intervalMs);
    return this.add({ dueAt: this.currentTime + interval, intervalMs: interval, callback });
  }

  now(): number {
    return this.currentTime;
  }

  cancelAll(): void {
    this.tasks.clear();
  }

  pending(): number {
    return this.tasks.size;
  }

  /**
   * Move virtual time forward, running every callback that falls due, in
   * due-time order (registration order on ties).
   */
  advance(ms: number): void {
    const target = this.currentTime + ms;

    for (let task = this.nextDue(target); task; task = this.nextDue(target)) {
      this.currentTime = task.dueAt;
      if (task.intervalMs !== undefined) {
        task.dueAt += task.intervalMs;
      } else {
        this.tasks.delete(task.seq);
      }
      task.callback();
    }

    this.currentTime = target;
  }

  private add(task: Omit<ManualTask, 'seq'>): Cancellable {
    const seq = this.nextSeq++;
    this.tasks.set(seq, { ...task, seq });
    return { cancel: () => { this.tasks.delete(seq); } };
  }

  private nextDue(target: number): ManualTask | undefined {
    let next: ManualTask | undefined;
    for (const task of this.tasks.values()) {
      if (task.dueAt > target) continue;
      if (!next || task.dueAt < next.dueAt || (task.dueAt === next.dueAt && task.seq < next.seq)) {
        next = task;
      }
    }
    return next;
  }
}
