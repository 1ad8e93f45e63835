/**
 * Kitchen context
 *
 * Owns every stateful component of one simulator instance. All components
 * share the scheduler's clock, so a ManualScheduler drives the whole kitchen
 * in tests.
 */

import {
  TimerScheduler,
  createLogger,
  type LogLevel,
  type Logger,
  type Scheduler,
} from '@kitchen-sim/core';
import { ApplianceSimulator, type ApplianceTimings } from './appliances.js';
import { UpdateBroadcaster } from './broadcaster.js';
import { CookingClock } from './cooking-clock.js';
import { CookingService } from './cooking-service.js';
import { SessionStore } from './session-store.js';
import { StatusQuery } from './status-query.js';

export interface KitchenContextOptions {
  scheduler?: Scheduler;
  /** Base logger level for the component loggers (default: info) */
  logLevel?: LogLevel;
  /** Replace every component logger (tests pass `silentLogger`) */
  logger?: Logger;
  tickMs?: number;
  applianceTimings?: Partial<ApplianceTimings>;
}

export interface KitchenContext {
  readonly scheduler: Scheduler;
  readonly store: SessionStore;
  readonly broadcaster: UpdateBroadcaster;
  readonly clock: CookingClock;
  readonly appliances: ApplianceSimulator;
  readonly statusQuery: StatusQuery;
  readonly cooking: CookingService;
  /** Cancel every timer and drop every observer */
  shutdown(): void;
}

export function createKitchenContext(options?: KitchenContextOptions): KitchenContext {
  const scheduler = options?.scheduler ?? new TimerScheduler();
  const level = options?.logLevel ?? 'info';
  const loggerFor = (tag: string): Logger => options?.logger ?? createLogger(tag, level);
  const now = () => scheduler.now();

  const store = new SessionStore({ now });
  const broadcaster = new UpdateBroadcaster({ logger: loggerFor('broadcast'), now });
  const clock = new CookingClock({
    store,
    broadcaster,
    scheduler,
    logger: loggerFor('clock'),
    tickMs: options?.tickMs,
  });
  const appliances = new ApplianceSimulator({
    broadcaster,
    scheduler,
    logger: loggerFor('appliances'),
    timings: options?.applianceTimings,
  });
  const statusQuery = new StatusQuery(store);
  const cooking = new CookingService({ store, clock, statusQuery, now });

  return {
    scheduler,
    store,
    broadcaster,
    clock,
    appliances,
    statusQuery,
    cooking,
    shutdown() {
      clock.shutdown();
      appliances.shutdown();
      scheduler.cancelAll();
      broadcaster.closeAll();
    },
  };
}
