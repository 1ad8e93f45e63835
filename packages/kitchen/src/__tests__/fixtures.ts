import { ManualScheduler, silentLogger } from '@kitchen-sim/core';
import type { Observer } from '../broadcaster.js';
import type { BroadcastEvent, KitchenEventType } from '../events.js';
import { createKitchenContext, type KitchenContext } from '../kitchen.js';

/**
 * Observer that keeps every event it receives
 */
export class RecordingObserver implements Observer {
  readonly id: string;
  readonly events: BroadcastEvent[] = [];

  constructor(id = 'recorder') {
    this.id = id;
  }

  deliver(event: BroadcastEvent): void {
    this.events.push(event);
  }

  types(): KitchenEventType[] {
    return this.events.map(event => event.type);
  }

  ofType<K extends KitchenEventType>(type: K): BroadcastEvent<K>[] {
    const matching: BroadcastEvent<K>[] = [];
    for (const event of this.events) {
      if (isEventOf(event, type)) matching.push(event);
    }
    return matching;
  }
}

function isEventOf<K extends KitchenEventType>(
  event: BroadcastEvent,
  type: K
): event is BroadcastEvent<K> {
  return event.type === type;
}

export interface TestKitchen {
  kitchen: KitchenContext;
  scheduler: ManualScheduler;
  recorder: RecordingObserver;
}

/**
 * Kitchen on virtual time with a recording observer attached
 */
export function createTestKitchen(): TestKitchen {
  const scheduler = new ManualScheduler();
  const kitchen = createKitchenContext({ scheduler, logger: silentLogger });
  const recorder = new RecordingObserver();
  kitchen.broadcaster.subscribe(recorder);
  return { kitchen, scheduler, recorder };
}
