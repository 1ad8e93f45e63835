import { describe, it, expect, vi } from 'vitest';
import { ManualScheduler, silentLogger } from '@kitchen-sim/core';
import { createKitchenContext } from '../kitchen.js';

describe('createKitchenContext', () => {
  it('should share one clock between sessions, appliances and events', () => {
    const scheduler = new ManualScheduler(Date.UTC(2026, 9, 18, 8));
    const kitchen = createKitchenContext({ scheduler, logger: silentLogger });

    const started = kitchen.cooking.startCooking({ recipeName: 'Oats', sessionId: 'oats' });
    const event = kitchen.broadcaster.createEvent('connection_established', { message: 'hi' });

    expect(started.success).toBe(true);
    expect(kitchen.store.get('oats')).toMatchObject({
      value: { createdAt: '2026-10-18T08:00:00.000Z', startedAt: '2026-10-18T08:00:00.000Z' },
    });
    expect(event.timestamp).toBe('2026-10-18T08:00:00.000Z');
  });

  it('should keep contexts isolated', () => {
    const a = createKitchenContext({ scheduler: new ManualScheduler(), logger: silentLogger });
    const b = createKitchenContext({ scheduler: new ManualScheduler(), logger: silentLogger });

    a.cooking.startCooking({ recipeName: 'Oats', sessionId: 'same' });
    const second = b.cooking.startCooking({ recipeName: 'Oats', sessionId: 'same' });

    expect(second.success).toBe(true);
    expect(a.store.size()).toBe(1);
    expect(b.store.size()).toBe(1);
  });

  it('should release every timer and observer on shutdown', () => {
    const scheduler = new ManualScheduler();
    const kitchen = createKitchenContext({ scheduler, logger: silentLogger });
    const close = vi.fn();
    kitchen.broadcaster.subscribe({ id: 'observer', deliver: () => undefined, close });
    kitchen.cooking.startCooking({ recipeName: 'Oats' });
    kitchen.appliances.preheatOven({ temperature: 180 });
    expect(scheduler.pending()).toBe(2);

    kitchen.shutdown();

    expect(scheduler.pending()).toBe(0);
    expect(kitchen.clock.activeCount()).toBe(0);
    expect(kitchen.broadcaster.observerCount()).toBe(0);
    expect(close).toHaveBeenCalledTimes(1);
  });
});
