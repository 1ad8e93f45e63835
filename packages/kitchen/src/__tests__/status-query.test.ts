import { describe, it, expect, beforeEach } from 'vitest';
import type { ManualScheduler } from '@kitchen-sim/core';
import type { KitchenContext } from '../kitchen.js';
import { createTestKitchen } from './fixtures.js';

describe('StatusQuery', () => {
  let kitchen: KitchenContext;
  let scheduler: ManualScheduler;

  beforeEach(() => {
    ({ kitchen, scheduler } = createTestKitchen());
    kitchen.store.create('s1', 'Pasta', [
      { index: 1, instruction: 'Boil water', durationMinutes: 1 },
      { index: 2, instruction: 'Add pasta', durationMinutes: 1 },
    ]);
  });

  it('should report no instruction before the session starts', () => {
    expect(kitchen.statusQuery.status('s1')).toEqual({
      success: true,
      value: {
        id: 's1',
        recipeName: 'Pasta',
        status: 'starting',
        currentStepIndex: 0,
        totalSteps: 2,
        timeRemainingSeconds: 0,
        currentInstruction: null,
      },
    });
  });

  it('should report the active step', () => {
    kitchen.clock.start('s1');
    scheduler.advance(65_000);

    expect(kitchen.statusQuery.status('s1')).toMatchObject({
      success: true,
      value: { status: 'cooking', currentStepIndex: 2, timeRemainingSeconds: 55, currentInstruction: 'Add pasta' },
    });
  });

  it('should return identical snapshots without a tick', () => {
    kitchen.clock.start('s1');
    scheduler.advance(3000);

    const first = kitchen.statusQuery.status('s1');
    const second = kitchen.statusQuery.status('s1');
    scheduler.advance(999);
    const third = kitchen.statusQuery.status('s1');

    expect(second).toEqual(first);
    expect(third).toEqual(first);
  });

  it('should label completed and stopped sessions', () => {
    kitchen.store.create('s2', 'Tea', [{ index: 1, instruction: 'Steep', durationMinutes: 1 }]);
    kitchen.clock.start('s1');
    kitchen.clock.start('s2');
    scheduler.advance(60_000);
    kitchen.clock.stop('s1');

    const stopped = kitchen.statusQuery.status('s1');
    const completed = kitchen.statusQuery.status('s2');

    expect(stopped).toMatchObject({ value: { status: 'stopped', currentInstruction: 'Stopped' } });
    expect(completed).toMatchObject({
      value: { status: 'completed', currentStepIndex: 1, currentInstruction: 'Complete' },
    });
  });

  it('should fail for unknown sessions', () => {
    const result = kitchen.statusQuery.status('missing');
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('NOT_FOUND');
  });
});
