import { describe, it, expect, beforeEach } from 'vitest';
import type { ManualScheduler } from '@kitchen-sim/core';
import { parseStartCookingRequest } from '../cooking-service.js';
import type { KitchenContext } from '../kitchen.js';
import { createTestKitchen } from './fixtures.js';

describe('CookingService', () => {
  let kitchen: KitchenContext;
  let scheduler: ManualScheduler;

  beforeEach(() => {
    ({ kitchen, scheduler } = createTestKitchen());
  });

  describe('startCooking', () => {
    it('should plan from instructions and start the clock', () => {
      const result = kitchen.cooking.startCooking({
        recipeName: 'Rice',
        instructions: 'Add rice and water. Cook on high pressure for 18 minutes.',
        estimatedMinutes: 25,
        sessionId: 'rice-1',
      });

      expect(result).toEqual({
        success: true,
        value: {
          sessionId: 'rice-1',
          recipeName: 'Rice',
          totalSteps: 2,
          estimatedMinutes: 25,
          currentInstruction: 'Add rice and water',
        },
      });
      expect(kitchen.clock.isRunning('rice-1')).toBe(true);
    });

    it('should use the appliance plan and a 10 minute estimate by default', () => {
      const result = kitchen.cooking.startCooking({ recipeName: 'Chili' });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.value.sessionId).toMatch(/^session_[0-9a-z]+$/);
      expect(result.value.totalSteps).toBe(5);
      expect(result.value.estimatedMinutes).toBe(10);
      expect(result.value.currentInstruction).toBe('Preheating autocooker');
    });

    it('should estimate the time from ingredients and method', () => {
      const result = kitchen.cooking.startCooking({
        recipeName: 'Chicken rice',
        ingredients: ['Chicken thighs', 'rice', 'vegetable stock'],
        method: 'slow',
      });

      expect(result.success).toBe(true);
      if (!result.success) return;
      // (15 + 20 + 10 + 5) x 4
      expect(result.value.estimatedMinutes).toBe(200);
      const session = kitchen.store.get(result.value.sessionId);
      if (!session.success) throw new Error('expected session');
      expect(session.value.steps[2]).toEqual({ index: 3, instruction: 'Pressure cooking', durationMinutes: 195 });
    });

    it('should estimate for pressure cooking when no method is given', () => {
      const result = kitchen.cooking.startCooking({ recipeName: 'Pilaf', ingredients: ['rice'] });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.value.estimatedMinutes).toBe(15);
    });

    it('should prefer an explicit estimate over the ingredients', () => {
      const result = kitchen.cooking.startCooking({
        recipeName: 'Stew',
        ingredients: ['beef meat'],
        estimatedMinutes: 40,
      });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.value.estimatedMinutes).toBe(40);
    });

    it('should not start a session with a blank recipe name', () => {
      const result = kitchen.cooking.startCooking({ recipeName: '  ', sessionId: 'blank' });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.message).toBe('Recipe name must not be blank');
      expect(kitchen.store.has('blank')).toBe(false);
      expect(scheduler.pending()).toBe(0);
    });

    it('should refuse a taken session id', () => {
      kitchen.cooking.startCooking({ recipeName: 'Rice', sessionId: 'dup' });
      const second = kitchen.cooking.startCooking({ recipeName: 'Soup', sessionId: 'dup' });

      expect(second.success).toBe(false);
      if (second.success) return;
      expect(second.error.code).toBe('DUPLICATE_SESSION');
      expect(kitchen.cooking.status('dup')).toMatchObject({ value: { recipeName: 'Rice' } });
    });
  });

  describe('startRecipe', () => {
    it('should start from an explicit step list', () => {
      const result = kitchen.cooking.startRecipe('Tea', [
        { instruction: 'Boil water', duration: 3 },
        { instruction: 'Steep', duration: 4 },
      ]);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.value).toMatchObject({
        recipeName: 'Tea',
        totalSteps: 2,
        estimatedMinutes: 7,
        currentInstruction: 'Boil water',
      });
    });

    it('should not create a session for an invalid list', () => {
      const result = kitchen.cooking.startRecipe('Tea', []);

      expect(result.success).toBe(false);
      expect(kitchen.store.size()).toBe(0);
    });
  });

  describe('stop', () => {
    it('should return the stopped snapshot', () => {
      kitchen.cooking.startCooking({ recipeName: 'Rice', sessionId: 'r1' });

      expect(kitchen.cooking.stop('r1')).toMatchObject({
        success: true,
        value: { id: 'r1', status: 'stopped', timeRemainingSeconds: 0, currentInstruction: 'Stopped' },
      });
    });
  });

  describe('history', () => {
    beforeEach(() => {
      kitchen.cooking.startRecipe('Tea', [{ instruction: 'Steep', duration: 1 }]);
      scheduler.advance(60_000);

      kitchen.cooking.startRecipe('Pasta', [
        { instruction: 'Boil', duration: 1 },
        { instruction: 'Drain', duration: 1 },
      ]);
      kitchen.cooking.startCooking({ recipeName: 'Still going', sessionId: 'running' });
      scheduler.advance(90_000);
      const pasta = kitchen.store.list().find(s => s.recipeName === 'Pasta');
      if (pasta) kitchen.cooking.stop(pasta.id);
    });

    it('should list finished sessions newest first', () => {
      const history = kitchen.cooking.history();

      expect(history.map(h => ({ ...h, id: undefined }))).toEqual([
        {
          id: undefined,
          recipeName: 'Pasta',
          status: 'stopped',
          startedAt: '1970-01-01T00:01:00.000Z',
          endedAt: '1970-01-01T00:02:30.000Z',
          totalMinutes: 2,
          stepsCompleted: 1,
        },
        {
          id: undefined,
          recipeName: 'Tea',
          status: 'completed',
          startedAt: '1970-01-01T00:00:00.000Z',
          endedAt: '1970-01-01T00:01:00.000Z',
          totalMinutes: 1,
          stepsCompleted: 1,
        },
      ]);
    });

    it('should honour the limit', () => {
      expect(kitchen.cooking.history(1).map(h => h.recipeName)).toEqual(['Pasta']);
    });

    it('should report running sessions as active', () => {
      expect(kitchen.cooking.activeSessions().map(s => s.id)).toEqual(['running']);
    });
  });
});

describe('parseStartCookingRequest', () => {
  it('should read and trim the request fields', () => {
    expect(parseStartCookingRequest({ recipeName: ' Rice ', estimatedMinutes: 20 })).toEqual({
      success: true,
      value: { recipeName: 'Rice', estimatedMinutes: 20, instructions: undefined, sessionId: undefined },
    });
  });

  it('should read ingredients and a trimmed method', () => {
    expect(parseStartCookingRequest({ recipeName: 'Rice', ingredients: ['rice', 'water'], method: ' pressure ' }))
      .toEqual({
        success: true,
        value: { recipeName: 'Rice', ingredients: ['rice', 'water'], method: 'pressure' },
      });
  });

  it('should reject ingredients that are not non-empty strings', () => {
    const result = parseStartCookingRequest({ recipeName: 'Rice', ingredients: ['rice', 3, ' '] });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe(
      'ingredients.1: Expected string, got number; ingredients.2: Must be at least 1 characters'
    );
  });

  it('should reject a blank recipe name and a fractional estimate', () => {
    const result = parseStartCookingRequest({ recipeName: ' ', estimatedMinutes: 2.5 });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe(
      'recipeName: Must be at least 1 characters; estimatedMinutes: Expected integer'
    );
  });
});
