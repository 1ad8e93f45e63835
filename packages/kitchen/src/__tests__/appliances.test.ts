import { describe, it, expect, beforeEach } from 'vitest';
import type { ManualScheduler } from '@kitchen-sim/core';
import {
  AUTOCOOKER_ID,
  OVEN_ID,
  SPEAKER_ID,
  approach,
  parsePreheatRequest,
} from '../appliances.js';
import type { KitchenContext } from '../kitchen.js';
import { createTestKitchen, type RecordingObserver } from './fixtures.js';

describe('approach', () => {
  it('should step toward the target without overshooting', () => {
    expect(approach(20, 200, 10)).toBe(30);
    expect(approach(195, 200, 10)).toBe(200);
    expect(approach(200, 185, 10)).toBe(190);
    expect(approach(190, 185, 10)).toBe(185);
    expect(approach(5, 5, 1)).toBe(5);
  });
});

describe('ApplianceSimulator', () => {
  let kitchen: KitchenContext;
  let scheduler: ManualScheduler;
  let recorder: RecordingObserver;

  beforeEach(() => {
    ({ kitchen, scheduler, recorder } = createTestKitchen());
  });

  function appliance(id: string) {
    const found = kitchen.appliances.get(id);
    if (!found.success) throw new Error(`missing appliance ${id}`);
    return found.value;
  }

  describe('discovery', () => {
    it('should list the three simulated devices', () => {
      const devices = kitchen.appliances.discover();

      expect(devices.map(d => [d.id, d.type, d.status])).toEqual([
        [OVEN_ID, 'OVEN', 'idle'],
        [AUTOCOOKER_ID, 'AUTOCOOKER', 'idle'],
        [SPEAKER_ID, 'SPEAKER', 'online'],
      ]);
      expect(devices.every(d => d.isConnected)).toBe(true);
    });

    it('should pass the self-test when every device is connected', () => {
      const report = kitchen.appliances.selfTest();

      expect(report.success).toBe(true);
      expect(report.message).toBe('All appliances passed tests');
      expect(Object.keys(report.results)).toEqual([OVEN_ID, AUTOCOOKER_ID, SPEAKER_ID]);
      expect(report.results[OVEN_ID]).toMatchObject({ name: 'Smart Oven', connected: true, testPassed: true });
    });
  });

  describe('oven', () => {
    it('should reject an out-of-range temperature before arming a timer', () => {
      const before = appliance(OVEN_ID);

      const result = kitchen.appliances.preheatOven({ temperature: 500 });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('VALIDATION_ERROR');
      expect(result.error.message).toBe('Invalid temperature (50-300°C): temperature: Must be <= 300');
      expect(scheduler.pending()).toBe(0);
      expect(kitchen.appliances.activeCount()).toBe(0);
      expect(appliance(OVEN_ID)).toEqual(before);
      expect(recorder.events).toEqual([]);
    });

    it('should ramp up to the target and report ready', () => {
      const result = kitchen.appliances.preheatOven({ temperature: 200 });

      expect(result).toEqual({
        success: true,
        value: { message: 'Oven preheating to 200°C in bake mode', estimatedMinutes: 1 },
      });
      expect(appliance(OVEN_ID)).toMatchObject({ status: 'preheating', currentMeasurement: 20, mode: 'bake' });

      scheduler.advance(34_000);
      expect(appliance(OVEN_ID)).toMatchObject({ status: 'preheating', currentMeasurement: 190 });

      scheduler.advance(2000);
      expect(appliance(OVEN_ID)).toMatchObject({ status: 'ready', currentMeasurement: 200 });
      expect(recorder.ofType('oven_preheated').map(e => e.data)).toEqual([
        { applianceId: OVEN_ID, temperature: 200, mode: 'bake' },
      ]);
      expect(recorder.ofType('device_status').map(e => [e.data.status, e.data.measurement])).toEqual([
        ['preheating', 20],
        ['ready', 200],
      ]);
      expect(scheduler.pending()).toBe(0);
    });

    it('should ramp down when the new target is lower', () => {
      kitchen.appliances.preheatOven({ temperature: 200 });
      scheduler.advance(36_000);

      kitchen.appliances.preheatOven({ temperature: 185, mode: 'fan' });
      scheduler.advance(2000);
      expect(appliance(OVEN_ID)).toMatchObject({ status: 'preheating', currentMeasurement: 190 });

      scheduler.advance(2000);
      expect(appliance(OVEN_ID)).toMatchObject({ status: 'ready', currentMeasurement: 185, mode: 'fan' });
    });

    it('should replace a running ramp with a new request', () => {
      kitchen.appliances.preheatOven({ temperature: 200 });
      scheduler.advance(4000);
      kitchen.appliances.preheatOven({ temperature: 60 });

      expect(scheduler.pending()).toBe(1);
      scheduler.advance(4000);
      expect(appliance(OVEN_ID)).toMatchObject({ status: 'ready', currentMeasurement: 60 });
    });
  });

  describe('pressure cooker', () => {
    it('should reject bad pressure and duration together', () => {
      const result = kitchen.appliances.startPressureCook({ pressure: 20, duration: 0 });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.message).toBe(
        'Invalid pressure cook request (5-15 PSI, 1-1440 minutes): pressure: Must be <= 15; duration: Must be >= 1'
      );
      expect(scheduler.pending()).toBe(0);
      expect(appliance(AUTOCOOKER_ID)).toMatchObject({ status: 'idle' });
    });

    it('should reject a hold longer than a day', () => {
      const result = kitchen.appliances.startPressureCook({ pressure: 5, duration: 40_000 });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('VALIDATION_ERROR');
      expect(result.error.message).toBe(
        'Invalid pressure cook request (5-15 PSI, 1-1440 minutes): duration: Must be <= 1440'
      );
      expect(scheduler.pending()).toBe(0);
      expect(appliance(AUTOCOOKER_ID)).toMatchObject({ status: 'idle' });
    });

    it('should run the full pressurize, cook and release cycle', () => {
      const result = kitchen.appliances.startPressureCook({ pressure: 10, duration: 2 });

      expect(result).toEqual({
        success: true,
        value: { message: 'Pressure cooking at 10 PSI for 2 minutes', totalMinutes: 7 },
      });

      scheduler.advance(19_000);
      expect(appliance(AUTOCOOKER_ID)).toMatchObject({ status: 'pressurizing', currentMeasurement: 9.5 });

      scheduler.advance(1000);
      expect(appliance(AUTOCOOKER_ID)).toMatchObject({ status: 'pressure_cooking', currentMeasurement: 10 });

      scheduler.advance(120_000);
      expect(appliance(AUTOCOOKER_ID)).toMatchObject({ status: 'depressurizing' });

      scheduler.advance(30_000);
      expect(appliance(AUTOCOOKER_ID)).toMatchObject({ status: 'ready', currentMeasurement: 0 });
      expect(recorder.ofType('pressure_cooking_complete').map(e => e.data)).toEqual([
        { applianceId: AUTOCOOKER_ID, message: 'Pressure cooking complete and depressurized' },
      ]);
      expect(recorder.ofType('device_status').map(e => e.data.status)).toEqual([
        'pressurizing',
        'pressure_cooking',
        'depressurizing',
        'ready',
      ]);
      expect(kitchen.appliances.activeCount()).toBe(0);
      expect(scheduler.pending()).toBe(0);
    });
  });

  it('should cancel appliance timers on shutdown', () => {
    kitchen.appliances.preheatOven({ temperature: 250 });
    kitchen.appliances.startPressureCook({ pressure: 8, duration: 5 });
    expect(kitchen.appliances.activeCount()).toBe(2);

    kitchen.appliances.shutdown();

    expect(kitchen.appliances.activeCount()).toBe(0);
    expect(scheduler.pending()).toBe(0);
  });
});

describe('parsePreheatRequest', () => {
  it('should describe a non-object body', () => {
    const result = parsePreheatRequest('hot');
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('Invalid temperature (50-300°C): Expected object, got string');
  });

  it('should keep the optional mode', () => {
    expect(parsePreheatRequest({ temperature: 180, mode: 'grill' })).toEqual({
      success: true,
      value: { temperature: 180, mode: 'grill' },
    });
  });
});
