/**
 * Appliance simulator
 *
 * Timed state machines standing in for physical devices:
 *
 *   oven:            idle -> preheating -> ready
 *   pressure cooker: idle -> pressurizing -> pressure_cooking -> depressurizing -> ready
 *
 * Measurements move toward their target by a fixed step per tick and never
 * overshoot. Requests are validated before any timer is armed. Appliance
 * records live in their own store, apart from cooking sessions.
 */

import {
  InMemoryStore,
  createLogger,
  createServiceError,
  describeError,
  fail,
  invalid,
  ok,
  optionalNumber,
  optionalString,
  validateRecord,
  type Cancellable,
  type JSONSchema,
  type Logger,
  type OperationResult,
  type Scheduler,
} from '@kitchen-sim/core';
import type { UpdateBroadcaster } from './broadcaster.js';
import type {
  ApplianceState,
  DeviceSummary,
  OvenState,
  PreheatRequest,
  PreheatResult,
  PressureCookRequest,
  PressureCookResult,
  PressureCookerState,
  SelfTestReport,
} from './types.js';

export const OVEN_ID = 'oven_01';
export const AUTOCOOKER_ID = 'autocooker_01';
export const SPEAKER_ID = 'speaker_01';

export const OVEN_LIMITS = { minTemperature: 50, maxTemperature: 300 } as const;
export const PRESSURE_LIMITS = { minPressure: 5, maxPressure: 15, minDuration: 1, maxDuration: 24 * 60 } as const;

const AMBIENT_TEMPERATURE = 20;

export interface ApplianceTimings {
  /** Degrees gained per oven tick */
  ovenStepDegrees: number;
  ovenTickMs: number;
  /** PSI gained per pressurizing tick */
  pressureStepPsi: number;
  pressureTickMs: number;
  /** Time from end of cooking to ready */
  depressurizeMs: number;
}

export const DEFAULT_APPLIANCE_TIMINGS: ApplianceTimings = {
  ovenStepDegrees: 10,
  ovenTickMs: 2000,
  pressureStepPsi: 0.5,
  pressureTickMs: 1000,
  depressurizeMs: 30_000,
};

export const PREHEAT_SCHEMA: JSONSchema = {
  type: 'object',
  properties: {
    temperature: {
      type: 'number',
      minimum: OVEN_LIMITS.minTemperature,
      maximum: OVEN_LIMITS.maxTemperature,
      description: 'Target temperature in °C',
    },
    mode: { type: 'string', minLength: 1, description: 'Oven mode (bake, grill, fan...)' },
  },
  required: ['temperature'],
};

export const PRESSURE_SCHEMA: JSONSchema = {
  type: 'object',
  properties: {
    pressure: {
      type: 'number',
      minimum: PRESSURE_LIMITS.minPressure,
      maximum: PRESSURE_LIMITS.maxPressure,
      description: 'Target pressure in PSI',
    },
    duration: {
      type: 'number',
      minimum: PRESSURE_LIMITS.minDuration,
      maximum: PRESSURE_LIMITS.maxDuration,
      description: 'Minutes at pressure',
    },
  },
  required: ['pressure', 'duration'],
};

/**
 * Check a preheat body. Failures are VALIDATION_ERROR with the field errors
 * in `details.errors`.
 */
export function parsePreheatRequest(input: unknown): OperationResult<PreheatRequest> {
  const record = validateRecord(input, PREHEAT_SCHEMA);
  if (!record.success) {
    return fail(createServiceError(
      'VALIDATION_ERROR',
      `Invalid temperature (${OVEN_LIMITS.minTemperature}-${OVEN_LIMITS.maxTemperature}°C): ${record.error.message}`,
      record.error.details
    ));
  }

  const temperature = optionalNumber(record.value, 'temperature');
  if (temperature === undefined) return invalid('Missing required field: temperature');
  return ok({ temperature, mode: optionalString(record.value, 'mode') });
}

export function parsePressureCookRequest(input: unknown): OperationResult<PressureCookRequest> {
  const record = validateRecord(input, PRESSURE_SCHEMA);
  if (!record.success) {
    return fail(createServiceError(
      'VALIDATION_ERROR',
      `Invalid pressure cook request (${PRESSURE_LIMITS.minPressure}-${PRESSURE_LIMITS.maxPressure} PSI, ${PRESSURE_LIMITS.minDuration}-${PRESSURE_LIMITS.maxDuration} minutes): ${record.error.message}`,
      record.error.details
    ));
  }

  const pressure = optionalNumber(record.value, 'pressure');
  const duration = optionalNumber(record.value, 'duration');
  if (pressure === undefined || duration === undefined) {
    return invalid('Missing required fields: pressure, duration');
  }
  return ok({ pressure, duration });
}

export interface ApplianceSimulatorOptions {
  broadcaster: UpdateBroadcaster;
  scheduler: Scheduler;
  logger?: Logger;
  timings?: Partial<ApplianceTimings>;
}

/**
 * Step `current` toward `target` by at most `step`, clamped at the target
 */
export function approach(current: number, target: number, step: number): number {
  if (current < target) return Math.min(current + step, target);
  if (current > target) return Math.max(current - step, target);
  return current;
}

export class ApplianceSimulator {
  private store = new InMemoryStore<ApplianceState>({ entity: 'Appliance' });
  private timers = new Map<string, Cancellable>();
  private readonly broadcaster: UpdateBroadcaster;
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;
  private readonly timings: ApplianceTimings;

  constructor(options: ApplianceSimulatorOptions) {
    this.broadcaster = options.broadcaster;
    this.scheduler = options.scheduler;
    this.logger = options.logger ?? createLogger('appliances');
    this.timings = { ...DEFAULT_APPLIANCE_TIMINGS, ...options.timings };

    const now = this.timestamp();
    this.store.insert(OVEN_ID, {
      id: OVEN_ID,
      name: 'Smart Oven',
      type: 'OVEN',
      brand: 'Samsung',
      status: 'idle',
      isConnected: true,
      currentMeasurement: AMBIENT_TEMPERATURE,
      targetMeasurement: 0,
      unit: 'C',
      mode: 'off',
      features: ['bake', 'grill', 'fan', 'preheat'],
      lastUpdate: now,
    });
    this.store.insert(AUTOCOOKER_ID, {
      id: AUTOCOOKER_ID,
      name: 'Smart Pressure Cooker',
      type: 'AUTOCOOKER',
      brand: 'Instant Pot',
      status: 'idle',
      isConnected: true,
      currentMeasurement: 0,
      targetMeasurement: 0,
      unit: 'PSI',
      holdMinutes: 0,
      features: ['pressure_cook', 'rice', 'soup', 'timer'],
      lastUpdate: now,
    });
    this.store.insert(SPEAKER_ID, {
      id: SPEAKER_ID,
      name: 'Kitchen Speaker',
      type: 'SPEAKER',
      brand: 'Google',
      status: 'online',
      isConnected: true,
      features: ['announce', 'timer'],
      lastUpdate: now,
    });
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  get(id: string): OperationResult<ApplianceState> {
    return this.store.get(id);
  }

  discover(): DeviceSummary[] {
    return this.store.list().map(appliance => ({
      id: appliance.id,
      name: appliance.name,
      type: appliance.type,
      brand: appliance.brand,
      status: appliance.status,
      isConnected: appliance.isConnected,
      features: appliance.features,
    }));
  }

  selfTest(): SelfTestReport {
    const results: SelfTestReport['results'] = {};
    for (const appliance of this.store.list()) {
      results[appliance.id] = {
        name: appliance.name,
        connected: appliance.isConnected,
        status: appliance.status,
        lastUpdate: appliance.lastUpdate,
        testPassed: appliance.isConnected,
      };
    }
    const success = Object.values(results).every(r => r.testPassed);
    return {
      success,
      message: success ? 'All appliances passed tests' : 'Some appliances failed tests',
      results,
    };
  }

  count(): number {
    return this.store.size();
  }

  /**
   * Number of appliance timers still armed
   */
  activeCount(): number {
    return this.timers.size;
  }

  // ---------------------------------------------------------------------------
  // Oven
  // ---------------------------------------------------------------------------

  /**
   * Start (or restart) the preheat ramp toward `temperature`.
   * Completion is announced with `oven_preheated`.
   */
  preheatOven(request: PreheatRequest): OperationResult<PreheatResult> {
    const parsed = parsePreheatRequest(request);
    if (!parsed.success) return parsed;

    const { temperature } = parsed.value;
    const mode = parsed.value.mode ?? 'bake';
    const oven = this.updateOven(current => ({
      ...current,
      status: 'preheating',
      targetMeasurement: temperature,
      mode,
    }));
    if (!oven.success) return oven;

    this.logger.info(`Oven preheating to ${temperature}°C (${mode})`);
    this.publishStatus(oven.value);
    this.arm(OVEN_ID, this.scheduler.every(this.timings.ovenTickMs, () =>
      this.guard(OVEN_ID, () => this.tickOven())
    ));

    const distance = Math.abs(temperature - oven.value.currentMeasurement);
    const estimatedMinutes = Math.round(
      (distance / this.timings.ovenStepDegrees) * (this.timings.ovenTickMs / 1000) / 60
    );

    return ok({
      message: `Oven preheating to ${temperature}°C in ${mode} mode`,
      estimatedMinutes,
    });
  }

  private tickOven(): void {
    const oven = this.updateOven(current => ({
      ...current,
      currentMeasurement: approach(
        current.currentMeasurement,
        current.targetMeasurement,
        this.timings.ovenStepDegrees
      ),
    }));
    if (!oven.success) {
      this.disarm(OVEN_ID);
      return;
    }
    if (oven.value.currentMeasurement !== oven.value.targetMeasurement) return;

    this.disarm(OVEN_ID);
    const ready = this.updateOven(current => ({ ...current, status: 'ready' }));
    if (!ready.success) return;

    this.logger.info(`Oven preheated to ${ready.value.currentMeasurement}°C`);
    this.publishStatus(ready.value);
    this.broadcaster.publish('oven_preheated', {
      applianceId: OVEN_ID,
      temperature: ready.value.currentMeasurement,
      mode: ready.value.mode,
    });
  }

  // ---------------------------------------------------------------------------
  // Pressure cooker
  // ---------------------------------------------------------------------------

  /**
   * Run a full pressurize / cook / depressurize cycle.
   * Completion is announced with `pressure_cooking_complete`.
   */
  startPressureCook(request: PressureCookRequest): OperationResult<PressureCookResult> {
    const parsed = parsePressureCookRequest(request);
    if (!parsed.success) return parsed;

    const { pressure, duration } = parsed.value;
    const cooker = this.updateCooker(current => ({
      ...current,
      status: 'pressurizing',
      currentMeasurement: 0,
      targetMeasurement: pressure,
      holdMinutes: duration,
    }));
    if (!cooker.success) return cooker;

    this.logger.info(`Pressure cooking at ${pressure} PSI for ${duration} minutes`);
    this.publishStatus(cooker.value);
    this.arm(AUTOCOOKER_ID, this.scheduler.every(this.timings.pressureTickMs, () =>
      this.guard(AUTOCOOKER_ID, () => this.tickPressure())
    ));

    return ok({
      message: `Pressure cooking at ${pressure} PSI for ${duration} minutes`,
      totalMinutes: duration + 5,
    });
  }

  private tickPressure(): void {
    const cooker = this.updateCooker(current => ({
      ...current,
      currentMeasurement: approach(
        current.currentMeasurement,
        current.targetMeasurement,
        this.timings.pressureStepPsi
      ),
    }));
    if (!cooker.success) {
      this.disarm(AUTOCOOKER_ID);
      return;
    }
    if (cooker.value.currentMeasurement < cooker.value.targetMeasurement) return;

    const cooking = this.updateCooker(current => ({ ...current, status: 'pressure_cooking' }));
    if (!cooking.success) return;
    this.publishStatus(cooking.value);

    this.arm(AUTOCOOKER_ID, this.scheduler.after(cooking.value.holdMinutes * 60_000, () =>
      this.guard(AUTOCOOKER_ID, () => this.beginDepressurize())
    ));
  }

  private beginDepressurize(): void {
    const venting = this.updateCooker(current => ({ ...current, status: 'depressurizing' }));
    if (!venting.success) return;
    this.publishStatus(venting.value);

    this.arm(AUTOCOOKER_ID, this.scheduler.after(this.timings.depressurizeMs, () =>
      this.guard(AUTOCOOKER_ID, () => this.finishPressureCook())
    ));
  }

  private finishPressureCook(): void {
    this.timers.delete(AUTOCOOKER_ID);
    const ready = this.updateCooker(current => ({
      ...current,
      status: 'ready',
      currentMeasurement: 0,
      targetMeasurement: 0,
    }));
    if (!ready.success) return;

    this.logger.info('Pressure cooking complete and depressurized');
    this.publishStatus(ready.value);
    this.broadcaster.publish('pressure_cooking_complete', {
      applianceId: AUTOCOOKER_ID,
      message: 'Pressure cooking complete and depressurized',
    });
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Cancel every appliance timer. Appliances keep their last state.
   */
  shutdown(): void {
    for (const id of [...this.timers.keys()]) {
      this.disarm(id);
    }
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  /**
   * Replace the timer of an appliance; at most one runs per appliance
   */
  private arm(id: string, timer: Cancellable): void {
    this.timers.get(id)?.cancel();
    this.timers.set(id, timer);
  }

  private disarm(id: string): void {
    this.timers.get(id)?.cancel();
    this.timers.delete(id);
  }

  private guard(id: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.logger.error(`Timer for ${id} failed, skipping: ${describeError(error)}`);
    }
  }

  private updateOven(mutator: (oven: OvenState) => OvenState): OperationResult<OvenState> {
    const lastUpdate = this.timestamp();
    const result = this.store.update(OVEN_ID, current =>
      current.type === 'OVEN' ? { ...mutator(current), lastUpdate } : current
    );
    if (!result.success) return result;
    return result.value.type === 'OVEN' ? ok(result.value) : invalid(`${OVEN_ID} is not an oven`);
  }

  private updateCooker(
    mutator: (cooker: PressureCookerState) => PressureCookerState
  ): OperationResult<PressureCookerState> {
    const lastUpdate = this.timestamp();
    const result = this.store.update(AUTOCOOKER_ID, current =>
      current.type === 'AUTOCOOKER' ? { ...mutator(current), lastUpdate } : current
    );
    if (!result.success) return result;
    return result.value.type === 'AUTOCOOKER'
      ? ok(result.value)
      : invalid(`${AUTOCOOKER_ID} is not a pressure cooker`);
  }

  private publishStatus(appliance: OvenState | PressureCookerState): void {
    this.broadcaster.publish('device_status', {
      id: appliance.id,
      type: appliance.type,
      status: appliance.status,
      measurement: appliance.currentMeasurement,
      unit: appliance.unit,
    });
  }

  private timestamp(): string {
    return new Date(this.scheduler.now()).toISOString();
  }
}
