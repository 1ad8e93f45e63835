/**
 * Push-channel event catalogue
 *
 * Every message sent to an observer is `{ type, data, timestamp }`; the
 * payload shape is fixed per type.
 */

import type { ApplianceType } from './types.js';

export interface KitchenEventMap {
  connection_established: { message: string };
  cooking_step_start: {
    sessionId: string;
    stepNumber: number;
    instruction: string;
    timeRemaining: number;
    duration: number;
  };
  timer_update: { sessionId: string; timeRemaining: number; currentStep: number };
  cooking_step_complete: { sessionId: string; stepNumber: number; instruction: string };
  cooking_complete: { sessionId: string; recipeName: string; message: string };
  cooking_stopped: { sessionId: string; recipeName: string; stepNumber: number };
  oven_preheated: { applianceId: string; temperature: number; mode: string };
  pressure_cooking_complete: { applianceId: string; message: string };
  device_status: {
    id: string;
    type: ApplianceType;
    status: string;
    measurement: number;
    unit: string;
  };
}

export type KitchenEventType = keyof KitchenEventMap;

export interface BroadcastEvent<K extends KitchenEventType = KitchenEventType> {
  type: K;
  data: KitchenEventMap[K];
  /** ISO-8601 */
  timestamp: string;
}
