/**
 * Voice command handling
 *
 * Commands arrive already transcribed as `{ command, parameters }`; matching is
 * case-insensitive on the whole command phrase.
 */

import {
  optionalNumber,
  optionalRecord,
  optionalString,
  validateRecord,
  type JSONSchema,
} from '@kitchen-sim/core';
import type { CookingService } from './cooking-service.js';

export interface VoiceCommandResult {
  success: boolean;
  message: string;
  action?: 'cooking_started' | 'timer_started' | 'status_reported';
  sessionId?: string;
}

export const VOICE_COMMAND_SCHEMA: JSONSchema = {
  type: 'object',
  properties: {
    command: { type: 'string', minLength: 1 },
    parameters: { type: 'object' },
  },
  required: ['command'],
};

export function handleVoiceCommand(service: CookingService, body: unknown): VoiceCommandResult {
  const record = validateRecord(body, VOICE_COMMAND_SCHEMA);
  if (!record.success) {
    return { success: false, message: record.error.message };
  }

  const command = (optionalString(record.value, 'command') ?? '').trim().toLowerCase();
  const parameters = optionalRecord(record.value, 'parameters') ?? {};

  switch (command) {
    case 'start cooking': {
      const recipeName = optionalString(parameters, 'recipeName')?.trim();
      if (!recipeName) {
        return { success: false, message: 'Please specify a recipe name' };
      }
      const started = service.startCooking({
        recipeName,
        estimatedMinutes: optionalNumber(parameters, 'estimatedMinutes'),
      });
      if (!started.success) {
        return { success: false, message: started.error.message };
      }
      return {
        success: true,
        message: `Starting to cook ${recipeName}`,
        action: 'cooking_started',
        sessionId: started.value.sessionId,
      };
    }

    case 'set timer': {
      const minutes = optionalNumber(parameters, 'minutes');
      if (minutes === undefined || minutes <= 0) {
        return { success: false, message: 'Please specify timer duration' };
      }
      const started = service.startRecipe('Timer', [
        { instruction: `Timer for ${minutes} minutes`, duration: minutes },
      ]);
      if (!started.success) {
        return { success: false, message: started.error.message };
      }
      return {
        success: true,
        message: `Timer set for ${minutes} minutes`,
        action: 'timer_started',
        sessionId: started.value.sessionId,
      };
    }

    case 'check status': {
      const active = service.activeSessions()[0];
      if (!active) {
        return { success: true, message: 'No active cooking sessions', action: 'status_reported' };
      }
      const minutes = Math.floor(active.timeRemainingSeconds / 60);
      return {
        success: true,
        message: `${active.recipeName} has ${minutes} minutes remaining`,
        action: 'status_reported',
        sessionId: active.id,
      };
    }

    default:
      return { success: false, message: 'Unknown command' };
  }
}
