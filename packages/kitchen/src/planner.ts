/**
 * Step planning
 *
 * Pure functions that turn recipe text into timed cooking steps. Nothing here
 * touches a timer or a store.
 */

import {
  invalid,
  ok,
  optionalNumber,
  optionalString,
  validateInput,
  type JSONSchema,
  type OperationResult,
} from '@kitchen-sim/core';
import type { CookingStep } from './types.js';

const PREP_MINUTES = 5;

/**
 * Split free-text instructions into steps of equal duration.
 *
 * Fragments are separated by `.` or `!`; blank fragments are dropped. Each
 * step lasts `max(1, floor(estimatedMinutes / fragmentCount))` minutes. Text
 * with no usable fragment falls back to a prepare-then-cook pair.
 *
 * @example
 * ```typescript
 * planSteps('Add rice and water. Cook on high pressure for 18 minutes.', 25);
 * // two steps of 12 minutes each
 * ```
 */
export function planSteps(instructions: string, estimatedMinutes: number): CookingStep[] {
  const fragments = instructions
    .split(/[.!]/)
    .map(fragment => fragment.trim())
    .filter(fragment => fragment.length > 0);

  if (fragments.length === 0) {
    return [
      { index: 1, instruction: 'Prepare ingredients', durationMinutes: PREP_MINUTES },
      {
        index: 2,
        instruction: 'Cook according to recipe',
        durationMinutes: Math.max(1, Math.floor(estimatedMinutes) - PREP_MINUTES),
      },
    ];
  }

  const duration = Math.max(1, Math.floor(estimatedMinutes / fragments.length));
  return fragments.map((instruction, i) => ({
    index: i + 1,
    instruction,
    durationMinutes: duration,
  }));
}

/**
 * The autocooker demo plan used when a start request has no recipe text.
 * Its last step has zero duration and completes on the first tick.
 */
export function simulationSteps(recipeName: string, estimatedMinutes: number): CookingStep[] {
  return [
    { index: 1, instruction: 'Preheating autocooker', durationMinutes: 2 },
    { index: 2, instruction: `Adding ingredients for ${recipeName}`, durationMinutes: 1 },
    { index: 3, instruction: 'Pressure cooking', durationMinutes: Math.max(estimatedMinutes - 5, 5) },
    { index: 4, instruction: 'Natural pressure release', durationMinutes: 2 },
    { index: 5, instruction: 'Cooking complete', durationMinutes: 0 },
  ];
}

const INGREDIENT_MINUTES: { keywords: string[]; minutes: number }[] = [
  { keywords: ['meat', 'chicken'], minutes: 20 },
  { keywords: ['rice', 'pasta'], minutes: 10 },
  { keywords: ['vegetable'], minutes: 5 },
];

const METHOD_FACTORS: Record<string, number> = {
  pressure: 0.6,
  slow: 4,
  grill: 0.8,
};

/**
 * Rough cooking time from an ingredient list and a cooking method.
 *
 * Starts at 15 minutes, adds time per ingredient by its first matching
 * category, then scales by method.
 */
export function estimateCookingMinutes(ingredients: string[], method: string): number {
  let minutes = 15;

  for (const ingredient of ingredients) {
    const lower = ingredient.toLowerCase();
    const category = INGREDIENT_MINUTES.find(c => c.keywords.some(k => lower.includes(k)));
    if (category) minutes += category.minutes;
  }

  minutes *= METHOD_FACTORS[method.toLowerCase()] ?? 1;
  return Math.round(minutes);
}

const STEP_LIST_SCHEMA: JSONSchema = {
  type: 'array',
  minItems: 1,
  items: {
    type: 'object',
    properties: {
      instruction: { type: 'string', minLength: 1 },
      duration: { type: 'number', minimum: 0 },
      durationMinutes: { type: 'number', minimum: 0 },
    },
    required: ['instruction'],
  },
};

/**
 * Validate a caller-supplied step list and number it 1..N.
 *
 * Each entry needs an `instruction` and a non-negative `duration` (or
 * `durationMinutes`); a missing duration counts as 1 minute.
 */
export function normalizeSteps(input: unknown): OperationResult<CookingStep[]> {
  const result = validateInput(input, STEP_LIST_SCHEMA);
  if (!result.valid || !Array.isArray(input)) {
    const fieldErrors = (result.errors ?? []).map(err => ({
      ...err,
      path: err.path ? `steps.${err.path}` : 'steps',
    }));
    return invalid('Invalid or missing steps array', fieldErrors);
  }

  const steps: CookingStep[] = [];
  for (const entry of input) {
    if (typeof entry !== 'object' || entry === null) continue;
    const fields = Object.fromEntries(Object.entries(entry));
    steps.push({
      index: steps.length + 1,
      instruction: (optionalString(fields, 'instruction') ?? '').trim(),
      durationMinutes:
        optionalNumber(fields, 'durationMinutes') ?? optionalNumber(fields, 'duration') ?? 1,
    });
  }
  return ok(steps);
}
