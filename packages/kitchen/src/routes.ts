/**
 * HTTP routes of the simulator
 *
 * Handlers parse the body, call one kitchen operation and map its result:
 * success bodies carry `success: true`, failures go through `errorResponse`.
 */

import {
  errorResponse,
  jsonResponse,
  readJson,
  validateRecord,
  optionalString,
  type RouteGroup,
} from '@kitchen-sim/core';
import { parsePreheatRequest, parsePressureCookRequest } from './appliances.js';
import { HISTORY_LIMIT, START_RECIPE_SCHEMA, parseStartCookingRequest } from './cooking-service.js';
import type { KitchenContext } from './kitchen.js';
import { handleVoiceCommand } from './voice.js';

function parseLimit(url: URL): number {
  const raw = url.searchParams.get('limit');
  const limit = raw === null ? NaN : Number.parseInt(raw, 10);
  return Number.isInteger(limit) && limit > 0 ? limit : HISTORY_LIMIT;
}

/**
 * Route groups in registration order. Appliance paths are relative to
 * `/api/appliances`.
 */
export function createKitchenRoutes(kitchen: KitchenContext): RouteGroup[] {
  const { cooking, appliances } = kitchen;

  const sessions: RouteGroup = { routes: [
    {
      method: 'POST',
      path: '/api/sessions',
      description: 'Start a cooking session',
      handler: async (request) => {
        const body = await readJson(request);
        if (!body.success) return errorResponse(body.error);

        const parsed = parseStartCookingRequest(body.value);
        if (!parsed.success) return errorResponse(parsed.error);

        const started = cooking.startCooking(parsed.value);
        if (!started.success) return errorResponse(started.error);
        return jsonResponse({ success: true, ...started.value }, 201);
      },
    },
    {
      method: 'GET',
      path: '/api/sessions/:id',
      description: 'Status of a cooking session',
      handler: (_request, { params }) => {
        const status = cooking.status(params['id'] ?? '');
        if (!status.success) return errorResponse(status.error);
        return jsonResponse({ success: true, session: status.value });
      },
    },
    {
      method: 'POST',
      path: '/api/sessions/:id/stop',
      description: 'Stop a cooking session',
      handler: (_request, { params }) => {
        const stopped = cooking.stop(params['id'] ?? '');
        if (!stopped.success) return errorResponse(stopped.error);
        return jsonResponse({ success: true, session: stopped.value });
      },
    },
    {
      method: 'POST',
      path: '/kitchen/recipe',
      description: 'Start a session from an explicit step list',
      handler: async (request) => {
        const body = await readJson(request);
        if (!body.success) return errorResponse(body.error);

        const record = validateRecord(body.value, START_RECIPE_SCHEMA);
        if (!record.success) return errorResponse(record.error);

        const recipeName = optionalString(record.value, 'recipeName')?.trim() || 'Custom recipe';
        const started = cooking.startRecipe(recipeName, record.value['steps']);
        if (!started.success) return errorResponse(started.error);
        return jsonResponse({ success: true, ...started.value }, 201);
      },
    },
    {
      method: 'GET',
      path: '/api/cooking/history',
      description: 'Most recent finished sessions',
      handler: (_request, { url }) => {
        const history = cooking.history(parseLimit(url));
        return jsonResponse({ success: true, total: history.length, history });
      },
    },
  ] };

  const applianceRoutes: RouteGroup = { prefix: '/api/appliances', routes: [
    {
      method: 'GET',
      path: '/discover',
      description: 'List simulated appliances',
      handler: () => {
        const devices = appliances.discover();
        return jsonResponse({ success: true, message: 'Appliances discovered', devices });
      },
    },
    {
      method: 'GET',
      path: '/self-test',
      description: 'Appliance connectivity check',
      handler: () => jsonResponse(appliances.selfTest()),
    },
    {
      method: 'POST',
      path: '/oven/preheat',
      description: 'Preheat the oven',
      handler: async (request) => {
        const body = await readJson(request);
        if (!body.success) return errorResponse(body.error);

        const parsed = parsePreheatRequest(body.value);
        if (!parsed.success) return errorResponse(parsed.error);

        const result = appliances.preheatOven(parsed.value);
        if (!result.success) return errorResponse(result.error);
        return jsonResponse({ success: true, ...result.value });
      },
    },
    {
      method: 'POST',
      path: '/autocooker/pressure',
      description: 'Run a pressure cooking cycle',
      handler: async (request) => {
        const body = await readJson(request);
        if (!body.success) return errorResponse(body.error);

        const parsed = parsePressureCookRequest(body.value);
        if (!parsed.success) return errorResponse(parsed.error);

        const result = appliances.startPressureCook(parsed.value);
        if (!result.success) return errorResponse(result.error);
        return jsonResponse({ success: true, ...result.value });
      },
    },
  ] };

  const voice: RouteGroup = { routes: [
    {
      method: 'POST',
      path: '/api/voice/command',
      description: 'Handle a transcribed voice command',
      handler: async (request) => {
        const body = await readJson(request);
        if (!body.success) return errorResponse(body.error);
        return jsonResponse(handleVoiceCommand(cooking, body.value));
      },
    },
  ] };

  return [sessions, applianceRoutes, voice];
}
