/**
 * Kitchen HTTP server
 *
 * Composes the kitchen routes on an AppServer with an endpoint index at `/`,
 * extra `/health` fields and a JSON 404 fallback.
 */

import {
  AppServer,
  createServiceError,
  errorResponse,
  jsonResponse,
  type Logger,
} from '@kitchen-sim/core';
import type { KitchenConfig } from './config.js';
import type { KitchenContext } from './kitchen.js';
import { createKitchenRoutes } from './routes.js';

export interface KitchenServerOptions {
  config: KitchenConfig;
  kitchen: KitchenContext;
  logger?: Logger;
}

export function createKitchenServer(options: KitchenServerOptions): AppServer {
  const { config, kitchen } = options;
  const startedAt = kitchen.scheduler.now();

  const server = new AppServer({
    config: config.server,
    logger: options.logger,
    healthInfo: () => ({
      uptimeSeconds: Math.floor((kitchen.scheduler.now() - startedAt) / 1000),
      appliances: kitchen.appliances.count(),
      activeSessions: kitchen.clock.activeCount(),
      connectedClients: kitchen.broadcaster.observerCount(),
    }),
  });

  for (const group of createKitchenRoutes(kitchen)) {
    server.routes(group);
  }

  server.route('GET', '/', () => {
    const endpoints = server.getRoutes().map(route => ({
      method: route.method,
      path: route.path,
      description: route.description ?? '',
    }));
    return jsonResponse({
      success: true,
      name: config.server.app.name,
      version: config.server.app.version,
      pushChannel: config.push.path,
      endpoints: [
        { method: 'GET', path: '/health', description: 'Service health' },
        ...endpoints.filter(endpoint => endpoint.path !== '/'),
      ],
    });
  }, 'Endpoint index');

  server.fallback((request, { url }) =>
    errorResponse(createServiceError('NOT_FOUND', `No route for ${request.method} ${url.pathname}`))
  );

  return server;
}
