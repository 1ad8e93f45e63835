/**
 * @kitchen-sim/kitchen
 *
 * Cooking session simulator, appliance simulator and their HTTP / push
 * surface.
 *
 * @packageDocumentation
 */

export type * from './types.js';
export type { KitchenEventMap, KitchenEventType, BroadcastEvent } from './events.js';

export {
  planSteps,
  simulationSteps,
  estimateCookingMinutes,
  normalizeSteps,
} from './planner.js';
export { SessionStore, type SessionStoreOptions } from './session-store.js';
export {
  UpdateBroadcaster,
  type Observer,
  type Subscription,
  type UpdateBroadcasterOptions,
} from './broadcaster.js';
export { CookingClock, type CookingClockOptions } from './cooking-clock.js';
export { StatusQuery, toSnapshot } from './status-query.js';
export {
  ApplianceSimulator,
  approach,
  parsePreheatRequest,
  parsePressureCookRequest,
  DEFAULT_APPLIANCE_TIMINGS,
  OVEN_ID,
  AUTOCOOKER_ID,
  SPEAKER_ID,
  type ApplianceSimulatorOptions,
  type ApplianceTimings,
} from './appliances.js';
export {
  CookingService,
  parseStartCookingRequest,
  DEFAULT_ESTIMATED_MINUTES,
  DEFAULT_COOKING_METHOD,
  HISTORY_LIMIT,
  type CookingServiceOptions,
} from './cooking-service.js';
export { handleVoiceCommand, type VoiceCommandResult } from './voice.js';
export { createKitchenContext, type KitchenContext, type KitchenContextOptions } from './kitchen.js';
export { PushChannel, socketObserver, type SocketLike, type PushChannelOptions } from './push-channel.js';
export { createKitchenRoutes } from './routes.js';
export { createKitchenServer, type KitchenServerOptions } from './server.js';
export { config, resolveConfig, type KitchenConfig, type ResolvedConfig } from './config.js';
