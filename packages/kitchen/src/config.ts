import { isLogLevel, type LogLevel, type ServerConfig } from '@kitchen-sim/core';

/**
 * Runtime configuration of the simulator.
 * Defaults live here; `serve.ts` overlays `.dev.vars` / `.env` / process env.
 */
export interface KitchenConfig {
  server: ServerConfig;
  http: {
    host: string;
    port: number;
  };
  push: {
    path: string;
    /** Observers whose send buffer grows past this are dropped */
    maxBufferedBytes: number;
  };
  logLevel: LogLevel;
  /** Length of one countdown tick in ms */
  tickMs: number;
}

export const config: KitchenConfig = {
  server: {
    app: {
      name: 'Smart Kitchen Simulator',
      description: 'Simulated cooking sessions and kitchen appliances with live push updates',
      version: '0.1.0',
    },
    cors: {
      origins: ['*'],
    },
  },
  http: {
    host: '0.0.0.0',
    port: 3000,
  },
  push: {
    path: '/ws',
    maxBufferedBytes: 1024 * 1024,
  },
  logLevel: 'info',
  tickMs: 1000,
};

export interface ResolvedConfig {
  config: KitchenConfig;
  /** Ignored or malformed variables */
  warnings: string[];
}

function positiveInteger(value: string): number | null {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return parsed > 0 ? parsed : null;
}

/**
 * Overlay environment variables on the defaults.
 * Malformed values keep the default and produce a warning.
 */
export function resolveConfig(
  env: Record<string, string | undefined>,
  base: KitchenConfig = config
): ResolvedConfig {
  const warnings: string[] = [];
  const resolved: KitchenConfig = {
    ...base,
    http: { ...base.http },
    push: { ...base.push },
  };

  const readInt = (key: string, apply: (value: number) => void) => {
    const raw = env[key];
    if (raw === undefined || raw === '') return;
    const value = positiveInteger(raw);
    if (value === null) {
      warnings.push(`${key} must be a positive integer, got "${raw}"`);
      return;
    }
    apply(value);
  };

  readInt('PORT', value => {
    if (value > 65535) {
      warnings.push(`PORT out of range: ${value}`);
      return;
    }
    resolved.http.port = value;
  });
  readInt('TICK_MS', value => { resolved.tickMs = value; });
  readInt('MAX_OBSERVER_BUFFER', value => { resolved.push.maxBufferedBytes = value; });

  const host = env['HOST']?.trim();
  if (host) resolved.http.host = host;

  const level = env['LOG_LEVEL']?.trim().toLowerCase();
  if (level) {
    if (isLogLevel(level)) {
      resolved.logLevel = level;
    } else {
      warnings.push(`LOG_LEVEL must be one of debug, info, warn, error, got "${level}"`);
    }
  }

  return { config: resolved, warnings };
}
