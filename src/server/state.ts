/**
 * MCP Server State Management
 *
 * Holds the loaded configuration and the lazily built service graph.
 * FAIL FAST: configuration errors surface on first access.
 *
 * @module server/state
 */

import { AppConfig, loadConfig } from './config.js';
import { createServices } from './services.js';
import { configurationError } from './errors.js';
import type { ServerState, ServiceContainer } from './types.js';

export const state: ServerState = {
  config: loadConfig(),
  services: null,
};

/**
 * Build the services on first use.
 */
export function requireServices(): ServiceContainer {
  if (!state.services) {
    state.services = createServices(state.config);
  }
  return state.services;
}

/** Install a prebuilt service graph (tests, embedding hosts). */
export function setServices(services: ServiceContainer): void {
  closeServices();
  state.services = services;
}

export function getConfig(): AppConfig {
  return state.config;
}

/**
 * Settings that can change while the server runs. Tools pass them to the
 * pipeline per request. Anything that shapes stored data (models,
 * chunking, storage path) needs a restart.
 */
export interface RuntimeSettings {
  initialK: number;
  finalK: number;
}

/**
 * @throws MCPError CONFIGURATION_ERROR when finalK would exceed initialK
 */
export function updateRetrievalSettings(update: Partial<RuntimeSettings>): AppConfig['retrieval'] {
  const next = { ...state.config.retrieval, ...update };
  if (next.finalK > next.initialK) {
    throw configurationError(`final_k (${next.finalK}) must not exceed initial_k (${next.initialK})`, {
      initial_k: next.initialK,
      final_k: next.finalK,
    });
  }
  state.config = { ...state.config, retrieval: next };
  console.error(`[Config] retrieval initial_k=${next.initialK} final_k=${next.finalK}`);
  return next;
}

function closeServices(): void {
  if (state.services?.db.isOpen()) {
    state.services.db.close();
  }
  state.services = null;
}

/**
 * Close services and reload configuration from the environment.
 */
export function resetState(env?: Record<string, string | undefined>): void {
  closeServices();
  state.config = loadConfig(env);
}
