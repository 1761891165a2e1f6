/**
 * Party Registry API — Platform Store
 *
 * Holds the in-memory Platform the HTTP layer serves.  All state lives
 * in process and is lost on restart.
 *
 * @module api/store
 * @license AGPL-3.0-or-later
 */

import { loadConfig } from "../config";
import { Platform, type PlatformCollaborators } from "../core/platform";
import type { PlatformConfig } from "../types";

/** Singleton platform instance */
let platformInstance: Platform | null = null;

/**
 * Gets the global platform (singleton), configured from the environment.
 */
export function getPlatform(): Platform {
  if (!platformInstance) {
    platformInstance = new Platform(loadConfig());
  }
  return platformInstance;
}

/**
 * Creates a fresh platform (for testing).
 */
export function createStore(
  config?: PlatformConfig,
  collaborators?: PlatformCollaborators
): Platform {
  return new Platform(config, collaborators);
}
