import { getConfig } from '../config.js';

/**
 * Log debug message if debug mode is enabled.
 */
export function logDebug(scope: string, message: string): void {
  if (getConfig().debug) {
    console.debug(`[bough:${scope}] ${message}`);
  }
}
