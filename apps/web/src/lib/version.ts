/**
 * Centralized Version Constants
 *
 * Import version from package.json to ensure consistency across the app.
 * Used by the liveness check.
 *
 * @module version
 */

import packageJson from "../../package.json";

/**
 * Application version from package.json
 */
export const APP_VERSION = packageJson.version;

/**
 * Build identifier reported by /api/health. APP_BUILD overrides it per deployment.
 */
export function getBuildId(env: Record<string, string | undefined> = process.env): string {
  const override = env.APP_BUILD?.trim();
  return override ? override : `${APP_VERSION}-structured`;
}
