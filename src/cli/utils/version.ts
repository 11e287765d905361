/**
 * Package version lookup
 */

import { readFileSync } from 'fs';

/**
 * Read the version from package.json (one level up from dist/ or src/)
 */
export function getVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../../package.json', import.meta.url), 'utf-8'));
    if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
      return raw.version;
    }
    return 'unknown';
  } catch {
    return 'unknown';
  }
}

/**
 * Version string for display, e.g. `stackdiff 0.1.0`
 */
export function getFormattedVersion(): string {
  return `stackdiff ${getVersion()}`;
}
