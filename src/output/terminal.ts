import pc from 'picocolors';
import type { DiscoveryError } from '../types.js';

/**
 * Print rules-file problems to stderr. Discovery carries on past them,
 * so they are warnings rather than errors.
 */
export function printDiscoveryWarnings(errors: readonly DiscoveryError[]): void {
  for (const err of errors) {
    console.error(pc.yellow(`Warning: ${err.filePath}: ${err.error}`));
  }
}

/** Print a fatal error to stderr */
export function printError(message: string): void {
  console.error(pc.red(`Error: ${message}`));
}

/** Bullet list of discovery errors, one `  - path: error` line each */
export function formatDiscoveryWarnings(errors: readonly DiscoveryError[]): string {
  return errors.map((e) => `  - ${e.filePath}: ${e.error}`).join('\n');
}
