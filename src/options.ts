/**
 * Search Options Configuration
 *
 * Options accepted by the hosting layers (adapter, CLI). All fields are
 * optional - undefined values use defaults.
 */

import type { SearchLogger } from "./types.js";

export interface SearchOptions {
  /** Distinguish upper and lower case (default: true) */
  caseSensitive?: boolean;

  /** Receives progress messages (default: none) */
  logger?: SearchLogger;
}

export interface ResolvedSearchOptions {
  caseSensitive: boolean;
  logger: SearchLogger | undefined;
}

const DEFAULT_OPTIONS: ResolvedSearchOptions = {
  caseSensitive: true,
  logger: undefined,
};

/**
 * Resolve search options by merging user-provided options with defaults.
 */
export function resolveSearchOptions(
  userOptions?: SearchOptions,
): ResolvedSearchOptions {
  if (!userOptions) {
    return { ...DEFAULT_OPTIONS };
  }
  return {
    caseSensitive: userOptions.caseSensitive ?? DEFAULT_OPTIONS.caseSensitive,
    logger: userOptions.logger ?? DEFAULT_OPTIONS.logger,
  };
}
