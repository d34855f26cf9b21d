/**
 * Mapper options and verbose logging
 */

import { ArgumentError } from "./errors.js";

/**
 * Soft ceiling on cached dispatch entries before the whole cache is cleared
 */
export const DEFAULT_MAX_CACHED_ENTRIES = 2048;

export type MapperOptions = {
  readonly maxCachedEntries?: number;
  readonly verbose?: boolean;
  readonly log?: (line: string) => void;
};

export type ResolvedMapperOptions = {
  readonly maxCachedEntries: number;
  readonly verbose: boolean;
  readonly log: (line: string) => void;
};

/**
 * Fill in defaults. DEBUG_PAIRMAP=1 turns verbose logging on.
 */
export const resolveMapperOptions = (
  options: MapperOptions = {}
): ResolvedMapperOptions => {
  const maxCachedEntries =
    options.maxCachedEntries ?? DEFAULT_MAX_CACHED_ENTRIES;

  if (!Number.isInteger(maxCachedEntries) || maxCachedEntries < 1) {
    throw new ArgumentError(
      "maxCachedEntries",
      `'maxCachedEntries' must be a positive integer, got ${maxCachedEntries}`
    );
  }

  return {
    maxCachedEntries,
    verbose: options.verbose === true || process.env.DEBUG_PAIRMAP === "1",
    log: options.log ?? ((line) => console.log(line)),
  };
};

export type Logger = (message: string) => void;

/**
 * Logger that writes "[pairmap] ..." lines when verbose, and nothing otherwise
 */
export const createLogger = (options: ResolvedMapperOptions): Logger =>
  options.verbose
    ? (message) => options.log(`[pairmap] ${message}`)
    : () => undefined;
