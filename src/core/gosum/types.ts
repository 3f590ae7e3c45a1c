/**
 * @arch depsum.core.types
 */

/** One module line from go.sum. */
export interface ChecksumEntry {
  module: string;
  version: string;
  checksum: string;
}

/** Checksums keyed by `module@version`. */
export type ChecksumMap = Map<string, string>;
