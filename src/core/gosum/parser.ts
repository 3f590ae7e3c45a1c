/**
 * @arch depsum.core.domain
 *
 * go.sum reader: maps module@version to its checksum.
 */
import { readFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import type { ChecksumEntry, ChecksumMap } from './types.js';

const log = logger.child('go.sum');

/** Lines for a module's go.mod file carry a separate checksum class. */
export const GO_MOD_MARKER = '/go.mod';

export function checksumKey(module: string, version: string): string {
  return `${module}@${version}`;
}

/**
 * Parse one go.sum line. Returns null for blank, go.mod and short lines.
 */
export function parseGoSumLine(line: string): ChecksumEntry | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.includes(GO_MOD_MARKER)) {
    return null;
  }

  const [module, version, checksum] = trimmed.split(/\s+/);
  if (module === undefined || version === undefined || checksum === undefined) {
    return null;
  }
  return { module, version, checksum };
}

/**
 * Build the checksum map from go.sum text.
 * A repeated module@version overwrites the earlier checksum.
 */
export function parseGoSum(content: string): ChecksumMap {
  const checksums: ChecksumMap = new Map();
  for (const line of content.split(/\r?\n/)) {
    const entry = parseGoSumLine(line);
    if (entry) {
      checksums.set(checksumKey(entry.module, entry.version), entry.checksum);
    }
  }
  return checksums;
}

/**
 * Read and parse a go.sum file. Throws SystemError if it cannot be read.
 */
export async function loadGoSum(filePath: string): Promise<ChecksumMap> {
  const checksums = parseGoSum(await readFile(filePath));
  log.debug(`Loaded ${checksums.size} checksums from ${filePath}`);
  return checksums;
}
