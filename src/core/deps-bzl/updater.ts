/**
 * @arch depsum.core.domain
 *
 * Rewrites the sum field of go_repository records in a deps.bzl file.
 */
import { readFile, writeFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { checksumKey } from '../gosum/parser.js';
import type { ChecksumMap } from '../gosum/types.js';
import type { DepsRecord, RecordUpdate, UpdateOptions, UpdateResult } from './types.js';

const log = logger.child('deps.bzl');

/**
 * go_repository( name = "..", importpath = "..", sum = "..", version = "..", )
 * in exactly that order. Odd groups hold the literal text between values.
 */
const RECORD_PATTERN =
  /(go_repository\(\s*name\s*=\s*")([^"]+)(",\s*importpath\s*=\s*")([^"]+)(",\s*sum\s*=\s*")([^"]+)(",\s*version\s*=\s*")([^"]+)(",\s*\))/g;

/**
 * List the records in document order.
 */
export function findDepsRecords(content: string): DepsRecord[] {
  return Array.from(content.matchAll(RECORD_PATTERN), (m) => ({
    name: m[2],
    importpath: m[4],
    sum: m[6],
    version: m[8],
  }));
}

/**
 * Substitute manifest checksums into every matching record.
 * Only the sum value changes; all other text is kept as-is.
 */
export function updateDepsBzlContent(content: string, checksums: ChecksumMap): UpdateResult {
  const updates: RecordUpdate[] = [];

  const updated = content.replace(
    RECORD_PATTERN,
    (
      match: string,
      head: string,
      name: string,
      beforePath: string,
      importpath: string,
      beforeSum: string,
      sum: string,
      beforeVersion: string,
      version: string,
      tail: string
    ) => {
      const record: DepsRecord = { name, importpath, sum, version };
      const key = checksumKey(importpath, version);
      const newSum = checksums.get(key);

      if (newSum === undefined) {
        updates.push({ status: 'missing', record, key });
        return match;
      }

      updates.push({ status: newSum === sum ? 'unchanged' : 'updated', record, key, newSum });
      return head + name + beforePath + importpath + beforeSum + newSum + beforeVersion + version + tail;
    }
  );

  return { content: updated, updates };
}

/**
 * Read a deps.bzl file, update its checksums and overwrite it.
 * With `dryRun` the file is left alone.
 */
export async function updateDepsBzl(
  filePath: string,
  checksums: ChecksumMap,
  options: UpdateOptions = {}
): Promise<UpdateResult> {
  const original = await readFile(filePath);
  const result = updateDepsBzlContent(original, checksums);

  log.debug(`Matched ${result.updates.length} go_repository records in ${filePath}`);

  if (!options.dryRun) {
    await writeFile(filePath, result.content);
  }
  return result;
}
