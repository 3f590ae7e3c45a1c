/**
 * @arch depsum.core.domain
 *
 * go.sum -> deps.bzl pipeline. One pass, no retries, no rollback.
 */
import { loadGoSum } from './gosum/parser.js';
import { updateDepsBzl } from './deps-bzl/updater.js';
import type { RecordStatus, RecordUpdate } from './deps-bzl/types.js';

export interface SyncOptions {
  goSumPath: string;
  depsBzlPath: string;
  dryRun?: boolean;
}

export type UpdateCounts = Record<RecordStatus, number>;

export interface SyncSummary extends UpdateCounts {
  goSumPath: string;
  depsBzlPath: string;
  /** Distinct module@version keys read from go.sum */
  manifestEntries: number;
  updates: RecordUpdate[];
  /** Whether deps.bzl was rewritten */
  written: boolean;
}

export function summarizeUpdates(updates: RecordUpdate[]): UpdateCounts {
  const counts: UpdateCounts = { updated: 0, unchanged: 0, missing: 0 };
  for (const update of updates) {
    counts[update.status]++;
  }
  return counts;
}

/**
 * Read go.sum and rewrite the matching checksums in deps.bzl.
 */
export async function syncChecksums(options: SyncOptions): Promise<SyncSummary> {
  const { goSumPath, depsBzlPath, dryRun = false } = options;

  const checksums = await loadGoSum(goSumPath);
  const { updates } = await updateDepsBzl(depsBzlPath, checksums, { dryRun });

  return {
    goSumPath,
    depsBzlPath,
    manifestEntries: checksums.size,
    updates,
    ...summarizeUpdates(updates),
    written: !dryRun,
  };
}
