/**
 * @arch depsum.core.types
 */

/** The four quoted fields of a go_repository(...) declaration. */
export interface DepsRecord {
  name: string;
  importpath: string;
  sum: string;
  version: string;
}

/**
 * Outcome for one record. `unchanged` means the manifest checksum
 * was found and already equals the stored one.
 */
export type RecordUpdate =
  | { status: 'updated' | 'unchanged'; record: DepsRecord; key: string; newSum: string }
  | { status: 'missing'; record: DepsRecord; key: string };

export type RecordStatus = RecordUpdate['status'];

export interface UpdateResult {
  /** Rewritten file text */
  content: string;
  /** One entry per record, in document order */
  updates: RecordUpdate[];
}

export interface UpdateOptions {
  /** Compute the result without writing the file */
  dryRun?: boolean;
}
