/**
 * @arch depsum.infra.fs
 *
 * Text file reads and writes. Failures surface as SystemError.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { SystemError, ErrorCodes, errorMessage } from './errors.js';

/**
 * Read a UTF-8 text file. Invalid UTF-8 is rejected, not replaced;
 * a leading BOM is kept.
 */
export async function readFile(filePath: string): Promise<string> {
  try {
    const data = await fs.promises.readFile(filePath);
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(data);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.READ_ERROR,
      `Failed to read ${filePath}: ${errorMessage(error)}`,
      { filePath }
    );
  }
}

/**
 * Overwrite a file with the given text. No temp file, no backup.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  try {
    await fs.promises.writeFile(filePath, content, 'utf-8');
  } catch (error) {
    throw new SystemError(
      ErrorCodes.WRITE_ERROR,
      `Failed to write ${filePath}: ${errorMessage(error)}`,
      { filePath }
    );
  }
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

export function resolvePath(basePath: string, ...segments: string[]): string {
  return path.resolve(basePath, ...segments);
}

export function basename(filePath: string): string {
  return path.basename(filePath);
}
