/**
 * Raw file I/O for the CLI
 * Files are read and written as bytes, with no text decoding or newline
 * translation.
 */

import { readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import { basename, dirname, join } from 'path';

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read a whole file into memory
 */
export function readBytes(filePath: string): Uint8Array {
  try {
    return readFileSync(filePath);
  } catch (error) {
    throw new Error(`Cannot read ${filePath}: ${reason(error)}`, { cause: error });
  }
}

/**
 * Write the bytes verbatim, replacing any existing file
 *
 * The data goes to a temporary file beside the target, which is renamed
 * over it once complete. A failed write leaves no partial output behind.
 */
export function writeBytes(filePath: string, data: Uint8Array): void {
  const tempPath = join(dirname(filePath), `.${basename(filePath)}.${process.pid}.tmp`);

  try {
    writeFileSync(tempPath, data);
    renameSync(tempPath, filePath);
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw new Error(`Cannot write ${filePath}: ${reason(error)}`, { cause: error });
  }
}
