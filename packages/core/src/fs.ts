import { copyFileSync, constants, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { ScanError } from './errors.js';

export function readTextFile(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ScanError(filePath, error);
  }
}

/**
 * Replace a file's content in one step: write a sibling temporary file, then rename it over the target
 */
export function writeFileAtomically(filePath: string, content: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  const temporaryPath = `${filePath}.${process.pid}.tmp`;
  writeFileSync(temporaryPath, content, 'utf-8');
  renameSync(temporaryPath, filePath);
}

/**
 * Move a file, refusing to replace an existing destination
 */
export function relocateFile(fromPath: string, toPath: string): void {
  mkdirSync(dirname(toPath), { recursive: true });
  copyFileSync(fromPath, toPath, constants.COPYFILE_EXCL);
  unlinkSync(fromPath);
}

export function deleteFile(filePath: string): void {
  unlinkSync(filePath);
}
