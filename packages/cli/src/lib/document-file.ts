/**
 * Reading and writing configuration documents on disk
 */

import { readFile, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { extname } from 'path';
import type { DocumentFormat } from '../document/serialize.js';
import { BuilderError, ErrorCodes, wrapError } from './errors.js';

/**
 * .json files are JSON; anything else falls back to the given default.
 */
export function formatForPath(path: string, fallback: DocumentFormat = 'yaml'): DocumentFormat {
  const extension = extname(path).toLowerCase();
  if (extension === '.json') return 'json';
  if (extension === '.yaml' || extension === '.yml') return 'yaml';
  return fallback;
}

export async function readTextFile(path: string): Promise<string> {
  if (!existsSync(path)) {
    throw new BuilderError(ErrorCodes.IO_PATH_NOT_FOUND, `File not found: ${path}`);
  }
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw wrapError(error, ErrorCodes.IO_READ_ERROR, `Failed to read ${path}`);
  }
}

export async function writeTextFile(path: string, content: string): Promise<void> {
  try {
    await writeFile(path, content, 'utf-8');
  } catch (error) {
    throw wrapError(error, ErrorCodes.IO_WRITE_ERROR, `Failed to write ${path}`);
  }
}
