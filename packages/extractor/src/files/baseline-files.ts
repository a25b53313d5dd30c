/**
 * Baseline document loading
 *
 * Finds baseline markdown files in a directory and reads them. One unreadable
 * file is reported as a diagnostic; the rest still load.
 */

import { readFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { glob } from 'glob';
import type { BaselineDocument, ExtractionDiagnostic } from '../types.js';

export interface BaselineLoaderOptions {
  /** Glob relative to the directory (default: *.md) */
  pattern?: string;
  /** Globs to skip (default: README.md) */
  ignore?: string[];
}

export interface LoadedBaselines {
  documents: BaselineDocument[];
  diagnostics: ExtractionDiagnostic[];
}

const DEFAULT_PATTERN = '*.md';
const DEFAULT_IGNORE = ['README.md', '**/README.md'];

/**
 * Baseline name from a file path: gmail.md -> GMAIL
 */
export function baselineNameFromPath(filePath: string): string {
  return basename(filePath, extname(filePath)).toUpperCase();
}

export async function loadBaselineDocuments(
  directory: string,
  options: BaselineLoaderOptions = {}
): Promise<LoadedBaselines> {
  const relativePaths = await glob(options.pattern ?? DEFAULT_PATTERN, {
    cwd: directory,
    nodir: true,
    ignore: options.ignore ?? DEFAULT_IGNORE,
  });

  const documents: BaselineDocument[] = [];
  const diagnostics: ExtractionDiagnostic[] = [];

  // Sorted so the catalog does not depend on directory listing order
  for (const relativePath of [...relativePaths].sort()) {
    const source = join(directory, relativePath);
    const name = baselineNameFromPath(relativePath);
    try {
      const content = await readFile(source, 'utf-8');
      documents.push({ name, content, source });
    } catch (error) {
      diagnostics.push({
        kind: 'unreadable-document',
        baseline: name,
        source,
        message: `Could not read ${source}: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
  }

  return { documents, diagnostics };
}
