/**
 * Policy catalog loading for the builder
 *
 * A catalog file (gwsx extract output) is preferred. Without one, the
 * baseline markdown directory is extracted on the fly.
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import {
  CATALOG_SCHEMA_VERSION,
  CatalogFormatError,
  extractCatalog,
  loadBaselineDocuments,
  parseCatalogFile,
  type BaselineCatalog,
  type ExtractionDiagnostic,
} from '@gws-config/extractor';
import { BuilderError, ErrorCodes, wrapError } from './errors.js';
import { logger } from './logger.js';
import { checkCatalogVersion } from './catalog-version.js';
import type { BuilderSettings } from './settings.js';

export interface LoadedCatalog {
  catalog: BaselineCatalog;
  /** Catalog file or baseline directory the catalog came from */
  source: string;
  diagnostics: ExtractionDiagnostic[];
}

export async function readCatalogFile(path: string): Promise<LoadedCatalog> {
  if (!existsSync(path)) {
    throw new BuilderError(ErrorCodes.CATALOG_NOT_FOUND, `Catalog file not found: ${path}`);
  }

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw wrapError(error, ErrorCodes.IO_READ_ERROR, `Failed to read ${path}`);
  }

  let parsed: ReturnType<typeof parseCatalogFile>;
  try {
    parsed = parseCatalogFile(text);
  } catch (error) {
    if (error instanceof CatalogFormatError) {
      throw new BuilderError(ErrorCodes.CATALOG_INVALID, `${error.message} (${path})`, {
        details: error.issues,
        cause: error,
      });
    }
    throw wrapError(error, ErrorCodes.CATALOG_INVALID);
  }

  const version = checkCatalogVersion(parsed.file.schemaVersion);
  if (!version.readable) {
    throw new BuilderError(ErrorCodes.CATALOG_VERSION_MISMATCH, `${version.message} (${path})`, {
      details: { catalogVersion: version.version, extractorVersion: CATALOG_SCHEMA_VERSION },
    });
  }

  logger.debug('Loaded catalog file', { path, generatedBy: parsed.file.generatedBy });
  return { catalog: parsed.catalog, source: path, diagnostics: [] };
}

export async function extractCatalogFromDirectory(directory: string): Promise<LoadedCatalog> {
  if (!existsSync(directory)) {
    throw new BuilderError(ErrorCodes.CATALOG_NOT_FOUND, `Baseline directory not found: ${directory}`);
  }

  const loaded = await loadBaselineDocuments(directory);
  const result = extractCatalog(loaded.documents);
  const diagnostics = [...loaded.diagnostics, ...result.diagnostics];

  for (const diagnostic of diagnostics) {
    logger.warn(diagnostic.message, {
      kind: diagnostic.kind,
      baseline: diagnostic.baseline,
      ...(diagnostic.line !== undefined ? { line: diagnostic.line } : {}),
    });
  }

  if (Object.keys(result.catalog).length === 0) {
    throw new BuilderError(ErrorCodes.CATALOG_NOT_FOUND, `No baseline documents found in ${directory}`);
  }

  logger.debug('Extracted catalog from baselines', { directory, baselines: Object.keys(result.catalog) });
  return { catalog: result.catalog, source: directory, diagnostics };
}

/**
 * Catalog for a settings object: the catalog file when set, otherwise the
 * baseline directory.
 */
export async function loadCatalog(settings: BuilderSettings): Promise<LoadedCatalog> {
  if (settings.catalog) {
    return readCatalogFile(settings.catalog);
  }
  if (settings.baselines) {
    return extractCatalogFromDirectory(settings.baselines);
  }
  throw new BuilderError(ErrorCodes.CATALOG_NOT_FOUND);
}
