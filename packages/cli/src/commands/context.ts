/**
 * Shared command plumbing: settings and catalog loading, the
 * load-apply-validate-write cycle for editing commands, and error reporting.
 */

import { resolve } from 'path';
import { existsSync } from 'fs';
import pc from 'picocolors';
import type { BaselineCatalog } from '@gws-config/extractor';
import { ConfigurationBuilder } from '../document/builder.js';
import { loadCatalog } from '../lib/catalog.js';
import { formatForPath, readTextFile, writeTextFile } from '../lib/document-file.js';
import { BuilderError, ErrorCodes, ValidationError, isBuilderError, wrapError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { loadSettings, type BuilderSettings } from '../lib/settings.js';

export interface CommonOptions {
  /** Directory holding the settings file (default: current directory) */
  path?: string;
}

export interface CommandContext {
  settings: BuilderSettings;
  catalog: BaselineCatalog;
}

export async function loadContext(options: CommonOptions): Promise<CommandContext> {
  const targetPath = resolve(options.path ?? process.cwd());
  const { settings, source } = await loadSettings(targetPath);
  if (source) {
    logger.debug('Using settings file', { source });
  }
  const { catalog, source: catalogSource } = await loadCatalog(settings);
  logger.debug('Catalog ready', { source: catalogSource, baselines: Object.keys(catalog).length });
  return { settings, catalog };
}

export async function openDocument(file: string, context: CommandContext): Promise<ConfigurationBuilder> {
  const builder = new ConfigurationBuilder(context.catalog);
  builder.load(await readTextFile(file));
  return builder;
}

/**
 * Serialize (refusing invalid documents) and write in the file's format.
 */
export async function saveDocument(
  builder: ConfigurationBuilder,
  file: string,
  settings: BuilderSettings
): Promise<void> {
  const text = builder.serialize({
    format: formatForPath(file, settings.format),
    includeComments: settings.includeComments,
  });
  await writeTextFile(file, text);
}

/**
 * Load a document, apply one change, validate and write it back. Nothing is
 * written when any step fails.
 */
export async function editDocument(
  file: string,
  options: CommonOptions,
  change: (builder: ConfigurationBuilder) => void
): Promise<void> {
  const context = await loadContext(options);
  const builder = await openDocument(file, context);
  change(builder);
  await saveDocument(builder, file, context.settings);
}

export function assertWritable(file: string, force: boolean | undefined): void {
  if (existsSync(file) && !force) {
    throw new BuilderError(ErrorCodes.CLI_INVALID_ARGUMENT, `${file} already exists (use --force to overwrite)`);
  }
}

/**
 * Lines printed for a failed command.
 */
export function formatError(error: BuilderError, verbose = false): string[] {
  const lines = [pc.red(`✗ ${error.toUserString(verbose)}`)];

  if (error instanceof ValidationError && error.violations.length > 1) {
    for (const violation of error.violations) {
      lines.push(`  - ${pc.bold(violation.path)}: ${violation.message}`);
    }
  }

  if (error.details && Array.isArray(error.details) && !(error instanceof ValidationError)) {
    for (const detail of error.details) {
      lines.push(pc.dim(`  - ${String(detail)}`));
    }
  }

  const remediation = error.getRemediation();
  if (remediation) {
    lines.push('', pc.yellow('How to fix:'));
    for (const line of remediation.split('\n')) {
      lines.push(pc.dim(`  ${line}`));
    }
  }

  return lines;
}

/**
 * Wrap a command action: print failures with their remediation and exit 1.
 */
export function withErrorHandling<Args extends unknown[]>(
  action: (...args: Args) => Promise<void>
): (...args: Args) => Promise<void> {
  return async (...args: Args) => {
    try {
      await action(...args);
    } catch (error) {
      const builderError = isBuilderError(error)
        ? error
        : wrapError(error, ErrorCodes.CLI_INVALID_ARGUMENT, error instanceof Error ? error.message : String(error));

      if (logger.isJson()) {
        console.error(JSON.stringify(builderError.toJSON(), null, 2));
      } else {
        console.error('');
        for (const line of formatError(builderError)) {
          console.error(line);
        }
        console.error('');
      }
      process.exit(1);
    }
  };
}
