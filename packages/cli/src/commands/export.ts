/**
 * Export and import commands
 *
 * Usage:
 *   gwscfg export config.yaml                       # persisted document to stdout
 *   gwscfg export config.yaml --engine -o engine.yaml
 *   gwscfg import engine.yaml config.yaml
 */

import pc from 'picocolors';
import { ConfigurationBuilder } from '../document/builder.js';
import { importEngineConfig } from '../document/engine.js';
import type { DocumentFormat } from '../document/serialize.js';
import { formatForPath, readTextFile, writeTextFile } from '../lib/document-file.js';
import { BuilderError, ErrorCodes } from '../lib/errors.js';
import { assertWritable, loadContext, openDocument, saveDocument, type CommonOptions } from './context.js';

export interface ExportOptions extends CommonOptions {
  engine?: boolean;
  format?: string;
  output?: string;
}

function parseFormat(value: string | undefined): DocumentFormat | undefined {
  if (value === undefined) return undefined;
  if (value === 'yaml' || value === 'json') return value;
  throw new BuilderError(ErrorCodes.CLI_INVALID_ARGUMENT, `Unknown format "${value}" (expected yaml or json)`);
}

export async function exportCommand(file: string, options: ExportOptions): Promise<void> {
  const requested = parseFormat(options.format);
  const context = await loadContext(options);
  const builder = await openDocument(file, context);

  const output = options.output && options.output !== '-' ? options.output : undefined;
  const format = requested ?? (output ? formatForPath(output, context.settings.format) : context.settings.format);

  const text = options.engine
    ? builder.exportForEngine(format)
    : builder.serialize({ format, includeComments: context.settings.includeComments });

  if (output) {
    await writeTextFile(output, text);
    console.error(pc.green(`✓ Wrote ${options.engine ? 'engine configuration' : 'document'} to ${output}`));
  } else {
    process.stdout.write(text);
  }
}

export interface ImportOptions extends CommonOptions {
  force?: boolean;
}

export async function importCommand(engineFile: string, file: string, options: ImportOptions): Promise<void> {
  assertWritable(file, options.force);

  const document = importEngineConfig(await readTextFile(engineFile));
  const context = await loadContext(options);
  const builder = new ConfigurationBuilder(context.catalog, document);
  await saveDocument(builder, file, context.settings);

  console.log(pc.green(`✓ Imported ${engineFile} into ${file}`));
}
