#!/usr/bin/env node

/**
 * gwsx - baseline policy extractor CLI
 *
 * Reads baseline markdown and writes the policy catalog the builder embeds.
 */

import { Command } from 'commander';
import pc from 'picocolors';
import { writeFile, mkdir, stat } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';

import {
  extractCatalog,
  serializeCatalog,
  countPolicies,
  loadBaselineDocuments,
  KNOWN_PRODUCTS,
  EXTRACTOR_VERSION,
  type ExtractionDiagnostic,
} from './index.js';

const program = new Command();

/** Format duration for human-readable output */
function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

function formatDiagnostic(diagnostic: ExtractionDiagnostic): string {
  const location = diagnostic.source
    ? `${diagnostic.source}${diagnostic.line ? `:${diagnostic.line}` : ''}`
    : diagnostic.baseline;
  return `${location} ${diagnostic.message}`;
}

program
  .name('gwsx')
  .description('Extract policy catalogs from baseline documents')
  .version(EXTRACTOR_VERSION);

program
  .command('extract')
  .description('Extract a policy catalog from a directory of baseline markdown files')
  .requiredOption('-b, --baselines <dir>', 'Directory containing baseline .md files')
  .option('-o, --out <file>', 'Output file path (use --out=- for stdout)')
  .option('--quiet', 'Suppress progress messages', false)
  .action(async (options: { baselines: string; out?: string; quiet: boolean }) => {
    const startTime = Date.now();

    try {
      const directory = resolve(options.baselines);
      const info = await stat(directory);
      if (!info.isDirectory()) {
        console.error(pc.red(`Not a directory: ${directory}`));
        process.exit(1);
      }

      if (!options.quiet) {
        console.error(pc.dim(`Reading baselines from ${directory}...`));
      }

      const loaded = await loadBaselineDocuments(directory);
      const { catalog, diagnostics } = extractCatalog(loaded.documents);
      const allDiagnostics = [...loaded.diagnostics, ...diagnostics];

      if (!options.quiet) {
        for (const diagnostic of allDiagnostics) {
          console.error(pc.yellow('warn'), formatDiagnostic(diagnostic));
        }
      }

      const output = serializeCatalog(catalog);
      const outputToStdout = options.out === '-' || options.out === undefined;

      if (outputToStdout) {
        process.stdout.write(output);
      } else {
        const outputPath = resolve(options.out ?? '');
        await mkdir(dirname(outputPath), { recursive: true });
        await writeFile(outputPath, output, 'utf-8');
        if (!options.quiet) {
          console.error(pc.green(`✓ Catalog written to ${outputPath}`));
        }
      }

      if (!options.quiet) {
        console.error(pc.dim(`  Baselines: ${Object.keys(catalog).length}`));
        console.error(pc.dim(`  Policies: ${countPolicies(catalog)}`));
        console.error(pc.dim(`  Warnings: ${allDiagnostics.length}`));
        console.error(pc.dim(`  Duration: ${formatDuration(Date.now() - startTime)}`));
      }
    } catch (error) {
      console.error(pc.red('Extraction failed:'), error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program
  .command('products')
  .description('List known Google Workspace products')
  .action(() => {
    console.log(pc.bold('Known products:\n'));

    for (const product of KNOWN_PRODUCTS) {
      console.log(pc.cyan(`  ${product.name}`), product.title);
      console.log(pc.dim(`    ${product.description}`));
    }
  });

program.parse();
