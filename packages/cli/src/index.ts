#!/usr/bin/env node

/**
 * gwscfg
 *
 * Build, validate and export Google Workspace baseline assessment
 * configuration documents.
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import {
  productsCommand,
  omitCommand,
  unomitCommand,
  annotateCommand,
  unannotateCommand,
  breakGlassCommand,
  outputCommand,
  authCommand,
} from './commands/edit.js';
import { validateCommand, showCommand } from './commands/validate.js';
import { exportCommand, importCommand } from './commands/export.js';
import { policiesCommand } from './commands/policies.js';
import { withErrorHandling } from './commands/context.js';
import { AUTH_MODE_LIST } from './document/serialize.js';
import { REPORT_FORMATS } from './document/model.js';
import { logger } from './lib/logger.js';
import { BUILDER_VERSION } from './lib/version.js';

type GlobalOptions = {
  verbose?: boolean;
  quiet?: boolean;
  json?: boolean;
};

const program = new Command();

program
  .name('gwscfg')
  .description('Build Google Workspace baseline assessment configurations')
  .version(BUILDER_VERSION)
  .option('-v, --verbose', 'Enable verbose output')
  .option('--quiet', 'Suppress output except errors')
  .option('--json', 'Machine-readable output')
  // Subcommands have their own --quiet
  .enablePositionalOptions()
  .hook('preAction', () => {
    const options = program.opts<GlobalOptions>();
    logger.configure({
      verbose: options.verbose ?? false,
      silent: options.quiet ?? false,
      json: options.json ?? false,
    });
  });

const pathOption = ['-p, --path <path>', 'Directory with gwscfg.config.yaml (default: current directory)'] as const;

// ==========================================
// Creating and editing
// ==========================================

program
  .command('init <file>')
  .description('Create a new configuration document')
  .requiredOption('--org <name>', 'Organization name')
  .option('--unit <name>', 'Organizational unit')
  .option('--description <text>', 'Description')
  .requiredOption('--products <names...>', 'Products to assess (e.g. GMAIL DRIVE)')
  .option('-f, --force', 'Overwrite an existing file')
  .option(...pathOption)
  .action(withErrorHandling(initCommand));

program
  .command('products <file> <names...>')
  .description('Replace the product selection')
  .option(...pathOption)
  .action(withErrorHandling(productsCommand));

program
  .command('omit <file> <policyId>')
  .description('Omit a policy from assessment')
  .requiredOption('-r, --rationale <text>', 'Why the policy is omitted')
  .option('-e, --expires <date>', 'Expiration date (YYYY-MM-DD)')
  .option(...pathOption)
  .action(withErrorHandling(omitCommand));

program
  .command('unomit <file> <policyId>')
  .description('Remove a policy omission')
  .option(...pathOption)
  .action(withErrorHandling(unomitCommand));

program
  .command('annotate <file> <policyId>')
  .description('Annotate a policy result')
  .requiredOption('-c, --comment <text>', 'Annotation comment')
  .option('--incorrect', 'Mark the assessment result as incorrect')
  .option('--remediation <date>', 'Planned remediation date (YYYY-MM-DD)')
  .option(...pathOption)
  .action(withErrorHandling(annotateCommand));

program
  .command('unannotate <file> <policyId>')
  .description('Remove a policy annotation')
  .option(...pathOption)
  .action(withErrorHandling(unannotateCommand));

program
  .command('break-glass <file> <email>')
  .description('Add (or remove) a break-glass super admin account')
  .option('--remove', 'Remove the account instead')
  .option(...pathOption)
  .action(withErrorHandling(breakGlassCommand));

program
  .command('output <file>')
  .description('Change report output settings')
  .option('--dir <directory>', 'Report output directory')
  .option('--formats <formats...>', `Report formats (${REPORT_FORMATS.join(', ')})`)
  .option('--quiet', 'Do not open reports after the assessment')
  .option('--no-quiet', 'Open reports after the assessment')
  .option('--dark-mode', 'Render reports in dark mode')
  .option('--no-dark-mode', 'Render reports in light mode')
  .option(...pathOption)
  .action(withErrorHandling(outputCommand));

program
  .command('auth <file>')
  .description('Set authentication settings')
  .requiredOption('--mode <mode>', `Authentication mode (${AUTH_MODE_LIST})`)
  .option('--credentials <path>', 'Credentials .json file')
  .option('--customer-id <id>', 'Workspace customer id (service-account)')
  .option('--subject-email <email>', 'Admin user to impersonate (service-account)')
  .option(...pathOption)
  .action(withErrorHandling(authCommand));

// ==========================================
// Checking and exporting
// ==========================================

program
  .command('validate <file>')
  .description('Report every problem in a document')
  .option(...pathOption)
  .action(withErrorHandling(validateCommand));

program
  .command('show <file>')
  .description('Summarize a document')
  .option(...pathOption)
  .action(withErrorHandling(showCommand));

program
  .command('export <file>')
  .description('Write the document, or the assessment engine configuration')
  .option('--engine', 'Flat configuration for the assessment engine')
  .option('--format <format>', 'yaml or json (default: from the output file or settings)')
  .option('-o, --output <file>', 'Output file (default: stdout)')
  .option(...pathOption)
  .action(withErrorHandling(exportCommand));

program
  .command('import <engineFile> <file>')
  .description('Create a document from an assessment engine configuration')
  .option('-f, --force', 'Overwrite an existing file')
  .option(...pathOption)
  .action(withErrorHandling(importCommand));

program
  .command('policies [product]')
  .description('List products, or the policies of one product')
  .option(...pathOption)
  .action(withErrorHandling(policiesCommand));

await program.parseAsync();
