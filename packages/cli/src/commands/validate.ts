/**
 * Validate and show commands
 */

import pc from 'picocolors';
import { toPersistedDocument } from '../document/serialize.js';
import { logger } from '../lib/logger.js';
import { loadContext, openDocument, type CommonOptions } from './context.js';

export async function validateCommand(file: string, options: CommonOptions): Promise<void> {
  const context = await loadContext(options);
  const builder = await openDocument(file, context);
  const violations = builder.validate();

  if (logger.isJson()) {
    console.log(JSON.stringify({ file, valid: violations.length === 0, violations }, null, 2));
  } else if (violations.length === 0) {
    console.log(pc.green(`✓ ${file} is valid`));
  } else {
    console.error(pc.red(`✗ ${file} has ${violations.length} problem${violations.length === 1 ? '' : 's'}:`));
    for (const violation of violations) {
      console.error(`  - ${pc.bold(violation.path)}: ${violation.message} ${pc.dim(`(${violation.code})`)}`);
    }
  }

  if (violations.length > 0) {
    process.exit(1);
  }
}

export async function showCommand(file: string, options: CommonOptions): Promise<void> {
  const context = await loadContext(options);
  const builder = await openDocument(file, context);
  const document = builder.document;

  if (logger.isJson()) {
    console.log(JSON.stringify(toPersistedDocument(document), null, 2));
    return;
  }

  const { organization, output, auth } = document;
  console.log('');
  console.log(pc.bold(organization.name || pc.dim('(no organization)')));
  if (organization.unit) console.log(`  Unit:         ${organization.unit}`);
  if (organization.description) console.log(`  Description:  ${organization.description}`);
  console.log(`  Products:     ${document.products.join(', ') || pc.dim('none')}`);
  console.log(`  Omissions:    ${Object.keys(document.omissions).length}`);
  console.log(`  Annotations:  ${Object.keys(document.annotations).length}`);
  console.log(`  Break-glass:  ${document.breakGlassAccounts.join(', ') || pc.dim('none')}`);
  console.log(`  Output:       ${output.directory} (${output.formats.join(', ')})`);
  console.log(`  Auth:         ${auth.mode}`);
  console.log('');
}
