/**
 * Init command - create a new configuration document
 */

import pc from 'picocolors';
import { ConfigurationBuilder } from '../document/builder.js';
import { assertWritable, loadContext, saveDocument, type CommonOptions } from './context.js';

export interface InitOptions extends CommonOptions {
  org: string;
  unit?: string;
  description?: string;
  products: string[];
  force?: boolean;
}

export async function initCommand(file: string, options: InitOptions): Promise<void> {
  assertWritable(file, options.force);

  const context = await loadContext(options);
  const builder = new ConfigurationBuilder(context.catalog);
  builder.setOrganization(options.org, options.unit, options.description);
  builder.selectBaselines(options.products);
  await saveDocument(builder, file, context.settings);

  const { products } = builder.document;
  console.log(pc.green(`✓ Created ${file}`));
  console.log(pc.dim(`  Products: ${products.join(', ')}`));
  console.log('');
  console.log('Next steps:');
  console.log(`  gwscfg omit ${file} <policyId> -r "<rationale>"`);
  console.log(`  gwscfg validate ${file}`);
  console.log(`  gwscfg export ${file} --engine -o engine-config.yaml`);
}
