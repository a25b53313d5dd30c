/**
 * Policies command - browse the policy catalog
 */

import pc from 'picocolors';
import { getProductInfo, listProducts } from '@gws-config/extractor';
import { BuilderError, ErrorCodes } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { loadContext, type CommonOptions } from './context.js';

export async function policiesCommand(product: string | undefined, options: CommonOptions): Promise<void> {
  const { catalog } = await loadContext(options);

  if (!product) {
    const products = listProducts(catalog);
    if (logger.isJson()) {
      console.log(
        JSON.stringify(
          products.map((name) => ({ ...getProductInfo(name), policies: catalog[name]?.length ?? 0 })),
          null,
          2
        )
      );
      return;
    }
    for (const name of products) {
      const info = getProductInfo(name);
      console.log(`${pc.bold(name.padEnd(14))} ${String(catalog[name]?.length ?? 0).padStart(3)}  ${pc.dim(info.title)}`);
    }
    return;
  }

  const key = listProducts(catalog).find((name) => name.toUpperCase() === product.trim().toUpperCase());
  const policies = key ? catalog[key] : undefined;
  if (!key || !policies) {
    throw new BuilderError(ErrorCodes.CLI_INVALID_ARGUMENT, `Unknown product "${product}"`);
  }

  if (logger.isJson()) {
    console.log(JSON.stringify(policies, null, 2));
    return;
  }

  console.log(pc.bold(`${getProductInfo(key).title} (${policies.length} policies)`));
  for (const policy of policies) {
    console.log(`  ${pc.cyan(policy.policyId)}  ${policy.title}`);
    if (policy.description) {
      console.log(pc.dim(`    ${policy.description.split('\n').join('\n    ')}`));
    }
  }
}
