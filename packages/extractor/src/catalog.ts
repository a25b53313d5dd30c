/**
 * Catalog persistence and lookup
 *
 * The catalog file is the hand-off between the build-time extractor and the
 * run-time builder, so its output is deterministic: baselines sorted by name,
 * policies in document order, fixed field order, 2-space indent, trailing
 * newline.
 */

import { z } from 'zod';
import { freezeCatalog } from './extract.js';
import { CATALOG_SCHEMA_VERSION } from './schema/index.js';
import { isPolicyId } from './tokenizer.js';
import type { BaselineCatalog, CatalogFile, PolicyRecord } from './types.js';

/** Package identifier for the generatedBy field */
export const EXTRACTOR_PACKAGE_NAME = '@gws-config/extractor';

export const EXTRACTOR_VERSION = '0.1.0';

export class CatalogFormatError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'CatalogFormatError';
  }
}

const PolicyRecordSchema = z.object({
  policyId: z.string().refine(isPolicyId, { message: 'invalid policy id' }),
  title: z.string().default(''),
  description: z.string().default(''),
});

const CatalogFileSchema = z.object({
  schemaVersion: z.string(),
  generatedBy: z.string().default(''),
  baselines: z.record(z.string(), z.array(PolicyRecordSchema)),
});

export function getGeneratedBy(version: string = EXTRACTOR_VERSION): string {
  return `${EXTRACTOR_PACKAGE_NAME}@${version}`;
}

/**
 * Convert a catalog to its persisted shape with explicit field order.
 */
export function toCatalogFile(catalog: BaselineCatalog, version: string = EXTRACTOR_VERSION): CatalogFile {
  const baselines: Record<string, PolicyRecord[]> = {};
  for (const name of Object.keys(catalog).sort()) {
    baselines[name] = (catalog[name] ?? []).map((policy) => ({
      policyId: policy.policyId,
      title: policy.title,
      description: policy.description,
    }));
  }

  return {
    schemaVersion: CATALOG_SCHEMA_VERSION,
    generatedBy: getGeneratedBy(version),
    baselines,
  };
}

export function serializeCatalog(catalog: BaselineCatalog, version?: string): string {
  return JSON.stringify(toCatalogFile(catalog, version), null, 2) + '\n';
}

/**
 * Parse a catalog file. The schema version is returned untouched; checking
 * compatibility is the consumer's job.
 */
export function parseCatalogFile(text: string): { file: CatalogFile; catalog: BaselineCatalog } {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new CatalogFormatError(
      `Catalog is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = CatalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new CatalogFormatError('Catalog does not match the expected format', issues);
  }

  const file: CatalogFile = parsed.data;
  return { file, catalog: freezeCatalog(file.baselines) };
}

// ============================================================================
// Lookup
// ============================================================================

/**
 * Product segment of a policy id: GWS.GMAIL.1.1v0.6 -> GMAIL.
 * Returns undefined for ids that do not match the grammar.
 */
export function productOfPolicy(policyId: string): string | undefined {
  if (!isPolicyId(policyId)) return undefined;
  return policyId.split('.')[1];
}

/**
 * Find a policy and the baseline that owns it.
 */
export function findPolicy(
  catalog: BaselineCatalog,
  policyId: string
): { baseline: string; policy: PolicyRecord } | undefined {
  for (const [baseline, policies] of Object.entries(catalog)) {
    const policy = policies.find((candidate) => candidate.policyId === policyId);
    if (policy) {
      return { baseline, policy };
    }
  }
  return undefined;
}

export function listProducts(catalog: BaselineCatalog): string[] {
  return Object.keys(catalog).sort();
}

export function countPolicies(catalog: BaselineCatalog): number {
  return Object.values(catalog).reduce((total, policies) => total + policies.length, 0);
}
