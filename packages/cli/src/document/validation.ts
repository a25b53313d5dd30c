/**
 * Document validation
 *
 * Field-level checks used at entry time, and the full cross-entity pass that
 * decides whether a document may be serialized. The full pass collects every
 * violation; it throws only when the document's structure itself is broken.
 */

import { z } from 'zod';
import { isPolicyId, type BaselineCatalog } from '@gws-config/extractor';
import type { Violation } from '../lib/errors.js';
import type { AuthSettings, ConfigurationDocument, OutputSettings } from './model.js';
import { isReportFormat } from './model.js';

export const ViolationCodes = {
  ORGANIZATION_REQUIRED: 'ORGANIZATION_REQUIRED',
  PRODUCTS_REQUIRED: 'PRODUCTS_REQUIRED',
  UNKNOWN_PRODUCT: 'UNKNOWN_PRODUCT',
  INVALID_POLICY_ID: 'INVALID_POLICY_ID',
  UNRESOLVED_POLICY: 'UNRESOLVED_POLICY',
  RATIONALE_REQUIRED: 'RATIONALE_REQUIRED',
  COMMENT_REQUIRED: 'COMMENT_REQUIRED',
  INVALID_DATE: 'INVALID_DATE',
  INVALID_EMAIL: 'INVALID_EMAIL',
  DUPLICATE_ACCOUNT: 'DUPLICATE_ACCOUNT',
  OUTPUT_DIRECTORY_REQUIRED: 'OUTPUT_DIRECTORY_REQUIRED',
  REPORT_FORMAT_REQUIRED: 'REPORT_FORMAT_REQUIRED',
  UNKNOWN_REPORT_FORMAT: 'UNKNOWN_REPORT_FORMAT',
  AUTH_INCOMPLETE: 'AUTH_INCOMPLETE',
  INVALID_CREDENTIALS_PATH: 'INVALID_CREDENTIALS_PATH',
} as const;

export type ViolationCode = (typeof ViolationCodes)[keyof typeof ViolationCodes];

export const PRODUCTS_REQUIRED_MESSAGE = 'at least one product required';

const EmailSchema = z.string().email();
const IsoDateSchema = z.string().date();

export function isEmail(value: string): boolean {
  return EmailSchema.safeParse(value).success;
}

/**
 * Real calendar date in YYYY-MM-DD form.
 */
export function isIsoDate(value: string): boolean {
  return IsoDateSchema.safeParse(value).success;
}

export function isJsonFilePath(value: string): boolean {
  return /\.json$/i.test(value.trim());
}

function violation(code: ViolationCode, path: string, message: string): Violation {
  return { code, path, message };
}

// ============================================================================
// Entry-time checks (shared by the builder and the full pass)
// ============================================================================

export function checkPolicyId(policyId: string, path: string): Violation[] {
  if (isPolicyId(policyId)) return [];
  return [violation(ViolationCodes.INVALID_POLICY_ID, path, `"${policyId}" is not a valid policy id`)];
}

export function checkOptionalDate(value: string | undefined, path: string): Violation[] {
  if (value === undefined || isIsoDate(value)) return [];
  return [violation(ViolationCodes.INVALID_DATE, path, `"${value}" is not a valid YYYY-MM-DD date`)];
}

export function checkRequiredText(
  value: string,
  code: ViolationCode,
  path: string,
  message: string
): Violation[] {
  return value.trim() === '' ? [violation(code, path, message)] : [];
}

export function checkEmail(value: string, path: string): Violation[] {
  if (isEmail(value)) return [];
  return [violation(ViolationCodes.INVALID_EMAIL, path, `"${value}" is not a valid email address`)];
}

export function unknownProduct(name: string): Violation {
  return violation(ViolationCodes.UNKNOWN_PRODUCT, 'products', `unknown product "${name}"`);
}

/** Catalog keys only; inherited object properties are not products */
export function isCatalogProduct(name: string, catalog: BaselineCatalog): boolean {
  return Object.hasOwn(catalog, name);
}

export function checkProducts(names: readonly string[], catalog: BaselineCatalog): Violation[] {
  if (names.length === 0) {
    return [violation(ViolationCodes.PRODUCTS_REQUIRED, 'products', PRODUCTS_REQUIRED_MESSAGE)];
  }
  return names.filter((name) => !isCatalogProduct(name, catalog)).map(unknownProduct);
}

export function checkOutput(output: OutputSettings): Violation[] {
  const violations: Violation[] = [];

  if (output.directory.trim() === '') {
    violations.push(
      violation(ViolationCodes.OUTPUT_DIRECTORY_REQUIRED, 'output.directory', 'output directory is required')
    );
  }
  if (output.formats.length === 0) {
    violations.push(
      violation(ViolationCodes.REPORT_FORMAT_REQUIRED, 'output.formats', 'at least one report format required')
    );
  }
  for (const format of output.formats) {
    if (!isReportFormat(format)) {
      violations.push(
        violation(ViolationCodes.UNKNOWN_REPORT_FORMAT, 'output.formats', `unknown report format "${format}"`)
      );
    }
  }

  return violations;
}

export function checkAuth(auth: AuthSettings): Violation[] {
  const violations: Violation[] = [];

  switch (auth.mode) {
    case 'service-account': {
      const required = [
        ['credentials', auth.credentials],
        ['customerId', auth.customerId],
        ['subjectEmail', auth.subjectEmail],
      ] as const;
      for (const [field, value] of required) {
        if (value.trim() === '') {
          violations.push(
            violation(
              ViolationCodes.AUTH_INCOMPLETE,
              `auth.${field}`,
              `service-account authentication requires ${field}`
            )
          );
        }
      }
      if (auth.credentials.trim() !== '' && !isJsonFilePath(auth.credentials)) {
        violations.push(
          violation(
            ViolationCodes.INVALID_CREDENTIALS_PATH,
            'auth.credentials',
            'credentials must be a .json key file'
          )
        );
      }
      if (auth.subjectEmail.trim() !== '') {
        violations.push(...checkEmail(auth.subjectEmail, 'auth.subjectEmail'));
      }
      break;
    }
    case 'oauth':
      if (auth.credentials !== undefined && !isJsonFilePath(auth.credentials)) {
        violations.push(
          violation(
            ViolationCodes.INVALID_CREDENTIALS_PATH,
            'auth.credentials',
            'credentials must be a .json client secrets file'
          )
        );
      }
      break;
    case 'application-default':
      break;
  }

  return violations;
}

// ============================================================================
// Full pass
// ============================================================================

/**
 * Guard against documents that were assembled outside the type system
 * (plain JS callers, hand-built objects). These are programming errors, not
 * validation failures.
 */
export function assertDocumentStructure(document: ConfigurationDocument): void {
  const fields = [
    ['organization', document.organization],
    ['products', document.products],
    ['omissions', document.omissions],
    ['annotations', document.annotations],
    ['breakGlassAccounts', document.breakGlassAccounts],
    ['output', document.output],
    ['auth', document.auth],
  ] as const;

  for (const [field, value] of fields) {
    if (value === null || value === undefined) {
      throw new TypeError(`Configuration document field "${field}" must not be ${String(value)}`);
    }
  }
}

/**
 * Policy ids that belong to the selected products.
 */
export function selectedPolicyIds(products: readonly string[], catalog: BaselineCatalog): Set<string> {
  const ids = new Set<string>();
  for (const product of products) {
    if (!isCatalogProduct(product, catalog)) continue;
    for (const policy of catalog[product] ?? []) {
      ids.add(policy.policyId);
    }
  }
  return ids;
}

/**
 * Validate the whole document. Empty result means valid.
 */
export function validateDocument(document: ConfigurationDocument, catalog: BaselineCatalog): Violation[] {
  assertDocumentStructure(document);

  const violations: Violation[] = [];
  const resolvable = selectedPolicyIds(document.products, catalog);

  violations.push(
    ...checkRequiredText(
      document.organization.name,
      ViolationCodes.ORGANIZATION_REQUIRED,
      'organization.name',
      'organization name is required'
    )
  );

  violations.push(...checkProducts(document.products, catalog));

  for (const policyId of Object.keys(document.omissions).sort()) {
    const entry = document.omissions[policyId];
    if (!entry) continue;
    const path = `omitPolicies.${policyId}`;
    const idViolations = checkPolicyId(policyId, path);
    violations.push(...idViolations);
    violations.push(
      ...checkRequiredText(entry.rationale, ViolationCodes.RATIONALE_REQUIRED, path, `omitted policy ${policyId} needs a rationale`)
    );
    violations.push(...checkOptionalDate(entry.expiration, `${path}.expiration`));
    if (idViolations.length === 0 && !resolvable.has(policyId)) {
      violations.push(
        violation(
          ViolationCodes.UNRESOLVED_POLICY,
          path,
          `omitted policy ${policyId} is not in any selected product`
        )
      );
    }
  }

  for (const policyId of Object.keys(document.annotations).sort()) {
    const entry = document.annotations[policyId];
    if (!entry) continue;
    const path = `annotatePolicies.${policyId}`;
    const idViolations = checkPolicyId(policyId, path);
    violations.push(...idViolations);
    violations.push(
      ...checkRequiredText(entry.comment, ViolationCodes.COMMENT_REQUIRED, path, `annotated policy ${policyId} needs a comment`)
    );
    violations.push(...checkOptionalDate(entry.remediationDate, `${path}.remediationDate`));
    if (idViolations.length === 0 && !resolvable.has(policyId)) {
      violations.push(
        violation(
          ViolationCodes.UNRESOLVED_POLICY,
          path,
          `annotated policy ${policyId} is not in any selected product`
        )
      );
    }
  }

  const seenAccounts = new Set<string>();
  for (const account of document.breakGlassAccounts) {
    violations.push(...checkEmail(account, 'breakGlassAccounts'));
    const key = account.toLowerCase();
    if (seenAccounts.has(key)) {
      violations.push(
        violation(ViolationCodes.DUPLICATE_ACCOUNT, 'breakGlassAccounts', `break-glass account ${account} is listed twice`)
      );
    }
    seenAccounts.add(key);
  }

  violations.push(...checkOutput(document.output));
  violations.push(...checkAuth(document.auth));

  return violations;
}
