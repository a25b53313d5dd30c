/**
 * Configuration document model
 *
 * The root aggregate the builder edits and serializes. A document owns all of
 * its entries; the policy catalog is shared reference data and is never
 * stored here.
 */

export const REPORT_FORMATS = ['html', 'json', 'csv'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export const AUTH_MODES = ['service-account', 'oauth', 'application-default'] as const;
export type AuthMode = (typeof AUTH_MODES)[number];

export function isReportFormat(value: string): value is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(value);
}

export function isAuthMode(value: string): value is AuthMode {
  return (AUTH_MODES as readonly string[]).includes(value);
}

export interface OrganizationInfo {
  name: string;
  unit?: string;
  description?: string;
}

/**
 * A documented decision to exclude a policy from assessment.
 */
export interface OmissionEntry {
  policyId: string;
  rationale: string;
  /** YYYY-MM-DD */
  expiration?: string;
}

/**
 * A comment or correction attached to a policy result.
 */
export interface AnnotationEntry {
  policyId: string;
  comment: string;
  /** The assessment result for this policy is known to be wrong */
  incorrect: boolean;
  /** YYYY-MM-DD */
  remediationDate?: string;
}

export interface OutputSettings {
  directory: string;
  formats: ReportFormat[];
  quiet: boolean;
  darkMode: boolean;
}

export interface ServiceAccountAuth {
  mode: 'service-account';
  /** Path to the service account key (.json) */
  credentials: string;
  customerId: string;
  /** Admin user the service account impersonates */
  subjectEmail: string;
}

export interface OAuthAuth {
  mode: 'oauth';
  /** Path to the OAuth client credentials (.json) */
  credentials?: string;
}

export interface ApplicationDefaultAuth {
  mode: 'application-default';
}

export type AuthSettings = ServiceAccountAuth | OAuthAuth | ApplicationDefaultAuth;

export interface ConfigurationDocument {
  organization: OrganizationInfo;
  /** Selected baseline names, sorted and unique */
  products: string[];
  /** Keyed by policy id */
  omissions: Record<string, OmissionEntry>;
  /** Keyed by policy id */
  annotations: Record<string, AnnotationEntry>;
  /** Lower-cased, sorted and unique */
  breakGlassAccounts: string[];
  output: OutputSettings;
  auth: AuthSettings;
}

export const DEFAULT_OUTPUT_DIRECTORY = './';

export const DEFAULT_REPORT_FORMATS: readonly ReportFormat[] = ['html', 'json'];

export function createDefaultOutput(): OutputSettings {
  return {
    directory: DEFAULT_OUTPUT_DIRECTORY,
    formats: [...DEFAULT_REPORT_FORMATS],
    quiet: false,
    darkMode: false,
  };
}

export function createEmptyDocument(): ConfigurationDocument {
  return {
    organization: { name: '' },
    products: [],
    omissions: {},
    annotations: {},
    breakGlassAccounts: [],
    output: createDefaultOutput(),
    auth: { mode: 'oauth' },
  };
}

/**
 * Deep copy, so callers never hold a reference into a builder's document.
 */
export function cloneDocument(document: ConfigurationDocument): ConfigurationDocument {
  return structuredClone(document);
}

/**
 * Sort and de-duplicate names.
 */
export function sortedUnique(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort();
}
