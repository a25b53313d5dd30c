/**
 * Assessment engine configuration
 *
 * The assessment engine reads a flat key set (orgname, baselines, omitpolicy,
 * ...). This module renders a document into that shape and imports it back
 * so existing engine configs can be edited with the builder.
 *
 * Empty values are dropped, the default output path is left out and darkmode
 * is written as the string 'true' only when enabled.
 */

import { z } from 'zod';
import { stringify as stringifyYaml, parse as parseYaml } from 'yaml';
import { ParseError } from '../lib/errors.js';
import {
  createDefaultOutput,
  sortedUnique,
  type AnnotationEntry,
  type AuthSettings,
  type ConfigurationDocument,
  type OmissionEntry,
} from './model.js';
import { normalizeAccounts, normalizeDocument, type DocumentFormat } from './serialize.js';

export interface EngineOmission {
  rationale: string;
  expiration?: string;
}

export interface EngineAnnotation {
  incorrectresult: boolean;
  comment: string;
  remediationdate?: string;
}

export interface EngineConfig {
  orgname?: string;
  orgunitname?: string;
  description?: string;
  baselines?: string[];
  credentials?: string;
  customerid?: string;
  subjectemail?: string;
  outputpath?: string;
  darkmode?: 'true';
  quiet?: true;
  omitpolicy?: Record<string, EngineOmission>;
  annotatepolicy?: Record<string, EngineAnnotation>;
  breakglassaccounts?: string[];
}

const DEFAULT_OUTPUT_PATHS = ['./', '.'];

function credentialsOf(auth: AuthSettings): { credentials?: string; customerid?: string; subjectemail?: string } {
  switch (auth.mode) {
    case 'service-account':
      return {
        ...(auth.credentials ? { credentials: auth.credentials } : {}),
        ...(auth.customerId ? { customerid: auth.customerId } : {}),
        ...(auth.subjectEmail ? { subjectemail: auth.subjectEmail } : {}),
      };
    case 'oauth':
      return auth.credentials ? { credentials: auth.credentials } : {};
    case 'application-default':
      return {};
  }
}

/**
 * Flatten a document into engine keys.
 */
export function toEngineConfig(document: ConfigurationDocument): EngineConfig {
  const config: EngineConfig = {};
  const { organization, output } = document;

  if (organization.name) config.orgname = organization.name;
  if (organization.unit) config.orgunitname = organization.unit;
  if (organization.description) config.description = organization.description;

  if (document.products.length > 0) {
    config.baselines = sortedUnique(document.products).map((product) => product.toLowerCase());
  }

  Object.assign(config, credentialsOf(document.auth));

  if (output.directory && !DEFAULT_OUTPUT_PATHS.includes(output.directory)) {
    config.outputpath = output.directory;
  }
  if (output.darkMode) config.darkmode = 'true';
  if (output.quiet) config.quiet = true;

  const omissionIds = Object.keys(document.omissions).sort();
  if (omissionIds.length > 0) {
    config.omitpolicy = {};
    for (const policyId of omissionIds) {
      const entry = document.omissions[policyId];
      if (!entry) continue;
      config.omitpolicy[policyId] = {
        rationale: entry.rationale,
        ...(entry.expiration ? { expiration: entry.expiration } : {}),
      };
    }
  }

  const annotationIds = Object.keys(document.annotations).sort();
  if (annotationIds.length > 0) {
    config.annotatepolicy = {};
    for (const policyId of annotationIds) {
      const entry = document.annotations[policyId];
      if (!entry) continue;
      config.annotatepolicy[policyId] = {
        incorrectresult: entry.incorrect,
        comment: entry.comment,
        ...(entry.remediationDate ? { remediationdate: entry.remediationDate } : {}),
      };
    }
  }

  if (document.breakGlassAccounts.length > 0) {
    config.breakglassaccounts = normalizeAccounts(document.breakGlassAccounts);
  }

  return config;
}

export function renderEngineConfig(document: ConfigurationDocument, format: DocumentFormat = 'yaml'): string {
  const config = toEngineConfig(document);
  if (format === 'json') {
    return JSON.stringify(config, null, 2) + '\n';
  }
  return stringifyYaml(config);
}

// ============================================================================
// Import
// ============================================================================

/** One string or a list of strings */
const StringOrList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (typeof value === 'string' ? [value] : value));

const EngineConfigSchema = z.object({
  orgname: z.string().optional(),
  orgunitname: z.string().optional(),
  description: z.string().optional(),
  baselines: StringOrList.optional(),
  credentials: z.string().optional(),
  customerid: z.string().optional(),
  subjectemail: z.string().optional(),
  outputpath: z.string().optional(),
  darkmode: z.union([z.boolean(), z.string().transform((value) => value.toLowerCase() === 'true')]).optional(),
  quiet: z.boolean().optional(),
  omitpolicy: z
    .record(
      z.string(),
      z.object({
        rationale: z.string().default(''),
        expiration: z.string().optional(),
      })
    )
    .optional(),
  annotatepolicy: z
    .record(
      z.string(),
      z.object({
        incorrectresult: z.boolean().default(false),
        comment: z.string().default(''),
        remediationdate: z.string().optional(),
      })
    )
    .optional(),
  breakglassaccounts: StringOrList.optional(),
});

/**
 * Read an engine config (YAML or JSON) into a document. Subject email or
 * customer id select service-account auth; a lone credentials file is OAuth.
 */
export function importEngineConfig(text: string): ConfigurationDocument {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ParseError(`Engine config is not valid YAML: ${cause.message}`, { cause });
  }

  if (raw === null || raw === undefined) {
    throw new ParseError('Engine config is empty');
  }

  const parsed = EngineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ParseError('Engine config does not match the expected keys', { issues });
  }

  const config = parsed.data;

  const omissions = Object.fromEntries(
    Object.entries(config.omitpolicy ?? {}).map(([policyId, entry]): [string, OmissionEntry] => [
      policyId,
      {
        policyId,
        rationale: entry.rationale,
        ...(entry.expiration ? { expiration: entry.expiration } : {}),
      },
    ])
  );

  const annotations = Object.fromEntries(
    Object.entries(config.annotatepolicy ?? {}).map(([policyId, entry]): [string, AnnotationEntry] => [
      policyId,
      {
        policyId,
        comment: entry.comment,
        incorrect: entry.incorrectresult,
        ...(entry.remediationdate ? { remediationDate: entry.remediationdate } : {}),
      },
    ])
  );

  let auth: AuthSettings;
  if (config.subjectemail || config.customerid) {
    auth = {
      mode: 'service-account',
      credentials: config.credentials ?? '',
      customerId: config.customerid ?? '',
      subjectEmail: config.subjectemail ?? '',
    };
  } else if (config.credentials) {
    auth = { mode: 'oauth', credentials: config.credentials };
  } else {
    auth = { mode: 'oauth' };
  }

  const output = createDefaultOutput();
  if (config.outputpath) output.directory = config.outputpath;
  output.darkMode = config.darkmode ?? false;
  output.quiet = config.quiet ?? false;

  return normalizeDocument({
    organization: {
      name: config.orgname ?? '',
      ...(config.orgunitname ? { unit: config.orgunitname } : {}),
      ...(config.description ? { description: config.description } : {}),
    },
    products: sortedUnique((config.baselines ?? []).map((baseline) => baseline.trim().toUpperCase())),
    omissions,
    annotations,
    breakGlassAccounts: config.breakglassaccounts ?? [],
    output,
    auth,
  });
}
