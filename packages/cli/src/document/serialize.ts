/**
 * Document persistence
 *
 * Writes the persisted YAML/JSON form with a fixed key order and sorted
 * lists, and reads it back through a zod schema. Absent fields take their
 * defaults; structurally wrong input raises ParseError and nothing is
 * returned.
 */

import { z } from 'zod';
import { Document, parse as parseYaml } from 'yaml';
import { ParseError } from '../lib/errors.js';
import {
  AUTH_MODES,
  DEFAULT_OUTPUT_DIRECTORY,
  DEFAULT_REPORT_FORMATS,
  REPORT_FORMATS,
  sortedUnique,
  type AnnotationEntry,
  type AuthSettings,
  type ConfigurationDocument,
  type OmissionEntry,
  type ReportFormat,
} from './model.js';

export type DocumentFormat = 'yaml' | 'json';

export interface SerializeOptions {
  format?: DocumentFormat;
  /** YAML only: emit a fixed header comment */
  includeComments?: boolean;
}

export const DOCUMENT_HEADER_COMMENT = [
  ' Google Workspace baseline assessment configuration',
  ' Edit with gwscfg; validate with: gwscfg validate <file>',
].join('\n');

// ============================================================================
// Persisted shape
// ============================================================================

export interface PersistedOmission {
  policy_id: string;
  rationale: string;
  expiration?: string;
}

export interface PersistedAnnotation {
  policy_id: string;
  comment: string;
  incorrect: boolean;
  remediationDate?: string;
}

export interface PersistedDocument {
  organization: { name: string; unit?: string; description?: string };
  products: string[];
  omitPolicies: PersistedOmission[];
  annotatePolicies: PersistedAnnotation[];
  breakGlassAccounts: string[];
  output: { directory: string; formats: ReportFormat[]; quiet: boolean; darkMode: boolean };
  auth: AuthSettings;
}

/** Canonical order, no duplicates */
export function normalizeFormats(formats: readonly ReportFormat[]): ReportFormat[] {
  return REPORT_FORMATS.filter((format) => formats.includes(format));
}

export function normalizeAccounts(accounts: readonly string[]): string[] {
  return sortedUnique(accounts.map((account) => account.trim().toLowerCase()));
}

function persistAuth(auth: AuthSettings): AuthSettings {
  switch (auth.mode) {
    case 'service-account':
      return {
        mode: auth.mode,
        credentials: auth.credentials,
        customerId: auth.customerId,
        subjectEmail: auth.subjectEmail,
      };
    case 'oauth':
      return auth.credentials !== undefined ? { mode: auth.mode, credentials: auth.credentials } : { mode: auth.mode };
    case 'application-default':
      return { mode: auth.mode };
  }
}

/**
 * The canonical form of a document: the one serializing and reading back
 * produces. Entry maps are rebuilt as own properties, so ids such as
 * "__proto__" stay ordinary keys.
 */
export function normalizeDocument(document: ConfigurationDocument): ConfigurationDocument {
  const { organization, output } = document;

  return {
    organization: {
      name: organization.name,
      ...(organization.unit ? { unit: organization.unit } : {}),
      ...(organization.description ? { description: organization.description } : {}),
    },
    products: sortedUnique(document.products),
    omissions: Object.fromEntries(
      Object.entries(document.omissions).map(([policyId, entry]) => [policyId, structuredClone(entry)])
    ),
    annotations: Object.fromEntries(
      Object.entries(document.annotations).map(([policyId, entry]) => [policyId, structuredClone(entry)])
    ),
    breakGlassAccounts: normalizeAccounts(document.breakGlassAccounts),
    output: {
      directory: output.directory,
      formats: normalizeFormats(output.formats),
      quiet: output.quiet,
      darkMode: output.darkMode,
    },
    auth: persistAuth(document.auth),
  };
}

export function toPersistedDocument(document: ConfigurationDocument): PersistedDocument {
  const { organization, output } = document;

  return {
    organization: {
      name: organization.name,
      ...(organization.unit ? { unit: organization.unit } : {}),
      ...(organization.description ? { description: organization.description } : {}),
    },
    products: sortedUnique(document.products),
    omitPolicies: Object.keys(document.omissions)
      .sort()
      .flatMap((policyId) => {
        const entry = document.omissions[policyId];
        if (!entry) return [];
        return [
          {
            policy_id: policyId,
            rationale: entry.rationale,
            ...(entry.expiration ? { expiration: entry.expiration } : {}),
          },
        ];
      }),
    annotatePolicies: Object.keys(document.annotations)
      .sort()
      .flatMap((policyId) => {
        const entry = document.annotations[policyId];
        if (!entry) return [];
        return [
          {
            policy_id: policyId,
            comment: entry.comment,
            incorrect: entry.incorrect,
            ...(entry.remediationDate ? { remediationDate: entry.remediationDate } : {}),
          },
        ];
      }),
    breakGlassAccounts: normalizeAccounts(document.breakGlassAccounts),
    output: {
      directory: output.directory,
      formats: normalizeFormats(output.formats),
      quiet: output.quiet,
      darkMode: output.darkMode,
    },
    auth: persistAuth(document.auth),
  };
}

/**
 * Render a document. Callers are expected to have validated it; the builder
 * refuses to get here with an invalid one.
 */
export function serializeDocument(document: ConfigurationDocument, options: SerializeOptions = {}): string {
  const persisted = toPersistedDocument(document);

  if (options.format === 'json') {
    return JSON.stringify(persisted, null, 2) + '\n';
  }

  const yamlDocument = new Document(persisted);
  if (options.includeComments) {
    yamlDocument.commentBefore = DOCUMENT_HEADER_COMMENT;
  }
  return yamlDocument.toString();
}

// ============================================================================
// Reading
// ============================================================================

/** YAML writes an empty value as null; treat it like an absent key */
function absent<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === null ? undefined : value), schema);
}

const optionalText = absent(z.string().optional());

const OmissionSchema = z.object({
  policy_id: z.string(),
  rationale: absent(z.string().default('')),
  expiration: optionalText,
});

const AnnotationSchema = z.object({
  policy_id: z.string(),
  comment: absent(z.string().default('')),
  incorrect: absent(z.boolean().default(false)),
  remediationDate: optionalText,
});

const AuthSchema = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal('service-account'),
    credentials: absent(z.string().default('')),
    customerId: absent(z.string().default('')),
    subjectEmail: absent(z.string().default('')),
  }),
  z.object({
    mode: z.literal('oauth'),
    credentials: optionalText,
  }),
  z.object({
    mode: z.literal('application-default'),
  }),
]);

const PersistedDocumentSchema = z.object({
  organization: absent(
    z
      .object({
        name: absent(z.string().default('')),
        unit: optionalText,
        description: optionalText,
      })
      .default({})
  ),
  products: absent(z.array(z.string()).default([])),
  omitPolicies: absent(z.array(OmissionSchema).default([])),
  annotatePolicies: absent(z.array(AnnotationSchema).default([])),
  breakGlassAccounts: absent(z.array(z.string()).default([])),
  output: absent(
    z
      .object({
        directory: absent(z.string().default(DEFAULT_OUTPUT_DIRECTORY)),
        formats: absent(z.array(z.enum(REPORT_FORMATS)).default([...DEFAULT_REPORT_FORMATS])),
        quiet: absent(z.boolean().default(false)),
        darkMode: absent(z.boolean().default(false)),
      })
      .default({})
  ),
  auth: absent(AuthSchema.default({ mode: 'oauth' })),
});

function parseText(text: string): unknown {
  const trimmed = text.trimStart();
  try {
    return trimmed.startsWith('{') ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ParseError(`Document is not valid ${trimmed.startsWith('{') ? 'JSON' : 'YAML'}: ${cause.message}`, {
      cause,
    });
  }
}

/**
 * Read a persisted document. Either the whole document is returned or
 * ParseError is thrown.
 */
export function deserializeDocument(text: string): ConfigurationDocument {
  const raw = parseText(text);

  if (raw === null || raw === undefined) {
    throw new ParseError('Document is empty');
  }

  const parsed = PersistedDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ParseError('Document does not match the configuration format', { issues });
  }

  const data = parsed.data;

  const omissions = new Map<string, OmissionEntry>();
  for (const entry of data.omitPolicies) {
    if (omissions.has(entry.policy_id)) {
      throw new ParseError(`Duplicate policy_id "${entry.policy_id}" in omitPolicies`);
    }
    omissions.set(entry.policy_id, {
      policyId: entry.policy_id,
      rationale: entry.rationale,
      ...(entry.expiration !== undefined ? { expiration: entry.expiration } : {}),
    });
  }

  const annotations = new Map<string, AnnotationEntry>();
  for (const entry of data.annotatePolicies) {
    if (annotations.has(entry.policy_id)) {
      throw new ParseError(`Duplicate policy_id "${entry.policy_id}" in annotatePolicies`);
    }
    annotations.set(entry.policy_id, {
      policyId: entry.policy_id,
      comment: entry.comment,
      incorrect: entry.incorrect,
      ...(entry.remediationDate !== undefined ? { remediationDate: entry.remediationDate } : {}),
    });
  }

  return normalizeDocument({
    organization: data.organization,
    products: data.products,
    omissions: Object.fromEntries(omissions),
    annotations: Object.fromEntries(annotations),
    breakGlassAccounts: data.breakGlassAccounts,
    output: data.output,
    auth: data.auth,
  });
}

/** Known auth modes, for help text */
export const AUTH_MODE_LIST = AUTH_MODES.join(', ');
