/**
 * Configuration builder session
 *
 * Owns one document and a reference to the policy catalog. Mutations check
 * their own inputs and either apply completely or throw ValidationError with
 * the document untouched. Cross-entity rules (unresolved policy ids, missing
 * products) are left to validate().
 *
 * State: empty -> editing -> valid -> exported. Any change enters editing;
 * failed and no-op calls leave the state alone.
 */

import { isDeepStrictEqual } from 'node:util';
import type { BaselineCatalog } from '@gws-config/extractor';
import { ValidationError, type Violation } from '../lib/errors.js';
import {
  cloneDocument,
  createEmptyDocument,
  isReportFormat,
  sortedUnique,
  type AuthSettings,
  type ConfigurationDocument,
  type OutputSettings,
} from './model.js';
import {
  deserializeDocument,
  normalizeDocument,
  normalizeFormats,
  serializeDocument,
  type DocumentFormat,
  type SerializeOptions,
} from './serialize.js';
import { renderEngineConfig } from './engine.js';
import {
  ViolationCodes,
  checkEmail,
  checkOptionalDate,
  checkOutput,
  checkPolicyId,
  checkProducts,
  checkRequiredText,
  unknownProduct,
  validateDocument,
} from './validation.js';

export type BuilderState = 'empty' | 'editing' | 'valid' | 'exported';

export interface AnnotationOptions {
  incorrect?: boolean;
  remediationDate?: string;
}

export interface OutputUpdate {
  directory?: string;
  formats?: readonly string[];
  quiet?: boolean;
  darkMode?: boolean;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function fail(violations: Violation[]): void {
  if (violations.length > 0) {
    throw new ValidationError(violations);
  }
}

export class ConfigurationBuilder {
  private current: ConfigurationDocument;
  private currentState: BuilderState;

  constructor(
    private readonly catalog: BaselineCatalog,
    document?: ConfigurationDocument
  ) {
    this.current = document ? normalizeDocument(document) : createEmptyDocument();
    this.currentState = document ? 'editing' : 'empty';
  }

  get state(): BuilderState {
    return this.currentState;
  }

  /** A copy; editing it does not affect the session */
  get document(): ConfigurationDocument {
    return cloneDocument(this.current);
  }

  setOrganization(name: string, unit?: string, description?: string): void {
    const trimmed = name.trim();
    fail(
      checkRequiredText(trimmed, ViolationCodes.ORGANIZATION_REQUIRED, 'organization.name', 'organization name is required')
    );

    const organizationUnit = emptyToUndefined(unit);
    const organizationDescription = emptyToUndefined(description);

    this.commit((document) => {
      document.organization = {
        name: trimmed,
        ...(organizationUnit ? { unit: organizationUnit } : {}),
        ...(organizationDescription ? { description: organizationDescription } : {}),
      };
    });
  }

  /**
   * Replace the product selection. Names match catalog keys without regard
   * to case and are stored as the catalog spells them.
   */
  selectBaselines(names: readonly string[]): void {
    const byUpperCase = new Map(Object.keys(this.catalog).map((key) => [key.toUpperCase(), key]));
    const resolved: string[] = [];
    const unknown: string[] = [];

    for (const name of names) {
      const key = byUpperCase.get(name.trim().toUpperCase());
      if (key) {
        resolved.push(key);
      } else {
        unknown.push(name);
      }
    }

    fail(names.length === 0 ? checkProducts(names, this.catalog) : unknown.map(unknownProduct));

    this.commit((document) => {
      document.products = sortedUnique(resolved);
    });
  }

  addOmission(policyId: string, rationale: string, expiration?: string): void {
    const id = policyId.trim();
    const path = `omitPolicies.${id}`;
    const expirationDate = emptyToUndefined(expiration);

    fail([
      ...checkPolicyId(id, path),
      ...checkRequiredText(rationale, ViolationCodes.RATIONALE_REQUIRED, path, `omitted policy ${id} needs a rationale`),
      ...checkOptionalDate(expirationDate, `${path}.expiration`),
    ]);

    this.commit((document) => {
      document.omissions[id] = {
        policyId: id,
        rationale: rationale.trim(),
        ...(expirationDate ? { expiration: expirationDate } : {}),
      };
    });
  }

  removeOmission(policyId: string): void {
    this.commit((document) => {
      delete document.omissions[policyId.trim()];
    });
  }

  addAnnotation(policyId: string, comment: string, options: AnnotationOptions = {}): void {
    const id = policyId.trim();
    const path = `annotatePolicies.${id}`;
    const remediationDate = emptyToUndefined(options.remediationDate);

    fail([
      ...checkPolicyId(id, path),
      ...checkRequiredText(comment, ViolationCodes.COMMENT_REQUIRED, path, `annotated policy ${id} needs a comment`),
      ...checkOptionalDate(remediationDate, `${path}.remediationDate`),
    ]);

    this.commit((document) => {
      document.annotations[id] = {
        policyId: id,
        comment: comment.trim(),
        incorrect: options.incorrect ?? false,
        ...(remediationDate ? { remediationDate } : {}),
      };
    });
  }

  removeAnnotation(policyId: string): void {
    this.commit((document) => {
      delete document.annotations[policyId.trim()];
    });
  }

  addBreakGlass(email: string): void {
    const account = email.trim().toLowerCase();
    fail(checkEmail(account, 'breakGlassAccounts'));

    if (this.current.breakGlassAccounts.includes(account)) {
      fail([
        {
          code: ViolationCodes.DUPLICATE_ACCOUNT,
          path: 'breakGlassAccounts',
          message: `break-glass account ${account} is listed twice`,
        },
      ]);
    }

    this.commit((document) => {
      document.breakGlassAccounts = sortedUnique([...document.breakGlassAccounts, account]);
    });
  }

  removeBreakGlass(email: string): void {
    const account = email.trim().toLowerCase();
    this.commit((document) => {
      document.breakGlassAccounts = document.breakGlassAccounts.filter((existing) => existing !== account);
    });
  }

  setOutput(update: OutputUpdate): void {
    const unknown = (update.formats ?? []).filter((format) => !isReportFormat(format));
    fail(
      unknown.map((format) => ({
        code: ViolationCodes.UNKNOWN_REPORT_FORMAT,
        path: 'output.formats',
        message: `unknown report format "${format}"`,
      }))
    );

    const next: OutputSettings = {
      ...this.current.output,
      ...(update.directory !== undefined ? { directory: update.directory.trim() } : {}),
      ...(update.formats !== undefined ? { formats: normalizeFormats(update.formats.filter(isReportFormat)) } : {}),
      ...(update.quiet !== undefined ? { quiet: update.quiet } : {}),
      ...(update.darkMode !== undefined ? { darkMode: update.darkMode } : {}),
    };
    fail(checkOutput(next));

    this.commit((document) => {
      document.output = next;
    });
  }

  /**
   * Replace authentication settings. Mode-specific completeness is a
   * validate() concern; a half-filled service account is allowed while editing.
   */
  setAuth(auth: AuthSettings): void {
    const next = structuredClone(auth);
    this.commit((document) => {
      document.auth = next;
    });
  }

  /**
   * Every violation in the document. Empty means valid; an editing session
   * then moves to valid.
   */
  validate(): Violation[] {
    const violations = validateDocument(this.current, this.catalog);
    if (violations.length === 0 && this.currentState === 'editing') {
      this.currentState = 'valid';
    }
    return violations;
  }

  serialize(options: SerializeOptions = {}): string {
    return this.renderValidated(() => serializeDocument(this.current, options));
  }

  exportForEngine(format: DocumentFormat = 'yaml'): string {
    return this.renderValidated(() => renderEngineConfig(this.current, format));
  }

  /**
   * Replace the document with a persisted one. On ParseError nothing changes.
   */
  load(text: string): void {
    const document = deserializeDocument(text);
    this.current = document;
    this.currentState = 'editing';
  }

  /**
   * Validate (editing moves to valid), render, then move to exported.
   */
  private renderValidated(render: () => string): string {
    fail(this.validate());
    const text = render();
    this.currentState = 'exported';
    return text;
  }

  /**
   * Apply a change to a copy and swap it in. Identical results are no-ops.
   */
  private commit(change: (document: ConfigurationDocument) => void): void {
    const next = cloneDocument(this.current);
    change(next);
    if (isDeepStrictEqual(next, this.current)) {
      return;
    }
    this.current = next;
    this.currentState = 'editing';
  }
}
