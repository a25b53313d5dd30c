/**
 * Editing commands
 *
 * Each command loads the document, applies one builder operation and writes
 * the result back only if the whole document still validates.
 *
 * Usage:
 *   gwscfg products config.yaml GMAIL DRIVE
 *   gwscfg omit config.yaml GWS.GMAIL.1.1v0.6 -r "Handled by gateway" -e 2026-12-31
 *   gwscfg annotate config.yaml GWS.DRIVE.1.2v0.6 -c "Known gap" --incorrect
 *   gwscfg break-glass config.yaml admin@example.org
 */

import pc from 'picocolors';
import { isAuthMode, type AuthSettings } from '../document/model.js';
import { AUTH_MODE_LIST } from '../document/serialize.js';
import { BuilderError, ErrorCodes } from '../lib/errors.js';
import { editDocument, type CommonOptions } from './context.js';

export async function productsCommand(file: string, names: string[], options: CommonOptions): Promise<void> {
  await editDocument(file, options, (builder) => builder.selectBaselines(names));
  console.log(pc.green(`✓ Products set in ${file}`));
}

export interface OmitOptions extends CommonOptions {
  rationale: string;
  expires?: string;
}

export async function omitCommand(file: string, policyId: string, options: OmitOptions): Promise<void> {
  await editDocument(file, options, (builder) => builder.addOmission(policyId, options.rationale, options.expires));
  console.log(pc.green(`✓ Omitted ${policyId}`));
}

export async function unomitCommand(file: string, policyId: string, options: CommonOptions): Promise<void> {
  await editDocument(file, options, (builder) => builder.removeOmission(policyId));
  console.log(pc.green(`✓ ${policyId} is no longer omitted`));
}

export interface AnnotateOptions extends CommonOptions {
  comment: string;
  incorrect?: boolean;
  remediation?: string;
}

export async function annotateCommand(file: string, policyId: string, options: AnnotateOptions): Promise<void> {
  await editDocument(file, options, (builder) =>
    builder.addAnnotation(policyId, options.comment, {
      incorrect: options.incorrect ?? false,
      ...(options.remediation ? { remediationDate: options.remediation } : {}),
    })
  );
  console.log(pc.green(`✓ Annotated ${policyId}`));
}

export async function unannotateCommand(file: string, policyId: string, options: CommonOptions): Promise<void> {
  await editDocument(file, options, (builder) => builder.removeAnnotation(policyId));
  console.log(pc.green(`✓ Removed annotation for ${policyId}`));
}

export interface BreakGlassOptions extends CommonOptions {
  remove?: boolean;
}

export async function breakGlassCommand(file: string, email: string, options: BreakGlassOptions): Promise<void> {
  await editDocument(file, options, (builder) =>
    options.remove ? builder.removeBreakGlass(email) : builder.addBreakGlass(email)
  );
  console.log(pc.green(options.remove ? `✓ Removed break-glass account ${email}` : `✓ Added break-glass account ${email}`));
}

export interface OutputOptions extends CommonOptions {
  dir?: string;
  formats?: string[];
  quiet?: boolean;
  darkMode?: boolean;
}

export async function outputCommand(file: string, options: OutputOptions): Promise<void> {
  await editDocument(file, options, (builder) =>
    builder.setOutput({
      ...(options.dir !== undefined ? { directory: options.dir } : {}),
      ...(options.formats !== undefined ? { formats: options.formats } : {}),
      ...(options.quiet !== undefined ? { quiet: options.quiet } : {}),
      ...(options.darkMode !== undefined ? { darkMode: options.darkMode } : {}),
    })
  );
  console.log(pc.green(`✓ Output settings updated in ${file}`));
}

export interface AuthOptions extends CommonOptions {
  mode: string;
  credentials?: string;
  customerId?: string;
  subjectEmail?: string;
}

export function authFromOptions(options: AuthOptions): AuthSettings {
  const mode = options.mode;
  if (!isAuthMode(mode)) {
    throw new BuilderError(
      ErrorCodes.CLI_INVALID_ARGUMENT,
      `Unknown auth mode "${mode}". Allowed modes: ${AUTH_MODE_LIST}`
    );
  }

  switch (mode) {
    case 'service-account':
      return {
        mode,
        credentials: options.credentials ?? '',
        customerId: options.customerId ?? '',
        subjectEmail: options.subjectEmail ?? '',
      };
    case 'oauth':
      return options.credentials ? { mode, credentials: options.credentials } : { mode };
    case 'application-default':
      return { mode };
  }
}

export async function authCommand(file: string, options: AuthOptions): Promise<void> {
  const auth = authFromOptions(options);
  await editDocument(file, options, (builder) => builder.setAuth(auth));
  console.log(pc.green(`✓ Authentication set to ${auth.mode}`));
}
