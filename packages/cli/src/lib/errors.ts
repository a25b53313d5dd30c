/**
 * Deterministic Error Codes for the configuration builder
 *
 * Format: GC_<CATEGORY>_<NUMBER>
 *
 * Categories:
 * - CONFIG: Tool settings errors
 * - CATALOG: Policy catalog errors
 * - DOCUMENT: Configuration document errors
 * - IO: File system errors
 * - CLI: Command line argument errors
 */

export const ErrorCodes = {
  // CONFIG errors (001-099)
  CONFIG_INVALID: 'GC_CONFIG_002',

  // CATALOG errors (100-199)
  CATALOG_NOT_FOUND: 'GC_CATALOG_101',
  CATALOG_INVALID: 'GC_CATALOG_102',
  CATALOG_VERSION_MISMATCH: 'GC_CATALOG_103',

  // DOCUMENT errors (200-299)
  DOCUMENT_INVALID: 'GC_DOCUMENT_201',
  DOCUMENT_PARSE_ERROR: 'GC_DOCUMENT_202',

  // IO errors (300-399)
  IO_READ_ERROR: 'GC_IO_301',
  IO_WRITE_ERROR: 'GC_IO_302',
  IO_PATH_NOT_FOUND: 'GC_IO_304',

  // CLI errors (400-499)
  CLI_INVALID_ARGUMENT: 'GC_CLI_401',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * User-friendly error messages for each error code
 */
export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.CONFIG_INVALID]: 'Settings file is invalid',

  [ErrorCodes.CATALOG_NOT_FOUND]: 'No policy catalog available',
  [ErrorCodes.CATALOG_INVALID]: 'Policy catalog is invalid',
  [ErrorCodes.CATALOG_VERSION_MISMATCH]: 'Policy catalog version not supported',

  [ErrorCodes.DOCUMENT_INVALID]: 'Configuration document is invalid',
  [ErrorCodes.DOCUMENT_PARSE_ERROR]: 'Configuration document could not be parsed',

  [ErrorCodes.IO_READ_ERROR]: 'Failed to read file',
  [ErrorCodes.IO_WRITE_ERROR]: 'Failed to write file',
  [ErrorCodes.IO_PATH_NOT_FOUND]: 'Path not found',

  [ErrorCodes.CLI_INVALID_ARGUMENT]: 'Invalid argument provided',
};

/**
 * Remediation guidance for each error code
 */
export const ErrorRemediation: Record<ErrorCode, string> = {
  [ErrorCodes.CONFIG_INVALID]: `
Check gwscfg.config.yaml for syntax errors and unknown values.

Allowed keys:
- catalog: path to a catalog file written by gwsx extract
- baselines: directory of baseline markdown files
- format: yaml or json
- includeComments: true or false
`.trim(),

  [ErrorCodes.CATALOG_NOT_FOUND]: `
The builder needs the policy catalog to resolve policy ids.

Either extract one:
  gwsx extract -b ./baselines -o catalog.json

and point to it with GWSCFG_CATALOG or "catalog:" in gwscfg.config.yaml,
or set "baselines:" (or GWSCFG_BASELINES) to the baseline markdown directory.
`.trim(),

  [ErrorCodes.CATALOG_INVALID]: `
The catalog file is malformed or was edited by hand.

Re-extract it:
  gwsx extract -b ./baselines -o catalog.json
`.trim(),

  [ErrorCodes.CATALOG_VERSION_MISMATCH]: `
The catalog was written by an incompatible extractor version.

Re-extract it with the extractor that ships with this builder:
  gwsx extract -b ./baselines -o catalog.json
`.trim(),

  [ErrorCodes.DOCUMENT_INVALID]: `
Fix each listed problem, then try again.

Check the current state with:
  gwscfg validate <file>
`.trim(),

  [ErrorCodes.DOCUMENT_PARSE_ERROR]: `
The file is not a valid configuration document.

Common issues:
- YAML indentation or a stray tab
- A list where a mapping is expected (or the reverse)
- An unknown auth mode or report format

Nothing was imported; the existing document is unchanged.
`.trim(),

  [ErrorCodes.IO_READ_ERROR]: `
Failed to read a file. Check that it exists and is readable.
`.trim(),

  [ErrorCodes.IO_WRITE_ERROR]: `
Failed to write a file. Check that the directory exists and is writable.
`.trim(),

  [ErrorCodes.IO_PATH_NOT_FOUND]: `
The specified path doesn't exist. Check the spelling and your working directory.
`.trim(),

  [ErrorCodes.CLI_INVALID_ARGUMENT]: `
Invalid command-line argument.

Run: gwscfg --help
`.trim(),
};

/**
 * One user-correctable problem found while validating a document.
 */
export interface Violation {
  /** Stable machine-readable code, e.g. PRODUCTS_REQUIRED */
  code: string;
  /** Field path, e.g. organization.name or omitPolicies.GWS.GMAIL.1.1v0.6 */
  path: string;
  message: string;
}

/**
 * Structured error with deterministic error code
 */
export class BuilderError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  public override readonly cause?: Error;

  constructor(code: ErrorCode, message?: string, options?: { details?: unknown; cause?: Error }) {
    const baseMessage = message ?? ErrorMessages[code];
    super(baseMessage, { cause: options?.cause });

    this.name = 'BuilderError';
    this.code = code;
    this.details = options?.details;
    this.cause = options?.cause;

    Error.captureStackTrace?.(this, new.target);
  }

  getRemediation(): string {
    return ErrorRemediation[this.code];
  }

  /**
   * Format error for user display
   */
  toUserString(verbose = false): string {
    const parts: string[] = [`[${this.code}] ${this.message}`];

    if (verbose && this.details) {
      parts.push(`\nDetails: ${JSON.stringify(this.details, null, 2)}`);
    }

    if (verbose && this.cause) {
      parts.push(`\nCaused by: ${this.cause.message}`);
      if (this.cause.stack) {
        parts.push(`\n${this.cause.stack}`);
      }
    }

    return parts.join('');
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      remediation: this.getRemediation(),
      details: this.details,
      cause: this.cause
        ? {
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }
}

/**
 * User-correctable input problems. Always carries every violation found,
 * never just the first.
 */
export class ValidationError extends BuilderError {
  public readonly violations: Violation[];

  constructor(violations: Violation[], message?: string) {
    super(ErrorCodes.DOCUMENT_INVALID, message ?? summarizeViolations(violations), {
      details: violations,
    });
    this.name = 'ValidationError';
    this.violations = violations;
  }
}

/**
 * A persisted document that cannot be read back. Import is all-or-nothing.
 */
export class ParseError extends BuilderError {
  public readonly issues: string[];

  constructor(message: string, options?: { issues?: string[]; cause?: Error }) {
    super(ErrorCodes.DOCUMENT_PARSE_ERROR, message, {
      details: options?.issues,
      cause: options?.cause,
    });
    this.name = 'ParseError';
    this.issues = options?.issues ?? [];
  }
}

function summarizeViolations(violations: Violation[]): string {
  if (violations.length === 1 && violations[0]) {
    return violations[0].message;
  }
  return `${violations.length} problems found`;
}

export function isBuilderError(error: unknown): error is BuilderError {
  return error instanceof BuilderError;
}

/**
 * Wrap an unknown error in a BuilderError
 */
export function wrapError(error: unknown, code: ErrorCode, message?: string): BuilderError {
  if (error instanceof BuilderError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  return new BuilderError(code, message, { cause });
}
