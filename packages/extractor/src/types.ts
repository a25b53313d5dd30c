/**
 * Extractor types
 *
 * Pure shapes shared by the extractor and its consumers. No runtime values.
 */

// ============================================================================
// Catalog
// ============================================================================

/**
 * A single policy recommendation pulled from a baseline document.
 */
export interface PolicyRecord {
  /** Policy identifier, e.g. GWS.GMAIL.1.1v0.6 */
  policyId: string;
  /** Heading text following the identifier (may be empty) */
  title: string;
  /** First paragraph below the heading */
  description: string;
}

/**
 * Baseline name (upper case, e.g. GMAIL) to policies in document order.
 * Treated as immutable reference data once built.
 */
export type BaselineCatalog = Readonly<Record<string, readonly PolicyRecord[]>>;

/**
 * Persisted catalog format (what `gwsx extract` writes).
 */
export interface CatalogFile {
  /** Schema version of this file format */
  schemaVersion: string;
  /** Tool identifier (e.g. "@gws-config/extractor@0.1.0") */
  generatedBy: string;
  /** Baselines sorted by name */
  baselines: Record<string, PolicyRecord[]>;
}

// ============================================================================
// Input
// ============================================================================

export interface BaselineDocument {
  /** Baseline identifier, e.g. GMAIL */
  name: string;
  /** Raw markdown */
  content: string;
  /** Where the document came from (file path), for diagnostics */
  source?: string;
}

// ============================================================================
// Diagnostics
// ============================================================================

export type ExtractionDiagnosticKind =
  | 'malformed-heading'
  | 'duplicate-policy'
  | 'duplicate-baseline'
  | 'unreadable-document';

/**
 * Non-fatal problem found while extracting. Extraction never throws for
 * malformed content; callers decide whether to log these.
 */
export interface ExtractionDiagnostic {
  kind: ExtractionDiagnosticKind;
  baseline: string;
  message: string;
  /** 1-based line number, when the problem is tied to a line */
  line?: number;
  policyId?: string;
  source?: string;
}

export interface BaselineExtraction {
  policies: PolicyRecord[];
  diagnostics: ExtractionDiagnostic[];
}

export interface ExtractionResult {
  catalog: BaselineCatalog;
  diagnostics: ExtractionDiagnostic[];
}

// ============================================================================
// Products
// ============================================================================

export interface ProductInfo {
  /** Catalog key, e.g. GMAIL */
  name: string;
  /** Display title */
  title: string;
  description: string;
}
