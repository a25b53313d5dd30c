/**
 * Policy extraction
 *
 * Runs a two-mode state machine (outside / body) over the token stream from
 * the tokenizer. A policy heading opens a record; its description is the
 * first paragraph below it. Malformed headings and duplicates become
 * diagnostics, never exceptions.
 */

import { tokenize, type LineToken } from './tokenizer.js';
import type {
  BaselineCatalog,
  BaselineDocument,
  BaselineExtraction,
  ExtractionDiagnostic,
  ExtractionResult,
  PolicyRecord,
} from './types.js';

interface OpenRecord {
  policyId: string;
  title: string;
  line: number;
  lines: string[];
}

type ScanState = { mode: 'outside' } | { mode: 'body'; record: OpenRecord };

const OUTSIDE: ScanState = { mode: 'outside' };

class BaselineScanner {
  private state: ScanState = OUTSIDE;
  private readonly records = new Map<string, PolicyRecord>();
  readonly diagnostics: ExtractionDiagnostic[] = [];

  constructor(
    private readonly baseline: string,
    private readonly source?: string
  ) {}

  feed(token: LineToken): void {
    switch (token.kind) {
      case 'policy-heading':
        this.close();
        this.state = {
          mode: 'body',
          record: { policyId: token.policyId, title: token.title, line: token.line, lines: [] },
        };
        return;

      case 'malformed-heading':
        this.close();
        this.diagnostics.push({
          kind: 'malformed-heading',
          baseline: this.baseline,
          line: token.line,
          message: `Heading does not start with a valid policy id: ${token.text}`,
          ...(this.source ? { source: this.source } : {}),
        });
        return;

      case 'section-boundary':
        this.close();
        return;

      case 'blank':
        // A blank line ends the paragraph, but only once it has started
        if (this.state.mode === 'body' && this.state.record.lines.length > 0) {
          this.close();
        }
        return;

      case 'text':
        if (this.state.mode === 'body') {
          this.state.record.lines.push(token.text);
        }
        return;
    }
  }

  finish(): PolicyRecord[] {
    this.close();
    return Array.from(this.records.values());
  }

  private close(): void {
    if (this.state.mode !== 'body') return;

    const { record } = this.state;
    this.state = OUTSIDE;

    if (this.records.has(record.policyId)) {
      this.diagnostics.push({
        kind: 'duplicate-policy',
        baseline: this.baseline,
        line: record.line,
        policyId: record.policyId,
        message: `Duplicate policy ${record.policyId}; later definition replaces the earlier one`,
        ...(this.source ? { source: this.source } : {}),
      });
    }

    // Map.set keeps the first insertion position for an existing key
    this.records.set(record.policyId, {
      policyId: record.policyId,
      title: record.title,
      description: record.lines.join(' ').trim(),
    });
  }
}

/**
 * Extract the policies of one baseline document.
 */
export function extractBaseline(name: string, content: string, source?: string): BaselineExtraction {
  const scanner = new BaselineScanner(name, source);
  for (const token of tokenize(content)) {
    scanner.feed(token);
  }
  const policies = scanner.finish();
  return { policies, diagnostics: scanner.diagnostics };
}

/**
 * Build a frozen catalog from a set of baseline documents.
 * Each document is processed independently.
 */
export function extractCatalog(documents: Iterable<BaselineDocument>): ExtractionResult {
  const baselines: Record<string, readonly PolicyRecord[]> = {};
  const diagnostics: ExtractionDiagnostic[] = [];

  for (const document of documents) {
    const name = document.name.trim();
    const result = extractBaseline(name, document.content, document.source);

    if (name in baselines) {
      diagnostics.push({
        kind: 'duplicate-baseline',
        baseline: name,
        message: `Baseline ${name} appears more than once; the later document replaces the earlier one`,
        ...(document.source ? { source: document.source } : {}),
      });
    }

    baselines[name] = Object.freeze(result.policies.map((policy) => Object.freeze(policy)));
    diagnostics.push(...result.diagnostics);
  }

  return { catalog: freezeCatalog(baselines), diagnostics };
}

/**
 * Freeze a catalog with baselines in name order.
 */
export function freezeCatalog(baselines: Record<string, readonly PolicyRecord[]>): BaselineCatalog {
  const ordered: Record<string, readonly PolicyRecord[]> = {};
  for (const name of Object.keys(baselines).sort()) {
    const policies = baselines[name] ?? [];
    ordered[name] = Object.isFrozen(policies)
      ? policies
      : Object.freeze(policies.map((policy) => Object.freeze({ ...policy })));
  }
  return Object.freeze(ordered);
}
