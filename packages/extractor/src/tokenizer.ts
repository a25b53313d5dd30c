/**
 * Baseline line tokenizer
 *
 * Classifies each markdown line into one token kind so the extraction state
 * machine never has to look at raw text. Heading detection and the policy-id
 * grammar live here and nowhere else.
 */

/** Prefix of a policy heading line */
export const POLICY_HEADING_PREFIX = '#### ';

/** Full policy identifier grammar: GWS.<PRODUCT>.<major>.<minor>v<version> */
export const POLICY_ID_PATTERN = /^GWS\.[A-Z]+\.\d+\.\d+v[\d.]+$/;

const HEADING_PATTERN = /^#{1,6}(\s|$)/;

export type LineToken =
  | { kind: 'policy-heading'; line: number; policyId: string; title: string }
  | { kind: 'malformed-heading'; line: number; text: string }
  | { kind: 'section-boundary'; line: number; text: string }
  | { kind: 'blank'; line: number }
  | { kind: 'text'; line: number; text: string };

export type LineTokenKind = LineToken['kind'];

/**
 * Check a string against the policy-id grammar (whole string must match).
 */
export function isPolicyId(value: string): boolean {
  return POLICY_ID_PATTERN.test(value);
}

/**
 * Classify a single line. `line` is the 1-based line number.
 */
export function classifyLine(raw: string, line: number): LineToken {
  const trimmed = raw.trim();

  if (trimmed === '') {
    return { kind: 'blank', line };
  }

  if (trimmed.startsWith(POLICY_HEADING_PREFIX)) {
    const words = trimmed.slice(POLICY_HEADING_PREFIX.length).trim().split(/\s+/);
    const [candidate = '', ...rest] = words;
    if (isPolicyId(candidate)) {
      return { kind: 'policy-heading', line, policyId: candidate, title: rest.join(' ') };
    }
    return { kind: 'malformed-heading', line, text: trimmed };
  }

  if (HEADING_PATTERN.test(trimmed)) {
    return { kind: 'section-boundary', line, text: trimmed };
  }

  return { kind: 'text', line, text: trimmed };
}

/**
 * Split content into lines (LF or CRLF) and classify each.
 */
export function tokenize(content: string): LineToken[] {
  return content.split(/\r?\n/).map((raw, index) => classifyLine(raw, index + 1));
}
