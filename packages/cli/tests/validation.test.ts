import { describe, it, expect } from 'vitest';
import { createEmptyDocument } from '../src/document/model.js';
import {
  PRODUCTS_REQUIRED_MESSAGE,
  ViolationCodes,
  isIsoDate,
  validateDocument,
} from '../src/document/validation.js';
import { TEST_CATALOG, fullDocument } from './fixtures.js';

describe('validateDocument', () => {
  it('accepts a complete document', () => {
    expect(validateDocument(fullDocument(), TEST_CATALOG)).toEqual([]);
  });

  it('accepts an organization with one product and default settings', () => {
    const document = { ...createEmptyDocument(), organization: { name: 'Acme' }, products: ['GMAIL'] };
    expect(validateDocument(document, TEST_CATALOG)).toEqual([]);
  });

  it('reports every problem of an empty document', () => {
    const violations = validateDocument(createEmptyDocument(), TEST_CATALOG);
    expect(violations.map((violation) => violation.code)).toEqual([
      ViolationCodes.ORGANIZATION_REQUIRED,
      ViolationCodes.PRODUCTS_REQUIRED,
    ]);
    expect(violations[1]?.message).toBe(PRODUCTS_REQUIRED_MESSAGE);
  });

  it('reports unknown products', () => {
    const document = { ...fullDocument(), products: ['GMAIL', 'CHAT'] };
    expect(validateDocument(document, TEST_CATALOG)).toContainEqual({
      code: ViolationCodes.UNKNOWN_PRODUCT,
      path: 'products',
      message: 'unknown product "CHAT"',
    });
  });

  it('treats inherited object property names as unknown products', () => {
    const document = { ...createEmptyDocument(), organization: { name: 'Acme' }, products: ['constructor'] };
    expect(validateDocument(document, TEST_CATALOG)).toEqual([
      { code: ViolationCodes.UNKNOWN_PRODUCT, path: 'products', message: 'unknown product "constructor"' },
    ]);
  });

  it('reports an annotation that no selected product contains', () => {
    const document = { ...fullDocument(), products: ['GMAIL'] };
    expect(validateDocument(document, TEST_CATALOG)).toEqual([
      {
        code: ViolationCodes.UNRESOLVED_POLICY,
        path: 'annotatePolicies.GWS.DRIVE.1.1v0.6',
        message: 'annotated policy GWS.DRIVE.1.1v0.6 is not in any selected product',
      },
    ]);
  });

  it('reports a malformed break-glass email', () => {
    const document = { ...fullDocument(), breakGlassAccounts: ['not-an-email'] };
    expect(validateDocument(document, TEST_CATALOG)).toEqual([
      {
        code: ViolationCodes.INVALID_EMAIL,
        path: 'breakGlassAccounts',
        message: '"not-an-email" is not a valid email address',
      },
    ]);
  });

  it('reports a syntactically invalid omission id once', () => {
    const document = fullDocument();
    document.omissions['GMAIL.1.1'] = { policyId: 'GMAIL.1.1', rationale: 'n/a' };
    expect(validateDocument(document, TEST_CATALOG)).toEqual([
      {
        code: ViolationCodes.INVALID_POLICY_ID,
        path: 'omitPolicies.GMAIL.1.1',
        message: '"GMAIL.1.1" is not a valid policy id',
      },
    ]);
  });

  it('requires every service-account field', () => {
    const document = {
      ...fullDocument(),
      auth: { mode: 'service-account' as const, credentials: '', customerId: '', subjectEmail: '' },
    };
    expect(validateDocument(document, TEST_CATALOG).map((violation) => violation.path)).toEqual([
      'auth.credentials',
      'auth.customerId',
      'auth.subjectEmail',
    ]);
  });

  it('requires .json credentials for oauth', () => {
    const document = { ...fullDocument(), auth: { mode: 'oauth' as const, credentials: './client.txt' } };
    expect(validateDocument(document, TEST_CATALOG)).toEqual([
      {
        code: ViolationCodes.INVALID_CREDENTIALS_PATH,
        path: 'auth.credentials',
        message: 'credentials must be a .json client secrets file',
      },
    ]);
  });

  it('requires an output directory and a report format', () => {
    const document = {
      ...fullDocument(),
      output: { directory: ' ', formats: [], quiet: false, darkMode: false },
    };
    expect(validateDocument(document, TEST_CATALOG).map((violation) => violation.code)).toEqual([
      ViolationCodes.OUTPUT_DIRECTORY_REQUIRED,
      ViolationCodes.REPORT_FORMAT_REQUIRED,
    ]);
  });

  it('throws a TypeError for a missing structural field', () => {
    const document = fullDocument();
    Reflect.set(document, 'products', null);
    expect(() => validateDocument(document, TEST_CATALOG)).toThrow(TypeError);
  });
});

describe('isIsoDate', () => {
  it('accepts real calendar dates only', () => {
    expect(isIsoDate('2026-12-31')).toBe(true);
    expect(isIsoDate('2028-02-29')).toBe(true);
    expect(isIsoDate('2026-02-30')).toBe(false);
    expect(isIsoDate('31/12/2026')).toBe(false);
  });
});
