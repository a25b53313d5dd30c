import { describe, it, expect } from 'vitest';
import { createEmptyDocument } from '../src/document/model.js';
import { importEngineConfig, renderEngineConfig, toEngineConfig } from '../src/document/engine.js';
import { ParseError } from '../src/lib/errors.js';
import { fullDocument } from './fixtures.js';

describe('toEngineConfig', () => {
  it('flattens a document into engine keys', () => {
    expect(toEngineConfig(fullDocument())).toEqual({
      orgname: 'Acme',
      orgunitname: 'Finance',
      baselines: ['drive', 'gmail'],
      credentials: './sa.json',
      customerid: 'C0test',
      subjectemail: 'admin@example.org',
      outputpath: './reports',
      darkmode: 'true',
      omitpolicy: {
        'GWS.GMAIL.1.1v0.6': { rationale: 'Handled by gateway', expiration: '2026-12-31' },
      },
      annotatepolicy: {
        'GWS.DRIVE.1.1v0.6': { incorrectresult: true, comment: 'Known gap' },
      },
      breakglassaccounts: ['admin@example.org'],
    });
  });

  it('drops defaults and empty values', () => {
    const document = {
      ...createEmptyDocument(),
      organization: { name: 'Acme' },
      products: ['GMAIL'],
      output: { directory: '.', formats: ['html' as const], quiet: true, darkMode: false },
    };
    expect(toEngineConfig(document)).toEqual({ orgname: 'Acme', baselines: ['gmail'], quiet: true });
  });

  it('writes oauth credentials without service-account keys', () => {
    const document = { ...fullDocument(), auth: { mode: 'oauth' as const, credentials: './client.json' } };
    const config = toEngineConfig(document);
    expect(config.credentials).toBe('./client.json');
    expect(config.customerid).toBeUndefined();
    expect(config.subjectemail).toBeUndefined();
  });

  it('renders YAML with darkmode as a string', () => {
    expect(renderEngineConfig(fullDocument())).toContain('darkmode: "true"\n');
  });
});

describe('importEngineConfig', () => {
  it('reads back a rendered configuration', () => {
    const document = fullDocument();
    expect(importEngineConfig(renderEngineConfig(document))).toEqual(document);
    expect(importEngineConfig(renderEngineConfig(document, 'json'))).toEqual(document);
  });

  it('accepts single values for list keys', () => {
    const document = importEngineConfig(
      ['orgname: Acme', 'baselines: gmail', 'breakglassaccounts: Admin@Example.org', 'darkmode: true', ''].join('\n')
    );
    expect(document.products).toEqual(['GMAIL']);
    expect(document.breakGlassAccounts).toEqual(['admin@example.org']);
    expect(document.output.darkMode).toBe(true);
  });

  it('treats a lone credentials file as oauth', () => {
    const document = importEngineConfig('orgname: Acme\ncredentials: ./client.json\n');
    expect(document.auth).toEqual({ mode: 'oauth', credentials: './client.json' });
  });

  it('selects service-account auth from a subject email', () => {
    const document = importEngineConfig('subjectemail: admin@example.org\n');
    expect(document.auth).toEqual({
      mode: 'service-account',
      credentials: '',
      customerId: '',
      subjectEmail: 'admin@example.org',
    });
  });

  it('defaults annotation fields', () => {
    const document = importEngineConfig('annotatepolicy:\n  GWS.GMAIL.2.1v0.6:\n    comment: Checked\n');
    expect(document.annotations).toEqual({
      'GWS.GMAIL.2.1v0.6': { policyId: 'GWS.GMAIL.2.1v0.6', comment: 'Checked', incorrect: false },
    });
  });

  it.each([
    ['empty text', ''],
    ['a list', '- gmail\n'],
    ['a numeric baseline', 'baselines: 5\n'],
    ['an omission that is not a mapping', 'omitpolicy:\n  GWS.GMAIL.1.1v0.6: yes\n'],
    ['broken YAML', 'orgname: [Acme\n'],
  ])('rejects %s', (_label, text) => {
    expect(() => importEngineConfig(text)).toThrow(ParseError);
  });
});
