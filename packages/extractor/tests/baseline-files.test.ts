/**
 * Tests for baseline document loading
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { baselineNameFromPath, loadBaselineDocuments } from '../src/files/baseline-files.js';
import { extractCatalog } from '../src/extract.js';

const FIXTURES = fileURLToPath(new URL('../test-fixtures/baselines', import.meta.url));

describe('baselineNameFromPath', () => {
  it('upper-cases the file stem', () => {
    expect(baselineNameFromPath('baselines/commoncontrols.md')).toBe('COMMONCONTROLS');
  });
});

describe('loadBaselineDocuments', () => {
  it('loads markdown files sorted by path and skips README.md', async () => {
    const { documents, diagnostics } = await loadBaselineDocuments(FIXTURES);

    expect(documents.map((document) => document.name)).toEqual(['DRIVE', 'GMAIL']);
    expect(documents[0]?.source).toBe(join(FIXTURES, 'drive.md'));
    expect(diagnostics).toEqual([]);
  });

  it('feeds the extractor end to end', async () => {
    const { documents } = await loadBaselineDocuments(FIXTURES);
    const { catalog, diagnostics } = extractCatalog(documents);

    expect(catalog['GMAIL']).toEqual([
      { policyId: 'GWS.GMAIL.1.1v0.6', title: '', description: 'Mail delegation SHOULD be disabled.' },
      { policyId: 'GWS.GMAIL.2.1v0.6', title: 'DKIM signing', description: 'DKIM SHOULD be enabled for all domains.' },
      {
        policyId: 'GWS.GMAIL.3.1v0.6',
        title: '',
        description: 'SPF records SHALL be published for every sending domain.',
      },
    ]);
    expect(catalog['DRIVE']?.map((policy) => policy.policyId)).toEqual([
      'GWS.DRIVE.1.1v0.6',
      'GWS.DRIVE.1.2v0.6',
    ]);
    expect(diagnostics).toEqual([
      {
        kind: 'malformed-heading',
        baseline: 'GMAIL',
        line: 26,
        source: join(FIXTURES, 'gmail.md'),
        message: 'Heading does not start with a valid policy id: #### GWS.GMAIL.2.2 missing version',
      },
    ]);
  });

  describe('with a temporary directory', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'gwsx-baselines-'));
    });

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true });
    });

    it('returns nothing for an empty directory', async () => {
      expect(await loadBaselineDocuments(tempDir)).toEqual({ documents: [], diagnostics: [] });
    });

    it('skips directories whose names match the pattern', async () => {
      writeFileSync(join(tempDir, 'meet.md'), '#### GWS.MEET.1.1v0.6\nMeet.');
      mkdirSync(join(tempDir, 'chat.md'));

      const { documents, diagnostics } = await loadBaselineDocuments(tempDir, { pattern: '*.md' });

      expect(documents.map((document) => document.name)).toEqual(['MEET']);
      expect(diagnostics).toEqual([]);
    });

    it('honours a custom pattern', async () => {
      writeFileSync(join(tempDir, 'gmail.markdown'), '#### GWS.GMAIL.1.1v0.6\nMail.');
      writeFileSync(join(tempDir, 'notes.md'), 'notes');

      const { documents } = await loadBaselineDocuments(tempDir, { pattern: '*.markdown' });

      expect(documents.map((document) => document.name)).toEqual(['GMAIL']);
    });
  });
});
