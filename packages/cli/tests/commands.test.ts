import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { serializeCatalog } from '@gws-config/extractor';
import { initCommand } from '../src/commands/init.js';
import { authFromOptions, breakGlassCommand, omitCommand, outputCommand } from '../src/commands/edit.js';
import { importCommand } from '../src/commands/export.js';
import { formatError } from '../src/commands/context.js';
import { deserializeDocument } from '../src/document/serialize.js';
import { BuilderError, ErrorCodes, ValidationError } from '../src/lib/errors.js';
import { TEST_CATALOG } from './fixtures.js';

describe('commands', () => {
  let tempDir: string;
  let file: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'gwscfg-commands-'));
    file = join(tempDir, 'config.yaml');
    writeFileSync(join(tempDir, 'catalog.json'), serializeCatalog(TEST_CATALOG));
    writeFileSync(join(tempDir, 'gwscfg.config.yaml'), 'catalog: ./catalog.json\n');
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('creates a document with init', async () => {
    await initCommand(file, { org: 'Acme', products: ['gmail'], path: tempDir });

    const text = readFileSync(file, 'utf-8');
    expect(text.startsWith('# Google Workspace baseline assessment configuration\n')).toBe(true);
    const document = deserializeDocument(text);
    expect(document.organization).toEqual({ name: 'Acme' });
    expect(document.products).toEqual(['GMAIL']);
  });

  it('refuses to overwrite an existing document', async () => {
    await initCommand(file, { org: 'Acme', products: ['GMAIL'], path: tempDir });

    const error = await initCommand(file, { org: 'Other', products: ['GMAIL'], path: tempDir }).catch(
      (caught: unknown) => caught
    );
    expect(error instanceof BuilderError && error.code).toBe(ErrorCodes.CLI_INVALID_ARGUMENT);
    expect(deserializeDocument(readFileSync(file, 'utf-8')).organization.name).toBe('Acme');
  });

  it('applies an edit and writes the result', async () => {
    await initCommand(file, { org: 'Acme', products: ['GMAIL'], path: tempDir });
    await omitCommand(file, 'GWS.GMAIL.1.1v0.6', { rationale: 'Handled by gateway', path: tempDir });
    await breakGlassCommand(file, 'Admin@Example.org', { path: tempDir });

    const document = deserializeDocument(readFileSync(file, 'utf-8'));
    expect(Object.keys(document.omissions)).toEqual(['GWS.GMAIL.1.1v0.6']);
    expect(document.breakGlassAccounts).toEqual(['admin@example.org']);
  });

  it('leaves the file alone when the edit makes the document invalid', async () => {
    await initCommand(file, { org: 'Acme', products: ['GMAIL'], path: tempDir });
    const before = readFileSync(file, 'utf-8');

    const error = await omitCommand(file, 'GWS.DRIVE.1.1v0.6', { rationale: 'Not licensed', path: tempDir }).catch(
      (caught: unknown) => caught
    );
    expect(error).toBeInstanceOf(ValidationError);
    expect(readFileSync(file, 'utf-8')).toBe(before);
  });

  it('writes JSON documents for .json files', async () => {
    const jsonFile = join(tempDir, 'config.json');
    await initCommand(jsonFile, { org: 'Acme', products: ['GMAIL'], path: tempDir });
    await outputCommand(jsonFile, { formats: ['csv'], path: tempDir });

    const text = readFileSync(jsonFile, 'utf-8');
    expect(text.startsWith('{\n')).toBe(true);
    expect(deserializeDocument(text).output.formats).toEqual(['csv']);
  });

  it('imports an engine configuration', async () => {
    const engineFile = join(tempDir, 'engine.yaml');
    writeFileSync(engineFile, 'orgname: Acme\nbaselines:\n  - gmail\n  - drive\n');

    await importCommand(engineFile, file, { path: tempDir });

    expect(deserializeDocument(readFileSync(file, 'utf-8')).products).toEqual(['DRIVE', 'GMAIL']);
  });

  it('builds auth settings from options', () => {
    expect(authFromOptions({ mode: 'oauth', credentials: './client.json' })).toEqual({
      mode: 'oauth',
      credentials: './client.json',
    });
    expect(() => authFromOptions({ mode: 'kerberos' })).toThrow(BuilderError);
  });

  it('lists every violation and the remediation', () => {
    const error = new ValidationError([
      { code: 'A', path: 'organization.name', message: 'organization name is required' },
      { code: 'B', path: 'products', message: 'at least one product required' },
    ]);
    const output = formatError(error).join('\n');
    expect(output).toContain('[GC_DOCUMENT_201] 2 problems found');
    expect(output).toContain('organization name is required');
    expect(output).toContain('How to fix:');
  });
});
