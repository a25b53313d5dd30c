import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { DEFAULT_SETTINGS, loadSettings } from '../src/lib/settings.js';
import { BuilderError, ErrorCodes } from '../src/lib/errors.js';

describe('loadSettings', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'gwscfg-settings-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('returns defaults when no settings file exists', async () => {
    expect(await loadSettings(tempDir, {})).toEqual({ settings: DEFAULT_SETTINGS });
  });

  it('merges a YAML settings file and resolves paths against its directory', async () => {
    writeFileSync(join(tempDir, 'gwscfg.config.yaml'), 'catalog: ./catalog.json\nformat: json\n');

    const { settings, source } = await loadSettings(tempDir, {});
    expect(source).toBe(join(tempDir, 'gwscfg.config.yaml'));
    expect(settings).toEqual({
      catalog: join(tempDir, 'catalog.json'),
      format: 'json',
      includeComments: true,
    });
  });

  it('reads JSON settings files', async () => {
    writeFileSync(join(tempDir, '.gwscfgrc.json'), JSON.stringify({ includeComments: false }));

    const { settings } = await loadSettings(tempDir, {});
    expect(settings.includeComments).toBe(false);
  });

  it('lets the environment override file settings', async () => {
    writeFileSync(join(tempDir, 'gwscfg.config.yaml'), 'catalog: ./catalog.json\n');

    const { settings } = await loadSettings(tempDir, {
      GWSCFG_CATALOG: '/srv/catalog.json',
      GWSCFG_BASELINES: 'baselines',
    });
    expect(settings.catalog).toBe('/srv/catalog.json');
    expect(settings.baselines).toBe(join(tempDir, 'baselines'));
  });

  it('treats an empty settings file as defaults', async () => {
    writeFileSync(join(tempDir, 'gwscfg.config.yaml'), '');
    expect((await loadSettings(tempDir, {})).settings).toEqual(DEFAULT_SETTINGS);
  });

  it.each([
    ['an unknown format', 'format: xml\n'],
    ['an unknown key', 'catalogue: ./catalog.json\n'],
    ['broken YAML', 'format: [yaml\n'],
  ])('rejects %s', async (_label, content) => {
    writeFileSync(join(tempDir, 'gwscfg.config.yaml'), content);

    const error = await loadSettings(tempDir, {}).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(BuilderError);
    expect(error instanceof BuilderError && error.code).toBe(ErrorCodes.CONFIG_INVALID);
  });
});
