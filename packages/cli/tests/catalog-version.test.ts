import { describe, it, expect } from 'vitest';
import { CATALOG_SCHEMA_VERSION } from '@gws-config/extractor';
import { checkCatalogVersion } from '../src/lib/catalog-version.js';

describe('checkCatalogVersion', () => {
  it('reads catalogs from the bundled extractor', () => {
    expect(checkCatalogVersion(CATALOG_SCHEMA_VERSION).readable).toBe(true);
  });

  it('reads later minor and patch releases of the same major', () => {
    expect(checkCatalogVersion('1.4.2')).toEqual({ readable: true, version: '1.4.2' });
  });

  it('refuses other majors', () => {
    expect(checkCatalogVersion('2.0.0')).toEqual({
      readable: false,
      version: '2.0.0',
      problem: 'newer',
      message: 'Catalog schema 2.0.0 is newer than this builder reads (1.x)',
    });
    expect(checkCatalogVersion('0.9.0')).toEqual({
      readable: false,
      version: '0.9.0',
      problem: 'older',
      message: 'Catalog schema 0.9.0 is older than this builder reads (1.0 or later)',
    });
  });

  it('refuses versions that are not three numbers', () => {
    for (const version of ['v1', '1.0', '1.0.0-beta']) {
      const check = checkCatalogVersion(version);
      expect(check.readable).toBe(false);
      if (!check.readable) {
        expect(check.problem).toBe('malformed');
        expect(check.message).toBe(`Catalog schema version "${version}" is not MAJOR.MINOR.PATCH`);
      }
    }
  });
});
