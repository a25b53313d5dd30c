/**
 * Which catalog files this builder reads
 *
 * A catalog records the CATALOG_SCHEMA_VERSION of the extractor that wrote
 * it. Any version within the builder's major is readable, from the minor
 * whose fields the builder first relied on.
 */

export const READABLE_CATALOG_VERSIONS = { major: 1, minMinor: 0 } as const;

export type CatalogVersionProblem = 'malformed' | 'newer' | 'older';

export type CatalogVersionCheck =
  | { readable: true; version: string }
  | { readable: false; version: string; problem: CatalogVersionProblem; message: string };

const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)$/;

export function checkCatalogVersion(version: string): CatalogVersionCheck {
  const match = VERSION_PATTERN.exec(version);
  if (!match) {
    return {
      readable: false,
      version,
      problem: 'malformed',
      message: `Catalog schema version "${version}" is not MAJOR.MINOR.PATCH`,
    };
  }

  const major = Number(match[1]);
  const minor = Number(match[2]);
  const { major: readableMajor, minMinor } = READABLE_CATALOG_VERSIONS;

  if (major > readableMajor) {
    return {
      readable: false,
      version,
      problem: 'newer',
      message: `Catalog schema ${version} is newer than this builder reads (${readableMajor}.x)`,
    };
  }
  if (major < readableMajor || minor < minMinor) {
    return {
      readable: false,
      version,
      problem: 'older',
      message: `Catalog schema ${version} is older than this builder reads (${readableMajor}.${minMinor} or later)`,
    };
  }
  return { readable: true, version };
}
