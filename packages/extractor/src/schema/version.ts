/**
 * Catalog Schema Version
 *
 * Canonical version of the persisted catalog format. The builder checks this
 * before trusting a catalog file.
 *
 * Follows semver:
 * - MAJOR: Breaking changes (fields removed, types changed)
 * - MINOR: Additive changes (new optional fields)
 * - PATCH: Bug fixes, clarifications
 */

export const CATALOG_SCHEMA_VERSION = '1.0.0';
