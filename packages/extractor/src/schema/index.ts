/**
 * Schema exports
 *
 * Versioning only. Types are in ../types.ts.
 */

export { CATALOG_SCHEMA_VERSION } from './version.js';
