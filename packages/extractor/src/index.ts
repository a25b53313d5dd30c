/**
 * @gws-config/extractor
 *
 * Turns baseline markdown into a catalog of policy records.
 * Pure extraction; reading files is kept in ./files.
 */

// Types
export * from './types.js';

// Schema version (for consumer compatibility checks)
export { CATALOG_SCHEMA_VERSION } from './schema/index.js';

// Tokenizer
export {
  tokenize,
  classifyLine,
  isPolicyId,
  POLICY_ID_PATTERN,
  POLICY_HEADING_PREFIX,
  type LineToken,
  type LineTokenKind,
} from './tokenizer.js';

// Extraction
export { extractBaseline, extractCatalog, freezeCatalog } from './extract.js';

// Catalog persistence and lookup
export {
  toCatalogFile,
  serializeCatalog,
  parseCatalogFile,
  productOfPolicy,
  findPolicy,
  listProducts,
  countPolicies,
  getGeneratedBy,
  CatalogFormatError,
  EXTRACTOR_PACKAGE_NAME,
  EXTRACTOR_VERSION,
} from './catalog.js';

// Product metadata
export { KNOWN_PRODUCTS, getProductInfo } from './products.js';

// File loading
export * from './files/index.js';
