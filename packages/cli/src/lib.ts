/**
 * @gws-config/cli - Library exports
 *
 * The programmatic API behind gwscfg. Use these exports to build
 * configuration documents from another tool or UI.
 */

// Builder session
export {
  ConfigurationBuilder,
  type BuilderState,
  type AnnotationOptions,
  type OutputUpdate,
} from './document/builder.js';

// Document model
export {
  createEmptyDocument,
  createDefaultOutput,
  cloneDocument,
  isAuthMode,
  isReportFormat,
  AUTH_MODES,
  REPORT_FORMATS,
  DEFAULT_OUTPUT_DIRECTORY,
  DEFAULT_REPORT_FORMATS,
  type ConfigurationDocument,
  type OrganizationInfo,
  type OmissionEntry,
  type AnnotationEntry,
  type OutputSettings,
  type AuthSettings,
  type AuthMode,
  type ReportFormat,
} from './document/model.js';

// Validation
export {
  validateDocument,
  ViolationCodes,
  PRODUCTS_REQUIRED_MESSAGE,
  isEmail,
  isIsoDate,
  type ViolationCode,
} from './document/validation.js';

// Persistence
export {
  serializeDocument,
  deserializeDocument,
  toPersistedDocument,
  DOCUMENT_HEADER_COMMENT,
  type DocumentFormat,
  type SerializeOptions,
  type PersistedDocument,
} from './document/serialize.js';

// Assessment engine configuration
export {
  toEngineConfig,
  renderEngineConfig,
  importEngineConfig,
  type EngineConfig,
} from './document/engine.js';

// Settings and catalog loading
export { loadSettings, DEFAULT_SETTINGS, SETTINGS_FILE_NAMES, type BuilderSettings } from './lib/settings.js';
export { loadCatalog, readCatalogFile, extractCatalogFromDirectory, type LoadedCatalog } from './lib/catalog.js';

// Catalog compatibility
export {
  checkCatalogVersion,
  READABLE_CATALOG_VERSIONS,
  type CatalogVersionCheck,
  type CatalogVersionProblem,
} from './lib/catalog-version.js';

// Error handling
export {
  BuilderError,
  ValidationError,
  ParseError,
  ErrorCodes,
  ErrorMessages,
  ErrorRemediation,
  isBuilderError,
  wrapError,
  type ErrorCode,
  type Violation,
} from './lib/errors.js';

export { BUILDER_VERSION } from './lib/version.js';
