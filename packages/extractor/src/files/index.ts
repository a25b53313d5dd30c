export {
  loadBaselineDocuments,
  baselineNameFromPath,
  type BaselineLoaderOptions,
  type LoadedBaselines,
} from './baseline-files.js';
