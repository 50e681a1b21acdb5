/**
 * Benchmark point extraction
 */

export { Locator, parseIndexFromDirName, type IndexedMeasurement, type LocatorOptions } from './locator/index.js';
export {
  Extractor,
  decodeDocument,
  lookup,
  lookupPath,
  asFloat,
  medianPointEstimate,
  POINT_ESTIMATE_PATH,
  type CborValue,
  type CborKind,
  type ResultPoint,
  type ExtractionResult,
} from './extractor/index.js';
export {
  ExtractionPipeline,
  formatResultSet,
  formatTime,
  type DatasetOutcome,
  type DatasetWritten,
  type DatasetFailed,
} from './pipeline/index.js';
export {
  loadConfig,
  defaultConfig,
  datasetLabel,
  DatasetConfigSchema,
  PipelineConfigSchema,
  type DatasetConfig,
  type PipelineConfig,
} from './utils/config.js';
export {
  ExtractionError,
  IndexParseError,
  DocumentReadError,
  DocumentDecodeError,
  OutputWriteError,
  ConfigError,
  describeError,
} from './utils/errors.js';
export { logger, Logger, type LogLevel } from './utils/logger.js';
