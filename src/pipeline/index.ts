export {
  ExtractionPipeline,
  type DatasetOutcome,
  type DatasetWritten,
  type DatasetFailed,
} from './pipeline.js';
export { formatResultSet, formatTime } from './serializer.js';
