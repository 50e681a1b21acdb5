export { Extractor, type ResultPoint, type ExtractionResult } from './extractor.js';
export {
  decodeDocument,
  lookup,
  lookupPath,
  asFloat,
  medianPointEstimate,
  POINT_ESTIMATE_PATH,
  type CborValue,
  type CborKind,
} from './document.js';
