import { readFile } from 'fs/promises';
import { logger } from '../utils/logger.js';
import { DocumentReadError } from '../utils/errors.js';
import type { IndexedMeasurement } from '../locator/locator.js';
import { decodeDocument, medianPointEstimate } from './document.js';

export interface ResultPoint {
  index: number;
  time: number;
}

export interface ExtractionResult {
  /** Ordered like the input measurements */
  points: ResultPoint[];
  /** Source paths of documents without a median point estimate */
  dropped: string[];
}

export class Extractor {
  private log = logger.child('extractor');

  async extract(measurements: readonly IndexedMeasurement[]): Promise<ExtractionResult> {
    const points: ResultPoint[] = [];
    const dropped: string[] = [];

    for (const { index, sourcePath } of measurements) {
      const time = await this.extractOne(sourcePath);
      if (time === undefined) {
        this.log.warn(`No median point estimate in ${sourcePath}, skipping index ${index}`);
        dropped.push(sourcePath);
        continue;
      }
      points.push({ index, time });
    }

    if (dropped.length > 0) {
      this.log.warn(`Dropped ${dropped.length} of ${measurements.length} measurement(s)`);
    }

    return { points, dropped };
  }

  /**
   * Read and decode a single measurement. Returns undefined when the document
   * decodes but lacks the statistic; throws when it cannot be read or decoded.
   */
  async extractOne(sourcePath: string): Promise<number | undefined> {
    let buffer: Buffer;
    try {
      buffer = await readFile(sourcePath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DocumentReadError(`Failed to read ${sourcePath}: ${reason}`, { sourcePath }, { cause: error });
    }

    return medianPointEstimate(decodeDocument(buffer, sourcePath));
  }
}
