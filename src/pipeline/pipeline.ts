/**
 * Runs Locator → Extractor → serializer for each configured dataset.
 *
 * Datasets are independent: a failure is logged and recorded in the returned
 * outcome list, and the next dataset still runs.
 */

import { writeFile } from 'fs/promises';
import { logger } from '../utils/logger.js';
import { datasetLabel, type DatasetConfig, type PipelineConfig } from '../utils/config.js';
import { OutputWriteError, describeError } from '../utils/errors.js';
import { Locator } from '../locator/locator.js';
import { Extractor } from '../extractor/extractor.js';
import { formatResultSet } from './serializer.js';

export interface DatasetWritten {
  status: 'written';
  dataset: string;
  outputPath: string;
  points: number;
  dropped: number;
}

export interface DatasetFailed {
  status: 'failed';
  dataset: string;
  error: Error;
}

export type DatasetOutcome = DatasetWritten | DatasetFailed;

export class ExtractionPipeline {
  private config: PipelineConfig;
  private locator: Locator;
  private extractor: Extractor;
  private log = logger.child('pipeline');

  constructor(config: PipelineConfig) {
    this.config = config;
    this.locator = new Locator({
      measurementPrefix: config.measurementPrefix,
      indexDelimiter: config.indexDelimiter,
    });
    this.extractor = new Extractor();
  }

  async run(): Promise<DatasetOutcome[]> {
    const outcomes: DatasetOutcome[] = [];
    for (const dataset of this.config.datasets) {
      outcomes.push(await this.runDataset(dataset));
    }

    const failed = outcomes.filter(outcome => outcome.status === 'failed').length;
    this.log.info(`Processed ${outcomes.length} dataset(s), ${failed} failed`);
    return outcomes;
  }

  async runDataset(dataset: DatasetConfig): Promise<DatasetOutcome> {
    const label = datasetLabel(dataset);

    try {
      const measurements = await this.locator.locate(dataset.root);
      const { points, dropped } = await this.extractor.extract(measurements);
      await this.writeOutput(dataset.output, formatResultSet(points));

      this.log.info(`Results written to ${dataset.output}`);
      return {
        status: 'written',
        dataset: label,
        outputPath: dataset.output,
        points: points.length,
        dropped: dropped.length,
      };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.log.error(`Dataset ${label} failed: ${describeError(failure)}`);
      return { status: 'failed', dataset: label, error: failure };
    }
  }

  private async writeOutput(outputPath: string, content: string): Promise<void> {
    try {
      await writeFile(outputPath, content, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new OutputWriteError(`Failed to write ${outputPath}: ${reason}`, { outputPath }, { cause: error });
    }
  }
}
