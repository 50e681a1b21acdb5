#!/usr/bin/env node
/**
 * Extracts the median point estimate of every measurement in the configured
 * benchmark result trees and writes one `[(index, time), ...]` file per tree.
 */

import { loadConfig } from '../utils/config.js';
import { describeError } from '../utils/errors.js';
import { ExtractionPipeline } from '../pipeline/index.js';
import { formatSummary } from './summary.js';

/* eslint-disable no-console */

async function main(): Promise<void> {
  const pipeline = new ExtractionPipeline(loadConfig());
  const outcomes = await pipeline.run();

  console.log(formatSummary(outcomes));

  if (outcomes.some(outcome => outcome.status === 'failed')) {
    process.exitCode = 1;
  }
}

main().catch(error => {
  console.error(`Fatal error: ${describeError(error)}`);
  process.exit(1);
});
