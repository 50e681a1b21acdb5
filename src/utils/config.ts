import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DatasetConfigSchema = z.object({
  /** Label used in logs and the run summary; defaults to the root path */
  name: z.string().min(1).optional(),
  root: z.string().min(1).describe('Benchmark result tree to scan'),
  output: z.string().min(1).describe('Artifact read by the plotting tool'),
});

export type DatasetConfig = z.infer<typeof DatasetConfigSchema>;

export const PipelineConfigSchema = z.object({
  datasets: z.array(DatasetConfigSchema),
  /** Leading characters of a measurement file's name (case-sensitive) */
  measurementPrefix: z.string().min(1),
  /** Separator that follows the index in a measurement's parent directory name */
  indexDelimiter: z.string().min(1),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const defaultConfig: PipelineConfig = {
  datasets: [
    {
      name: 'r1cs',
      root: '../regs-r1cs-fib-hyperkzg-benchmark-results/data',
      output: '../python-plotter/r1cs-results.txt',
    },
    {
      name: 'omc',
      root: '../regs-omc-fib-hyperkzg-benchmark-results/data',
      output: '../python-plotter/omc-results.txt',
    },
  ],
  measurementPrefix: 'measurement',
  indexDelimiter: 'th',
};

export function loadConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const result = PipelineConfigSchema.safeParse({
    ...defaultConfig,
    ...overrides,
  });

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid pipeline configuration: ${issues.join('; ')}`, { issues });
  }

  return result.data;
}

export function datasetLabel(dataset: DatasetConfig): string {
  return dataset.name ?? dataset.root;
}
