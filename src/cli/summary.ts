import type { DatasetOutcome } from '../pipeline/index.js';
import { describeError } from '../utils/errors.js';

export function formatOutcome(outcome: DatasetOutcome): string {
  if (outcome.status === 'failed') {
    return `❌ ${outcome.dataset}: ${describeError(outcome.error)}`;
  }

  const dropped = outcome.dropped > 0 ? `, ${outcome.dropped} dropped` : '';
  return `✅ ${outcome.dataset}: ${outcome.points} point(s)${dropped} → ${outcome.outputPath}`;
}

export function formatSummary(outcomes: readonly DatasetOutcome[]): string {
  const line = '─'.repeat(50);
  const failed = outcomes.filter(outcome => outcome.status === 'failed').length;

  return [
    line,
    ...outcomes.map(formatOutcome),
    line,
    `${outcomes.length - failed}/${outcomes.length} dataset(s) written`,
  ].join('\n');
}
