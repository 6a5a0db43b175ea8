import type { OrganizationRecord } from '../types.js';
import { TERMINAL_STATUSES } from '../types.js';
import type { BatchSummary } from './batch-runner.js';
import type { ModelUsage } from '../services/classification-model.js';

export interface ErrorCount {
  message: string;
  count: number;
}

/**
 * Most frequent failure messages. Organization-specific parts (URLs, quoted
 * names) are collapsed so similar failures group together.
 */
export function topErrors(records: Iterable<OrganizationRecord>, limit = 5): ErrorCount[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    if (!record.error_message) continue;
    const message = record.error_message
      .replace(/https?:\/\/\S+/g, '<url>')
      .replace(/"[^"]*"/g, '"…"');
    counts.set(message, (counts.get(message) ?? 0) + 1);
  }
  return [...counts]
    .map(([message, count]) => ({ message, count }))
    .sort((a, b) => b.count - a.count || a.message.localeCompare(b.message))
    .slice(0, limit);
}

function percent(part: number, total: number): string {
  return total === 0 ? '0.0%' : `${((part / total) * 100).toFixed(1)}%`;
}

/** Plain-text batch report */
export function formatSummary(summary: BatchSummary, errors: ErrorCount[] = [], usage?: ModelUsage): string {
  const { registry } = summary;
  const lines = [
    `Organizations: ${registry.total}`,
    `Queued this run: ${summary.queued} (processed ${summary.processed}, skipped ${summary.skipped}, errored ${summary.errored})`,
    `Duration: ${(summary.duration_ms / 1000).toFixed(1)}s${summary.interrupted ? ' (interrupted)' : ''}`,
    '',
    'Terminal states:',
    ...TERMINAL_STATUSES.map(
      (status) => `  ${status}: ${registry.by_status[status]} (${percent(registry.by_status[status], registry.total)})`
    ),
    '',
    `Insurance: ${registry.insurance}  Not insurance: ${registry.not_insurance}  Unclassified: ${registry.unclassified}`,
  ];

  if (usage) {
    lines.push(
      '',
      `Classifier: ${usage.model}  Requests: ${usage.requests} (failed ${usage.failures})  Tokens: ${usage.input_tokens} in / ${usage.output_tokens} out`
    );
  }

  if (errors.length > 0) {
    lines.push('', 'Top errors:', ...errors.map((error) => `  ${error.count} x ${error.message}`));
  }
  return lines.join('\n');
}
