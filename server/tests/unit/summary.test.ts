import { describe, it, expect } from 'vitest';
import { formatSummary, topErrors } from '../../src/pipeline/summary.js';
import { newRecord, summarizeRecords } from '../../src/registry/organization-registry.js';
import type { OrganizationRecord } from '../../src/types.js';
import { FIXED_NOW, group } from '../fixtures/pipeline-fakes.js';

function failed(name: string, message: string): OrganizationRecord {
  return { ...newRecord(group(name), FIXED_NOW), stage_status: 'website_not_found', error_message: message };
}

describe('topErrors', () => {
  it('groups messages that differ only in URLs and quoted names', () => {
    expect(
      topErrors([
        failed('A', 'No plausible website found for "A"'),
        failed('B', 'No plausible website found for "B"'),
        failed('C', 'HTTP 404 for https://c.example/home'),
        newRecord(group('D'), FIXED_NOW),
      ])
    ).toEqual([
      { message: 'No plausible website found for "…"', count: 2 },
      { message: 'HTTP 404 for <url>', count: 1 },
    ]);
  });

  it('honours the limit', () => {
    expect(topErrors([failed('A', 'one'), failed('B', 'two')], 1)).toEqual([{ message: 'one', count: 1 }]);
  });
});

describe('formatSummary', () => {
  it('renders counts, percentages and top errors', () => {
    const records = [
      { ...newRecord(group('A'), FIXED_NOW), stage_status: 'completed' as const, is_insurance: true },
      failed('B', 'No plausible website found for "B"'),
    ];

    const text = formatSummary(
      { queued: 2, processed: 2, skipped: 0, errored: 0, interrupted: false, duration_ms: 1500, registry: summarizeRecords(records) },
      topErrors(records)
    );

    expect(text.split('\n')).toEqual([
      'Organizations: 2',
      'Queued this run: 2 (processed 2, skipped 0, errored 0)',
      'Duration: 1.5s',
      '',
      'Terminal states:',
      '  completed: 1 (50.0%)',
      '  website_not_found: 1 (50.0%)',
      '  scraping_failed: 0 (0.0%)',
      '  classification_failed: 0 (0.0%)',
      '',
      'Insurance: 1  Not insurance: 0  Unclassified: 1',
      '',
      'Top errors:',
      '  1 x No plausible website found for "…"',
    ]);
  });

  it('marks interrupted runs', () => {
    const text = formatSummary({
      queued: 0,
      processed: 0,
      skipped: 0,
      errored: 0,
      interrupted: true,
      duration_ms: 0,
      registry: summarizeRecords([]),
    });
    expect(text.split('\n')[2]).toBe('Duration: 0.0s (interrupted)');
  });

  it('reports classifier usage before the top errors', () => {
    const text = formatSummary(
      { queued: 1, processed: 1, skipped: 0, errored: 0, interrupted: false, duration_ms: 0, registry: summarizeRecords([]) },
      [{ message: 'HTTP 404 for <url>', count: 1 }],
      { model: 'test-model', requests: 3, failures: 1, input_tokens: 450, output_tokens: 4 }
    );

    expect(text.split('\n').slice(-5)).toEqual([
      '',
      'Classifier: test-model  Requests: 3 (failed 1)  Tokens: 450 in / 4 out',
      '',
      'Top errors:',
      '  1 x HTTP 404 for <url>',
    ]);
  });
});
