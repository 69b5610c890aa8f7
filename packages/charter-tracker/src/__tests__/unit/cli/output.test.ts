/**
 * CLI Output Formatting Tests
 */

import { describe, it, expect } from 'vitest';
import {
  fileTimestamp,
  formatCsv,
  formatNdjson,
  formatTable,
  formatters,
  parseOutputFormat,
  type TableColumn,
} from '../../../cli/lib/output.js';
import { formatBackupLine, formatSyncSummary } from '../../../cli/commands/sync.js';
import { formatStats } from '../../../cli/commands/stats.js';

interface Row {
  readonly name: string;
  readonly count: number;
}

const columns: TableColumn<Row>[] = [
  { key: 'name', header: 'name' },
  { key: 'count', header: 'count', align: 'right' },
];

describe('formatTable', () => {
  it('pads columns to the widest cell', () => {
    const output = formatTable<Row>(
      [
        { name: 'a', count: 1 },
        { name: 'bbb', count: 22 },
      ],
      columns
    );

    expect(output.split('\n')).toEqual([
      'name | count',
      '-----+------',
      'a    |     1',
      'bbb  |    22',
    ]);
  });

  it('truncates cells to a fixed width', () => {
    const output = formatTable<Row>([{ name: 'abcdefgh', count: 1 }], [
      { key: 'name', header: 'n', width: 5 },
    ]);

    expect(output.split('\n')[2]).toBe('abcd~');
  });

  it('reports empty results', () => {
    expect(formatTable<Row>([], columns)).toBe('No entries found.');
  });
});

describe('formatCsv', () => {
  it('quotes cells with commas and quotes', () => {
    const output = formatCsv<Row>(
      [
        { name: 'a,b', count: 1 },
        { name: 'say "hi"', count: 2 },
      ],
      columns
    );

    expect(output).toBe('name,count\n"a,b",1\n"say ""hi""",2');
  });

  it('keeps the header for empty results', () => {
    expect(formatCsv<Row>([], columns)).toBe('name,count');
  });
});

describe('formatNdjson', () => {
  it('writes one object per line', () => {
    expect(formatNdjson([{ a: 1 }, { a: 2 }])).toBe('{"a":1}\n{"a":2}');
  });
});

describe('parseOutputFormat', () => {
  it('accepts known formats', () => {
    expect(parseOutputFormat('csv')).toBe('csv');
  });

  it('rejects unknown formats', () => {
    expect(() => parseOutputFormat('xml')).toThrow(
      'Invalid format: xml. Must be one of: table, json, ndjson, csv'
    );
  });
});

describe('formatters', () => {
  it('shows absent values as a dash', () => {
    expect(formatters.optional(null)).toBe('-');
    expect(formatters.optional('')).toBe('-');
    expect(formatters.seconds(1.5)).toBe('1.50s');
    expect(formatters.yesNo(1)).toBe('yes');
  });
});

describe('fileTimestamp', () => {
  it('formats local time for file names', () => {
    expect(fileTimestamp(new Date(2024, 0, 15, 2, 30, 5))).toBe('20240115_023005');
  });
});

describe('command summaries', () => {
  const stats = {
    backupId: 1,
    filename: 'full20240101-0000.zip',
    backupDate: '2024-01-01T00:00:00',
    charterCount: 10,
    appeared: 2,
    disappeared: 3,
    reappeared: 1,
    discrepancies: 0,
    skippedDescriptors: 0,
    durationSeconds: 1.5,
  };

  it('describes one applied backup', () => {
    expect(formatBackupLine(stats)).toBe(
      'full20240101-0000.zip: 10 charters, +2 new, 1 reappeared, -3 disappeared, 0 discrepancies (1.5s)'
    );
  });

  it('summarizes a sync run with failures', () => {
    const output = formatSyncSummary({
      available: 4,
      selected: 3,
      alreadyProcessed: 1,
      processed: [stats],
      failures: [{ filename: 'full20240108-0000.zip', error: 'connection reset' }],
      aborted: false,
    });

    expect(output.split('\n')).toEqual([
      '',
      'Backups available: 4',
      'Selected:          3',
      'Already processed: 1',
      'Processed now:     1',
      'Failed:            1',
      '',
      'Failures:',
      '  full20240108-0000.zip: connection reset',
    ]);
  });

  it('mentions an interrupted sync', () => {
    const output = formatSyncSummary({
      available: 2,
      selected: 2,
      alreadyProcessed: 0,
      processed: [],
      failures: [],
      aborted: true,
    });

    expect(output.split('\n').slice(-1)).toEqual([
      'Sync was interrupted; remaining backups are processed on the next run.',
    ]);
  });

  it('prints the statistics block', () => {
    expect(
      formatStats({
        processedBackups: 3,
        totalCharters: 12,
        missingCharters: 2,
        disappearanceEvents: 4,
        totalDiscrepancies: 1,
      })
    ).toBe(
      [
        'Charter Tracking Statistics',
        '',
        'Processed backups:    3',
        'Total charters:       12',
        'Missing charters:     2',
        'Disappearance events: 4',
        'Discrepancies:        1',
      ].join('\n')
    );
  });
});
