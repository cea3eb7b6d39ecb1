import fs from 'fs';
import os from 'os';
import path from 'path';
import { formatLogLine, formatSummary, parsePruneArgs, parseReportArgs, runPrune, runReport } from '../cli/report';
import { NdjsonSink, readNdjsonLogs } from '../store/ndjson-sink';
import { sampleRecords } from './helpers/records';

describe('parseReportArgs', () => {
  it('collects filters and accumulates repeated flags', () => {
    expect(
      parseReportArgs([
        'log.ndjson',
        '--status',
        '500',
        '--status',
        '404',
        '--method',
        'get',
        '--since',
        '2026-01-02T00:00:00Z',
        '--min-duration-ms',
        '250',
        '--limit',
        '5',
      ])
    ).toEqual({
      ok: true,
      value: {
        file: 'log.ndjson',
        query: {
          statusCodes: [500, 404],
          methods: ['GET'],
          from: new Date('2026-01-02T00:00:00Z'),
          minDurationMs: 250,
          limit: 5,
        },
      },
    });
  });

  it.each([
    [['--status'], 'Missing value for --status'],
    [['log.ndjson', '--status', 'abc'], '--status expects a number (got abc)'],
    [['log.ndjson', '--until', 'yesterday'], '--until expects an ISO date (got yesterday)'],
    [['log.ndjson', '--color', 'always'], 'Unknown report option: --color'],
    [['--url', 'orders'], 'report requires <log.ndjson>'],
  ])('rejects %j', (argv, error) => {
    expect(parseReportArgs(argv)).toEqual({ ok: false, error });
  });
});

describe('parsePruneArgs', () => {
  it('reads the file and the age', () => {
    expect(parsePruneArgs(['log.ndjson', '--older-than-days', '30'])).toEqual({
      ok: true,
      value: { file: 'log.ndjson', olderThanDays: 30 },
    });
  });

  it.each([
    [['log.ndjson'], 'prune requires --older-than-days <N>'],
    [['--older-than-days', '3'], 'prune requires <log.ndjson>'],
    [['log.ndjson', '--older-than-days', '-1'], '--older-than-days expects a non-negative number (got -1)'],
    [['log.ndjson', '--older-than-days'], '--older-than-days expects a non-negative number (got nothing)'],
    [['log.ndjson', '--force'], 'Unknown prune option: --force'],
  ])('rejects %j', (argv, error) => {
    expect(parsePruneArgs(argv)).toEqual({ ok: false, error });
  });
});

describe('report formatting', () => {
  it('formats the summary', () => {
    expect(formatSummary({ total: 4, successful: 2, failed: 2, successRate: 50, averageDurationMs: 462.5 })).toBe(
      '4 requests, 2 successful, 2 failed (50% success, avg 462.5ms)'
    );
  });

  it('formats a log line with its loggable and optional color', () => {
    const log = {
      id: '1',
      method: 'POST',
      url: 'https://api.example.com/orders',
      statusCode: 422,
      requestHeaders: {},
      responseHeaders: {},
      durationMs: 12.5,
      loggableType: 'Order',
      loggableId: '7',
      metadata: {},
      createdAt: '2026-01-02T00:00:00.000Z',
    };
    expect(formatLogLine(log)).toBe('2026-01-02T00:00:00.000Z POST 422 https://api.example.com/orders 12.5ms [Order#7]');
    expect(formatLogLine(log, true)).toBe(
      '2026-01-02T00:00:00.000Z POST \x1b[33m422\x1b[0m https://api.example.com/orders 12.5ms [Order#7]'
    );
  });
});

describe('runReport and runPrune', () => {
  let tmpDir: string;
  let file: string;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'recorder-report-'));
    file = path.join(tmpDir, 'outbound.ndjson');
    const sink = new NdjsonSink(file);
    for (const record of sampleRecords()) await sink.persist(record);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('prints the summary and matching logs newest first', async () => {
    const lines: string[] = [];
    const count = await runReport({ file, query: { methods: ['GET'] } }, { write: (line) => lines.push(line) });

    expect(count).toBe(2);
    expect(lines).toEqual([
      '2 requests, 1 successful, 1 failed (50% success, avg 650ms)',
      '2026-01-03T00:00:00.000Z GET 500 https://payments.example.com/charges 1200ms',
      '2026-01-01T00:00:00.000Z GET 200 https://api.example.com/users 100ms',
    ]);
  });

  it('colors status codes when asked', async () => {
    const lines: string[] = [];
    await runReport({ file, query: { statusCodes: [201] } }, { color: true, write: (line) => lines.push(line) });

    expect(lines).toEqual([
      '1 requests, 1 successful, 0 failed (100% success, avg 500ms)',
      '2026-01-02T00:00:00.000Z POST \x1b[32m201\x1b[0m https://api.example.com/orders 500ms [Order#7]',
    ]);
  });

  it('prunes logs older than the given number of days', async () => {
    const removed = await runPrune({ file, olderThanDays: 2 }, new Date('2026-01-05T00:00:00.000Z'));

    expect(removed).toBe(2);
    expect((await readNdjsonLogs(file)).map((log) => log.createdAt)).toEqual([
      '2026-01-03T00:00:00.000Z',
      '2026-01-04T00:00:00.000Z',
    ]);
  });
});
