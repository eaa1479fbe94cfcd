import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  createDataQualityReport,
  isInputFileNotFoundError,
  type RevenueObservation,
} from '@boxoffice/contracts';
import { createSilentLogger } from '@boxoffice/logger';
import { parseRevenueRow, readRevenueObservations, RowParseError } from '../src/ingest.js';

const VALID_ROW = {
  id: '1',
  date: '2020-01-01',
  title: 'Heat',
  revenue: '1500.25',
  theaters: '12',
  distributor: 'Warner Bros.',
};

describe('parseRevenueRow', () => {
  it('parses a complete row', () => {
    const tracker = createDataQualityReport();
    const observation = parseRevenueRow(VALID_ROW, tracker);

    expect(observation).toMatchObject({
      id: '1',
      observationDate: '2020-01-01',
      title: 'Heat',
      theaterCount: 12,
      distributor: 'Warner Bros.',
      hasValidTheaterCount: true,
      hasValidDistributor: true,
    });
    expect(observation.revenue.toString()).toBe('1500.25');
    expect(tracker).toEqual(createDataQualityReport());
  });

  it('trims surrounding whitespace', () => {
    const observation = parseRevenueRow({ ...VALID_ROW, title: '  Heat  ', id: ' 7 ' }, createDataQualityReport());

    expect(observation.title).toBe('Heat');
    expect(observation.id).toBe('7');
  });

  it('treats blank revenue as zero and counts it', () => {
    const tracker = createDataQualityReport();
    const observation = parseRevenueRow({ ...VALID_ROW, revenue: '' }, tracker);

    expect(observation.revenue.isZero()).toBe(true);
    expect(tracker.zeroRevenue).toBe(1);
  });

  it('counts a literal zero revenue', () => {
    const tracker = createDataQualityReport();
    parseRevenueRow({ ...VALID_ROW, revenue: '0' }, tracker);

    expect(tracker.zeroRevenue).toBe(1);
  });

  it('maps blank theaters to null with its validity flag', () => {
    const tracker = createDataQualityReport();
    const observation = parseRevenueRow({ ...VALID_ROW, theaters: '  ' }, tracker);

    expect(observation.theaterCount).toBeNull();
    expect(observation.hasValidTheaterCount).toBe(false);
    expect(tracker.emptyTheaters).toBe(1);
  });

  it.each(['', '-'])('maps distributor %j to null', (distributor) => {
    const tracker = createDataQualityReport();
    const observation = parseRevenueRow({ ...VALID_ROW, distributor }, tracker);

    expect(observation.distributor).toBeNull();
    expect(observation.hasValidDistributor).toBe(false);
    expect(tracker.missingDistributor).toBe(1);
  });

  it('treats an absent column like a blank one', () => {
    const tracker = createDataQualityReport();
    const observation = parseRevenueRow({ id: '1', date: '2020-01-01', title: 'Heat' }, tracker);

    expect(observation.revenue.isZero()).toBe(true);
    expect(tracker).toMatchObject({ zeroRevenue: 1, emptyTheaters: 1, missingDistributor: 1 });
  });

  const rejected: Array<{ override: Record<string, string>; message: string }> = [
    { override: { id: '' }, message: 'Missing id' },
    { override: { date: ' ' }, message: 'Missing date' },
    { override: { title: '' }, message: 'Missing title' },
    { override: { date: '2020-02-30' }, message: 'Invalid date format: 2020-02-30' },
    { override: { date: '01/02/2020' }, message: 'Invalid date format: 01/02/2020' },
    { override: { revenue: 'abc' }, message: 'Invalid revenue: abc' },
    { override: { revenue: '-5' }, message: 'Invalid revenue: -5' },
    { override: { revenue: '1e3' }, message: 'Invalid revenue: 1e3' },
    { override: { theaters: '3.5' }, message: 'Invalid theater count: 3.5' },
    { override: { theaters: '-1' }, message: 'Invalid theater count: -1' },
  ];

  it.each(rejected)('rejects with "$message"', ({ override, message }) => {
    const parse = () => parseRevenueRow({ ...VALID_ROW, ...override }, createDataQualityReport());

    expect(parse).toThrow(RowParseError);
    expect(parse).toThrow(message);
  });
});

describe('readRevenueObservations', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'revenue-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  async function writeCsv(lines: string[]): Promise<string> {
    const file = path.join(dir, 'revenues.csv');
    await fs.promises.writeFile(file, `${lines.join('\n')}\n`, 'utf8');
    return file;
  }

  async function collect(iterable: AsyncIterable<RevenueObservation>): Promise<RevenueObservation[]> {
    const out: RevenueObservation[] = [];
    for await (const item of iterable) {
      out.push(item);
    }
    return out;
  }

  const LINES = [
    'id,date,title,revenue,theaters,distributor',
    '1,2020-01-01,Heat,100.50,12,Warner Bros.',
    '2,2020-01-02,Heat,,,-',
    '3,,Missing Date,5,1,X',
    '4,2020-02-30,Bad Date,5,1,X',
    '5,2020-01-03,Ronin,abc,1,X',
    '6,2020-01-03,"Crouching Tiger, Hidden Dragon",7,,',
  ];

  it('yields parseable rows and skips the rest', async () => {
    const file = await writeCsv(LINES);
    const report = createDataQualityReport();

    const observations = await collect(readRevenueObservations(file, { report }));

    expect(observations.map((o) => o.id)).toEqual(['1', '2', '6']);
    expect(observations[2]?.title).toBe('Crouching Tiger, Hidden Dragon');
    expect(report).toEqual({
      rowsProcessed: 3,
      rowsSkipped: 3,
      zeroRevenue: 1,
      emptyTheaters: 2,
      missingDistributor: 2,
    });
  });

  it('logs skipped rows with their row number', async () => {
    const file = await writeCsv(LINES);
    const logger = createSilentLogger();
    const warn = vi.spyOn(logger, 'warn');

    await collect(readRevenueObservations(file, { logger }));

    expect(warn).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenNthCalledWith(1, 'Skipping unparseable row', { row: 4, reason: 'Missing date' });
    expect(warn).toHaveBeenNthCalledWith(3, 'Skipping unparseable row', { row: 6, reason: 'Invalid revenue: abc' });
  });

  it('drops zero-revenue rows when asked', async () => {
    const file = await writeCsv(LINES);
    const report = createDataQualityReport();

    const observations = await collect(readRevenueObservations(file, { skipZeroRevenue: true, report }));

    expect(observations.map((o) => o.id)).toEqual(['1', '6']);
    expect(report.rowsProcessed).toBe(2);
    expect(report.rowsSkipped).toBe(4);
  });

  it('can be iterated again from the start', async () => {
    const file = await writeCsv(LINES);

    const first = await collect(readRevenueObservations(file));
    const second = await collect(readRevenueObservations(file));

    expect(second.map((o) => o.id)).toEqual(first.map((o) => o.id));
  });

  it('raises InputFileNotFoundError for a missing file', async () => {
    const missing = path.join(dir, 'absent.csv');

    const error: unknown = await readRevenueObservations(missing)
      .next()
      .then(
        () => undefined,
        (reason: unknown) => reason
      );

    expect(isInputFileNotFoundError(error)).toBe(true);
    expect(error).toHaveProperty('message', `Input file not found: ${missing}`);
  });
});
