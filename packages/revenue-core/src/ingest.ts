/**
 * Revenue file ingestion.
 *
 * Parses a header-bearing, comma-delimited revenue file into
 * RevenueObservation values. Rows that cannot be parsed are logged and
 * skipped; blank optional fields are data-quality issues, counted in a
 * DataQualityReport rather than raised.
 */

import fs from 'node:fs';
import type Decimal from 'decimal.js';
import Papa from 'papaparse';
import {
  BoxOfficeError,
  InputFileNotFoundError,
  createDataQualityReport,
  type DataQualityReport,
  type RevenueObservation,
} from '@boxoffice/contracts';
import { createSilentLogger, type Logger } from '@boxoffice/logger';
import { Money } from './money.js';

/**
 * Raised by parseRevenueRow for a row that cannot become an observation.
 * Never fatal: the reader logs it and moves on.
 */
export class RowParseError extends BoxOfficeError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('ROW_PARSE_FAILED', message, data);
  }
}

/** One data row keyed by header name */
export type RevenueRow = Readonly<Record<string, string | undefined>>;

/** Counters parseRevenueRow increments */
export type QualityTracker = Pick<DataQualityReport, 'zeroRevenue' | 'emptyTheaters' | 'missingDistributor'>;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DECIMAL_LITERAL = /^\d+(\.\d+)?$/;
const INTEGER_LITERAL = /^\d+$/;

function field(row: RevenueRow, name: string): string {
  return (row[name] ?? '').trim();
}

function isCalendarDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) {
    return false;
  }
  const date = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  return date.toISOString().slice(0, 10) === value;
}

/**
 * Parses one row.
 *
 * @throws RowParseError when id, date or title is missing, the date is not
 *   a calendar date, or revenue/theaters are not non-negative numbers
 *
 * @example
 * ```typescript
 * const tracker = createDataQualityReport();
 * const observation = parseRevenueRow(
 *   { id: '1', date: '2020-01-01', title: 'Heat', revenue: '', theaters: '', distributor: '-' },
 *   tracker
 * );
 * // observation.revenue.isZero() === true, tracker.zeroRevenue === 1
 * ```
 */
export function parseRevenueRow(row: RevenueRow, tracker: QualityTracker): RevenueObservation {
  const id = field(row, 'id');
  if (!id) {
    throw new RowParseError('Missing id');
  }

  const observationDate = field(row, 'date');
  if (!observationDate) {
    throw new RowParseError('Missing date');
  }

  const title = field(row, 'title');
  if (!title) {
    throw new RowParseError('Missing title');
  }

  if (!isCalendarDate(observationDate)) {
    throw new RowParseError(`Invalid date format: ${observationDate}`, { date: observationDate });
  }

  const revenueText = field(row, 'revenue');
  let revenue: Decimal;
  if (revenueText === '' || revenueText === '0') {
    tracker.zeroRevenue += 1;
    revenue = new Money(0);
  } else if (DECIMAL_LITERAL.test(revenueText)) {
    revenue = new Money(revenueText);
  } else {
    throw new RowParseError(`Invalid revenue: ${revenueText}`, { revenue: revenueText });
  }

  const theatersText = field(row, 'theaters');
  let theaterCount: number | null = null;
  if (theatersText === '') {
    tracker.emptyTheaters += 1;
  } else if (INTEGER_LITERAL.test(theatersText)) {
    theaterCount = Number.parseInt(theatersText, 10);
  } else {
    throw new RowParseError(`Invalid theater count: ${theatersText}`, { theaters: theatersText });
  }

  const distributorText = field(row, 'distributor');
  let distributor: string | null = null;
  if (distributorText === '' || distributorText === '-') {
    tracker.missingDistributor += 1;
  } else {
    distributor = distributorText;
  }

  return {
    id,
    observationDate,
    title,
    revenue,
    theaterCount,
    distributor,
    hasValidTheaterCount: theaterCount !== null,
    hasValidDistributor: distributor !== null,
  };
}

export interface ReadRevenueOptions {
  /** Drop observations whose revenue is zero (counted as skipped) */
  skipZeroRevenue?: boolean;
  logger?: Logger;
  /** Receives the final counters once iteration completes */
  report?: DataQualityReport;
}

function toRow(value: unknown): RevenueRow {
  const row: Record<string, string | undefined> = {};
  if (typeof value === 'object' && value !== null) {
    for (const [key, cell] of Object.entries(value)) {
      if (typeof cell === 'string') {
        row[key] = cell;
      }
    }
  }
  return row;
}

async function assertReadable(path: string): Promise<void> {
  try {
    const stats = await fs.promises.stat(path);
    if (!stats.isFile()) {
      throw new InputFileNotFoundError(path);
    }
  } catch (error) {
    if (error instanceof InputFileNotFoundError) {
      throw error;
    }
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new InputFileNotFoundError(path);
    }
    throw error;
  }
}

/**
 * Streams observations from a revenue file. Each call re-opens the file, so
 * the sequence can be iterated more than once.
 *
 * @throws InputFileNotFoundError when the file does not exist
 *
 * @example
 * ```typescript
 * const report = createDataQualityReport();
 * for await (const observation of readRevenueObservations('revenues.csv', { report })) {
 *   aggregator.add(observation);
 * }
 * logger.info('Ingestion complete', report);
 * ```
 */
export async function* readRevenueObservations(
  path: string,
  options: ReadRevenueOptions = {}
): AsyncGenerator<RevenueObservation> {
  const logger = options.logger ?? createSilentLogger();
  const report = options.report ?? createDataQualityReport();

  await assertReadable(path);

  const parser = Papa.parse(Papa.NODE_STREAM_INPUT, {
    header: true,
    delimiter: ',',
    skipEmptyLines: 'greedy',
  });
  const source = fs.createReadStream(path, { encoding: 'utf8' });
  source.on('error', (error) => parser.destroy(error));

  // Header is row 1
  let rowNumber = 1;

  try {
    for await (const chunk of source.pipe(parser)) {
      rowNumber += 1;
      const row = toRow(chunk);

      let observation: RevenueObservation;
      try {
        observation = parseRevenueRow(row, report);
      } catch (error) {
        if (!(error instanceof RowParseError)) {
          throw error;
        }
        logger.warn('Skipping unparseable row', { row: rowNumber, reason: error.message });
        report.rowsSkipped += 1;
        continue;
      }

      if (options.skipZeroRevenue && observation.revenue.isZero()) {
        report.rowsSkipped += 1;
        continue;
      }

      report.rowsProcessed += 1;
      yield observation;
    }
  } finally {
    source.destroy();
  }

  logger.info('Revenue file parsed', { path, ...report });
}
