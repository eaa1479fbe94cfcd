/**
 * @fileoverview Public API exports for @boxoffice/revenue-core
 *
 * @module @boxoffice/revenue-core
 */

export { RevenueAggregator, aggregateRevenue, sumTotals } from './aggregate.js';
export type { AggregateOptions } from './aggregate.js';

export { Money } from './money.js';

export { parseRevenueRow, readRevenueObservations, RowParseError } from './ingest.js';
export type { RevenueRow, QualityTracker, ReadRevenueOptions } from './ingest.js';
