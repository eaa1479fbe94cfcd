/**
 * @fileoverview Revenue observation and ranking types.
 *
 * Pure data structures with no I/O. Monetary amounts are decimal.js values so
 * that summing hundreds of thousands of daily figures stays exact.
 *
 * @module @boxoffice/contracts/revenue
 */

import type Decimal from 'decimal.js';

/**
 * One row of input: revenue for one title on one date.
 *
 * @invariant id, observationDate and title are non-empty
 * @invariant revenue >= 0
 * @invariant theaterCount === null ⇔ hasValidTheaterCount === false
 * @invariant distributor === null ⇔ hasValidDistributor === false
 */
export interface RevenueObservation {
  readonly id: string;

  /** ISO calendar date (YYYY-MM-DD) */
  readonly observationDate: string;

  /** Aggregation key, trimmed but otherwise verbatim */
  readonly title: string;

  readonly revenue: Decimal;

  readonly theaterCount: number | null;
  readonly distributor: string | null;

  readonly hasValidTheaterCount: boolean;
  readonly hasValidDistributor: boolean;
}

/**
 * A distinct title aggregated across all of its observations.
 *
 * @invariant firstObservedDate <= lastObservedDate
 * @invariant observationCount >= 1
 */
export interface RankedEntity {
  readonly title: string;
  readonly totalRevenue: Decimal;
  readonly firstObservedDate: string;
  readonly lastObservedDate: string;
  readonly observationCount: number;
}

/**
 * Data-quality counters collected while ingesting the revenue file.
 *
 * Issues counted here never abort a run.
 */
export interface DataQualityReport {
  rowsProcessed: number;
  rowsSkipped: number;
  zeroRevenue: number;
  emptyTheaters: number;
  missingDistributor: number;
}

/**
 * Creates a zeroed data-quality report.
 */
export function createDataQualityReport(): DataQualityReport {
  return {
    rowsProcessed: 0,
    rowsSkipped: 0,
    zeroRevenue: 0,
    emptyTheaters: 0,
    missingDistributor: 0,
  };
}
