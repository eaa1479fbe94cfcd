/**
 * Revenue aggregation and ranking.
 *
 * Groups revenue observations by title, sums revenue exactly with Decimal and
 * widens each title's observed date range. Ranking is a stable sort by total
 * revenue, descending, so titles with equal totals keep the order in which
 * they were first encountered.
 */

import type Decimal from 'decimal.js';
import type { RankedEntity, RevenueObservation } from '@boxoffice/contracts';
import { Money } from './money.js';

/**
 * Options for aggregateRevenue.
 */
export interface AggregateOptions {
  /**
   * Keep only the first N ranked titles. Absent, zero or negative means
   * no truncation.
   */
  topN?: number;
}

interface RunningTotal {
  title: string;
  total: Decimal;
  firstObservedDate: string;
  lastObservedDate: string;
  observationCount: number;
}

/**
 * Incremental aggregator holding one running total per distinct title.
 *
 * @example
 * ```typescript
 * const aggregator = new RevenueAggregator();
 * aggregator.addAll(observations);
 * const top = aggregator.rank(800);
 * ```
 */
export class RevenueAggregator {
  private readonly totals = new Map<string, RunningTotal>();

  /** Number of distinct titles seen so far */
  get size(): number {
    return this.totals.size;
  }

  add(observation: RevenueObservation): void {
    const existing = this.totals.get(observation.title);

    if (!existing) {
      this.totals.set(observation.title, {
        title: observation.title,
        total: new Money(observation.revenue),
        firstObservedDate: observation.observationDate,
        lastObservedDate: observation.observationDate,
        observationCount: 1,
      });
      return;
    }

    existing.total = existing.total.plus(observation.revenue);
    existing.observationCount += 1;

    // ISO dates order lexically
    if (observation.observationDate < existing.firstObservedDate) {
      existing.firstObservedDate = observation.observationDate;
    }
    if (observation.observationDate > existing.lastObservedDate) {
      existing.lastObservedDate = observation.observationDate;
    }
  }

  addAll(observations: Iterable<RevenueObservation>): void {
    for (const observation of observations) {
      this.add(observation);
    }
  }

  /**
   * Returns titles ranked by total revenue, descending.
   */
  rank(topN?: number): RankedEntity[] {
    // Map iteration follows insertion order and Array.prototype.sort is
    // stable, so ties stay in first-encountered order.
    const ranked = Array.from(this.totals.values()).sort((a, b) => b.total.comparedTo(a.total));

    const selected = topN !== undefined && topN > 0 ? ranked.slice(0, topN) : ranked;

    return selected.map((entry) => ({
      title: entry.title,
      totalRevenue: entry.total,
      firstObservedDate: entry.firstObservedDate,
      lastObservedDate: entry.lastObservedDate,
      observationCount: entry.observationCount,
    }));
  }
}

/**
 * Aggregates a lazy sequence of observations in a single pass and ranks
 * the distinct titles.
 *
 * @example
 * ```typescript
 * const ranked = await aggregateRevenue(readRevenueObservations('revenues.csv'), { topN: 800 });
 * ```
 */
export async function aggregateRevenue(
  observations: Iterable<RevenueObservation> | AsyncIterable<RevenueObservation>,
  options: AggregateOptions = {}
): Promise<RankedEntity[]> {
  const aggregator = new RevenueAggregator();

  for await (const observation of observations) {
    aggregator.add(observation);
  }

  return aggregator.rank(options.topN);
}

/**
 * Sum of all totals, for reconciling a ranking against its input.
 */
export function sumTotals(entities: readonly RankedEntity[]): Decimal {
  return entities.reduce((sum, entity) => sum.plus(entity.totalRevenue), new Money(0));
}
