import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import type { RevenueObservation } from '@boxoffice/contracts';
import { RevenueAggregator, aggregateRevenue, sumTotals } from '../src/aggregate.js';

function observation(id: string, observationDate: string, title: string, revenue: string): RevenueObservation {
  return {
    id,
    observationDate,
    title,
    revenue: new Decimal(revenue),
    theaterCount: null,
    distributor: null,
    hasValidTheaterCount: false,
    hasValidDistributor: false,
  };
}

function summarize(entities: Awaited<ReturnType<typeof aggregateRevenue>>) {
  return entities.map((e) => [e.title, e.totalRevenue.toString(), e.firstObservedDate, e.lastObservedDate]);
}

describe('aggregateRevenue', () => {
  it('ranks titles by total revenue with their date ranges', async () => {
    const ranked = await aggregateRevenue([
      observation('1', '2020-01-01', 'A', '100'),
      observation('2', '2020-01-02', 'A', '50'),
      observation('3', '2020-01-01', 'B', '200'),
    ]);

    expect(summarize(ranked)).toEqual([
      ['B', '200', '2020-01-01', '2020-01-01'],
      ['A', '150', '2020-01-01', '2020-01-02'],
    ]);
    expect(ranked.map((e) => e.observationCount)).toEqual([1, 2]);
  });

  it('consumes async iterables', async () => {
    async function* source() {
      yield observation('1', '2021-03-01', 'Heat', '10');
      yield observation('2', '2021-03-02', 'Heat', '15');
    }

    const ranked = await aggregateRevenue(source());

    expect(summarize(ranked)).toEqual([['Heat', '25', '2021-03-01', '2021-03-02']]);
  });

  it('sums exactly without binary floating point drift', async () => {
    const ranked = await aggregateRevenue([
      observation('1', '2020-01-01', 'A', '0.1'),
      observation('2', '2020-01-02', 'A', '0.2'),
    ]);

    expect(ranked[0]?.totalRevenue.toString()).toBe('0.3');
  });

  it('keeps every digit of totals wider than 20 significant digits', async () => {
    const ranked = await aggregateRevenue([
      observation('1', '2020-01-01', 'A', '1000000000000000000.01'),
      observation('2', '2020-01-02', 'A', '0.01'),
      observation('3', '2020-01-01', 'B', '99999999999999999999.99'),
      observation('4', '2020-01-02', 'B', '0.01'),
    ]);

    expect(ranked.map((e) => [e.title, e.totalRevenue.toFixed()])).toEqual([
      ['B', '100000000000000000000'],
      ['A', '1000000000000000000.02'],
    ]);
    expect(sumTotals(ranked).toFixed()).toBe('101000000000000000000.02');
  });

  it('conserves total revenue across titles', async () => {
    const observations = [
      observation('1', '2020-01-05', 'A', '10.25'),
      observation('2', '2020-01-01', 'B', '3'),
      observation('3', '2020-01-03', 'A', '7.75'),
      observation('4', '2020-01-02', 'C', '0'),
      observation('5', '2020-01-04', 'B', '1.5'),
    ];

    const ranked = await aggregateRevenue(observations);

    const inputTotal = observations.reduce((sum, o) => sum.plus(o.revenue), new Decimal(0));
    expect(sumTotals(ranked).equals(inputTotal)).toBe(true);
    expect(new Set(ranked.map((e) => e.title)).size).toBe(ranked.length);
  });

  it('widens date ranges regardless of input order', async () => {
    const ranked = await aggregateRevenue([
      observation('1', '2020-01-05', 'A', '1'),
      observation('2', '2020-01-01', 'A', '1'),
      observation('3', '2020-01-09', 'A', '1'),
      observation('4', '2020-01-03', 'A', '1'),
    ]);

    expect(ranked[0]?.firstObservedDate).toBe('2020-01-01');
    expect(ranked[0]?.lastObservedDate).toBe('2020-01-09');
  });

  it('keeps first-encountered order among equal totals', async () => {
    const ranked = await aggregateRevenue([
      observation('1', '2020-01-01', 'Zeta', '50'),
      observation('2', '2020-01-01', 'Alpha', '20'),
      observation('3', '2020-01-01', 'Mu', '50'),
      observation('4', '2020-01-02', 'Alpha', '30'),
    ]);

    expect(ranked.map((e) => e.title)).toEqual(['Zeta', 'Alpha', 'Mu']);
  });

  it('truncates to topN and ignores non-positive values', async () => {
    const observations = [
      observation('1', '2020-01-01', 'A', '3'),
      observation('2', '2020-01-01', 'B', '2'),
      observation('3', '2020-01-01', 'C', '1'),
    ];

    expect((await aggregateRevenue(observations, { topN: 2 })).map((e) => e.title)).toEqual(['A', 'B']);
    expect(await aggregateRevenue(observations, { topN: 0 })).toHaveLength(3);
    expect(await aggregateRevenue(observations, { topN: -1 })).toHaveLength(3);
    expect(await aggregateRevenue(observations, { topN: 10 })).toHaveLength(3);
  });

  it('returns an empty ranking for no input', async () => {
    expect(await aggregateRevenue([])).toEqual([]);
  });
});

describe('RevenueAggregator', () => {
  it('aggregates incrementally', () => {
    const aggregator = new RevenueAggregator();
    aggregator.add(observation('1', '2020-01-01', 'A', '5'));
    aggregator.addAll([observation('2', '2020-01-01', 'B', '9'), observation('3', '2020-01-02', 'A', '5')]);

    expect(aggregator.size).toBe(2);
    expect(summarize(aggregator.rank())).toEqual([
      ['A', '10', '2020-01-01', '2020-01-02'],
      ['B', '9', '2020-01-01', '2020-01-01'],
    ]);
  });
});
