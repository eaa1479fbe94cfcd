import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { isConfigurationError, isInputFileNotFoundError } from '@boxoffice/contracts';
import { withRunContext } from '@boxoffice/logger';
import { loadConfig, type Config } from '../src/config/index.js';
import { runPipeline } from '../src/pipeline.js';

const CSV = [
  'id,date,title,revenue,theaters,distributor',
  '1,2024-01-01,Heat,100.50,10,Studio A',
  '2,2024-01-02,Heat,200,10,Studio A',
  '3,2024-01-01,The Polar Express2017 IMAX Release,150,5,Studio B',
  '4,2024-01-01,Nowhere Film,50,,-',
  '',
].join('\n');

const BODIES: Record<string, unknown> = {
  Heat: { Response: 'True', Title: 'Heat', Year: '1995', imdbRating: '8.3', Metascore: 'N/A' },
  'The Polar Express2017 IMAX Release': { Response: 'False', Error: 'Movie not found!' },
};

function omdbFetch() {
  return vi.fn(async (input: string | URL | Request, _init?: RequestInit) => {
    const title = new URL(String(input)).searchParams.get('t') ?? '';
    return new Response(JSON.stringify(BODIES[title] ?? { Response: 'False', Error: 'Movie not found!' }), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });
}

describe('runPipeline', () => {
  let dir: string;
  let csvPath: string;
  let cachePath: string;

  function config(env: NodeJS.ProcessEnv = {}): Config {
    return loadConfig({
      env: {
        OMDB_API_KEY: 'test-secret',
        REVENUES_CSV_PATH: csvPath,
        OMDB_CACHE_PATH: cachePath,
        WAREHOUSE_URL: 'sqlite::memory:',
        TOP_N_MOVIES: '2',
        ...env,
      },
    });
  }

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'boxoffice-pipeline-'));
    csvPath = path.join(dir, 'revenues.csv');
    cachePath = path.join(dir, 'cache', 'omdb_cache.json');
    await fs.promises.writeFile(csvPath, CSV, 'utf8');
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('ranks, enriches and loads the warehouse', async () => {
    const fetchMock = omdbFetch();

    const report = await withRunContext(
      () => runPipeline(config(), { fetch: fetchMock, sleep: async () => {} }),
      'run-123'
    );

    expect(report.runId).toBe('run-123');
    expect(report.dataQuality).toEqual({
      rowsProcessed: 4,
      rowsSkipped: 0,
      zeroRevenue: 0,
      emptyTheaters: 1,
      missingDistributor: 1,
    });
    expect(report.ranked).toBe(2);
    expect(report.rankedRevenue).toBe('450.5');
    expect(report.enrichment).toEqual({
      processed: 2,
      matched: 1,
      notFound: 1,
      errored: 0,
      skipped: 0,
      cacheHits: 0,
      networkLookups: 2,
      totalCached: 2,
      cachedMatches: 1,
      cachedNotFound: 1,
      cachedErrors: 0,
      callsMade: 2,
      callsRemaining: 998,
    });
    expect(report.cancelled).toBe(false);
    expect(report.warehouse).toEqual({
      revenuesLoaded: 4,
      moviesLoaded: 1,
      validation: {
        revenues: {
          ok: true,
          value: {
            rowCount: 4,
            uniqueTitles: 3,
            uniqueDates: 2,
            minDate: '2024-01-01',
            maxDate: '2024-01-02',
            totalRevenue: '500.5',
          },
        },
        movies: { ok: true, value: { rowCount: 1, matched: 1, withRating: 1 } },
      },
    });
    expect(Object.keys(report.timings)).toEqual(['aggregate', 'enrich', 'load']);

    const secondUrl = new URL(String(fetchMock.mock.calls[1]?.[0]));
    expect(secondUrl.searchParams.get('y')).toBe('2017');

    const cached: Record<string, unknown> = JSON.parse(await fs.promises.readFile(cachePath, 'utf8'));
    expect(Object.keys(cached)).toEqual(['heat', 'the polar express2017 imax release|2017']);
    expect(fs.existsSync(`${cachePath}.lock`)).toBe(false);
  });

  it('answers a rerun from the cache', async () => {
    const fetchMock = omdbFetch();
    await runPipeline(config(), { fetch: fetchMock });

    const report = await runPipeline(config(), { fetch: fetchMock });

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(report.enrichment.cacheHits).toBe(2);
    expect(report.enrichment.networkLookups).toBe(0);
    expect(report.warehouse?.moviesLoaded).toBe(1);
  });

  it('skips the warehouse on a dry run', async () => {
    const report = await runPipeline(config({ DRY_RUN: 'true' }), { fetch: omdbFetch() });

    expect(report.warehouse).toBeUndefined();
    expect(report.enrichment.matched).toBe(1);
    expect(Object.keys(report.timings)).toEqual(['aggregate', 'enrich']);
  });

  it('fails before any lookup when the revenue file is missing', async () => {
    const fetchMock = omdbFetch();

    const error = await runPipeline(config({ REVENUES_CSV_PATH: path.join(dir, 'missing.csv') }), {
      fetch: fetchMock,
    }).catch((caught: unknown) => caught);

    expect(isInputFileNotFoundError(error)).toBe(true);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('requires an API key before opening the cache', async () => {
    const error = await runPipeline(loadConfig({ env: { REVENUES_CSV_PATH: csvPath, OMDB_CACHE_PATH: cachePath } }), {
      fetch: omdbFetch(),
    }).catch((caught: unknown) => caught);

    expect(isConfigurationError(error)).toBe(true);
    expect(fs.existsSync(cachePath)).toBe(false);
  });

  it('skips the warehouse when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    const report = await runPipeline(config(), { fetch: omdbFetch(), signal: controller.signal });

    expect(report.cancelled).toBe(true);
    expect(report.enrichment.processed).toBe(0);
    expect(report.warehouse).toBeUndefined();
  });
});
