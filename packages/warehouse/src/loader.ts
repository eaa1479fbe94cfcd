/**
 * Full-replace loads into the two staging tables.
 *
 * Each load deletes the table contents and inserts the new rows inside one
 * transaction, so a failed load leaves the previous contents in place.
 */

import type { EnrichedMetadata, RevenueObservation } from '@boxoffice/contracts'
import { createSilentLogger, startTimer, type Logger } from '@boxoffice/logger'
import type { DbConnection, DbRow } from './connect.js'

export const REVENUES_TABLE = 'stg_revenues_raw'
export const MOVIES_TABLE = 'stg_movies_enriched'

/**
 * Bound parameters per INSERT stay below SQLite's historical limit of 999
 */
const MAX_PARAMS_PER_INSERT = 900

const REVENUE_COLUMNS = [
  'id',
  'observation_date',
  'title',
  'revenue',
  'theaters',
  'distributor',
  'has_valid_theaters',
  'has_valid_distributor',
] as const

const MOVIE_COLUMNS = [
  'title',
  'year',
  'rated',
  'released',
  'runtime',
  'genre',
  'director',
  'actors',
  'plot',
  'language',
  'country',
  'awards',
  'poster_url',
  'metascore',
  'imdb_rating',
  'imdb_votes',
  'imdb_id',
  'box_office',
  'enriched_at',
  'result_kind',
] as const

/**
 * DDL for both staging tables. Revenue is TEXT on SQLite, whose NUMERIC
 * affinity would round it through a double.
 */
export function schemaSql(dbType: DbConnection['dbType']): string {
  const postgres = dbType === 'postgres'
  const decimal = postgres ? 'NUMERIC' : 'TEXT'
  const date = postgres ? 'DATE' : 'TEXT'
  const bool = postgres ? 'BOOLEAN' : 'INTEGER'
  const float = postgres ? 'DOUBLE PRECISION' : 'REAL'
  const bigint = postgres ? 'BIGINT' : 'INTEGER'

  return `
CREATE TABLE IF NOT EXISTS ${REVENUES_TABLE} (
  id TEXT PRIMARY KEY,
  observation_date ${date} NOT NULL,
  title TEXT NOT NULL,
  revenue ${decimal} NOT NULL,
  theaters INTEGER,
  distributor TEXT,
  has_valid_theaters ${bool} NOT NULL,
  has_valid_distributor ${bool} NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_${REVENUES_TABLE}_title ON ${REVENUES_TABLE} (title);

CREATE TABLE IF NOT EXISTS ${MOVIES_TABLE} (
  title TEXT NOT NULL,
  year TEXT,
  rated TEXT,
  released TEXT,
  runtime TEXT,
  genre TEXT,
  director TEXT,
  actors TEXT,
  plot TEXT,
  language TEXT,
  country TEXT,
  awards TEXT,
  poster_url TEXT,
  metascore INTEGER,
  imdb_rating ${float},
  imdb_votes ${bigint},
  imdb_id TEXT,
  box_office TEXT,
  enriched_at TEXT NOT NULL,
  result_kind TEXT NOT NULL
);
`
}

export interface RevenueTableSummary {
  rowCount: number
  uniqueTitles: number
  uniqueDates: number
  minDate: string | null
  maxDate: string | null
  /** Decimal string; null for an empty table */
  totalRevenue: string | null
}

export interface MovieTableSummary {
  rowCount: number
  matched: number
  withRating: number
}

/**
 * Outcome of one validation query
 */
export type ValidationSection<T> = { ok: true; value: T } | { ok: false; error: string }

export interface LoadValidation {
  revenues: ValidationSection<RevenueTableSummary>
  movies: ValidationSection<MovieTableSummary>
}

function revenueRow(observation: RevenueObservation): unknown[] {
  return [
    observation.id,
    observation.observationDate,
    observation.title,
    observation.revenue.toFixed(),
    observation.theaterCount,
    observation.distributor,
    observation.hasValidTheaterCount,
    observation.hasValidDistributor,
  ]
}

function movieRow(movie: EnrichedMetadata): unknown[] {
  return [
    movie.title,
    movie.year,
    movie.rated,
    movie.released,
    movie.runtime,
    movie.genre,
    movie.director,
    movie.actors,
    movie.plot,
    movie.language,
    movie.country,
    movie.awards,
    movie.posterUrl,
    movie.metascore,
    movie.imdbRating,
    movie.imdbVotes,
    movie.imdbId,
    movie.boxOffice,
    movie.enrichedAt,
    movie.resultKind,
  ]
}

function toCount(value: unknown): number {
  if (typeof value === 'number') return value
  // PostgreSQL returns COUNT and SUM over integers as strings
  if (typeof value === 'string' || typeof value === 'bigint') return Number(value)
  return 0
}

function toText(value: unknown): string | null {
  if (value === null || value === undefined) return null
  return String(value)
}

function firstRow(rows: DbRow[]): DbRow {
  return rows[0] ?? {}
}

/**
 * Loads pipeline output into the staging tables.
 *
 * @example
 * const db = await connect(config.warehouse.url, { logger })
 * const loader = new WarehouseLoader(db, { logger })
 * await loader.ensureSchema()
 * await loader.loadRevenues(readRevenueObservations(config.input.csvPath))
 * await loader.loadMovies(result.enriched)
 * const validation = await loader.validateLoad()
 */
export class WarehouseLoader {
  private readonly logger: Logger

  constructor(
    private readonly db: DbConnection,
    options: { logger?: Logger } = {}
  ) {
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'warehouse-loader' })
  }

  async ensureSchema(): Promise<void> {
    await this.db.execScript(schemaSql(this.db.dbType))
    this.logger.debug('Staging schema ensured', { tables: [REVENUES_TABLE, MOVIES_TABLE] })
  }

  /**
   * Replaces the revenue staging table with the given observations.
   *
   * @returns Rows loaded
   */
  async loadRevenues(
    observations: Iterable<RevenueObservation> | AsyncIterable<RevenueObservation>
  ): Promise<number> {
    return this.replace(REVENUES_TABLE, REVENUE_COLUMNS, observations, revenueRow)
  }

  /**
   * Replaces the movie staging table with the given metadata.
   *
   * @returns Rows loaded
   */
  async loadMovies(movies: Iterable<EnrichedMetadata> | AsyncIterable<EnrichedMetadata>): Promise<number> {
    return this.replace(MOVIES_TABLE, MOVIE_COLUMNS, movies, movieRow)
  }

  /**
   * Summarizes both tables. A failing query is reported in its section
   * rather than thrown.
   */
  async validateLoad(): Promise<LoadValidation> {
    const revenues = await this.section('revenues', async (): Promise<RevenueTableSummary> => {
      const row = firstRow(
        await this.db.query(`
          SELECT
            COUNT(*) AS row_count,
            COUNT(DISTINCT title) AS unique_titles,
            COUNT(DISTINCT observation_date) AS unique_dates,
            CAST(MIN(observation_date) AS TEXT) AS min_date,
            CAST(MAX(observation_date) AS TEXT) AS max_date,
            CAST(SUM(CAST(revenue AS NUMERIC)) AS TEXT) AS total_revenue
          FROM ${REVENUES_TABLE}
        `)
      )
      return {
        rowCount: toCount(row['row_count']),
        uniqueTitles: toCount(row['unique_titles']),
        uniqueDates: toCount(row['unique_dates']),
        minDate: toText(row['min_date']),
        maxDate: toText(row['max_date']),
        totalRevenue: toText(row['total_revenue']),
      }
    })

    const movies = await this.section('movies', async (): Promise<MovieTableSummary> => {
      const row = firstRow(
        await this.db.query(`
          SELECT
            COUNT(*) AS row_count,
            SUM(CASE WHEN result_kind = 'match' THEN 1 ELSE 0 END) AS matched,
            SUM(CASE WHEN imdb_rating IS NOT NULL THEN 1 ELSE 0 END) AS with_rating
          FROM ${MOVIES_TABLE}
        `)
      )
      return {
        rowCount: toCount(row['row_count']),
        matched: toCount(row['matched']),
        withRating: toCount(row['with_rating']),
      }
    })

    return { revenues, movies }
  }

  private async section<T>(name: string, run: () => Promise<T>): Promise<ValidationSection<T>> {
    try {
      const value = await run()
      this.logger.info(`Validated ${name}`, { validation: value })
      return { ok: true, value }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.logger.error(`Validation of ${name} failed`, { error: message })
      return { ok: false, error: message }
    }
  }

  private async replace<T>(
    table: string,
    columns: readonly string[],
    records: Iterable<T> | AsyncIterable<T>,
    toRow: (record: T) => unknown[]
  ): Promise<number> {
    const timer = startTimer()
    const rowsPerInsert = Math.max(1, Math.floor(MAX_PARAMS_PER_INSERT / columns.length))
    const rowPlaceholder = `(${columns.map(() => '?').join(', ')})`

    const loaded = await this.db.transaction(async (tx) => {
      await tx.exec(`DELETE FROM ${table}`)

      let count = 0
      let batch: unknown[][] = []

      const flush = async (): Promise<void> => {
        if (batch.length === 0) return
        const sql =
          `INSERT INTO ${table} (${columns.join(', ')}) VALUES ` +
          batch.map(() => rowPlaceholder).join(', ')
        await tx.exec(sql, batch.flat())
        count += batch.length
        batch = []
      }

      for await (const record of records) {
        batch.push(toRow(record))
        if (batch.length >= rowsPerInsert) {
          await flush()
        }
      }
      await flush()

      return count
    })

    this.logger.info(`Loaded ${table}`, { table, count: loaded, duration_ms: timer.stop() })
    return loaded
  }
}
