/**
 * @boxoffice/warehouse - staging-table loads for SQLite and PostgreSQL
 */

export { connect, parseConnectionString, toPostgresPlaceholders } from './connect.js'
export type { DbConnection, DbRow, ConnectOptions } from './connect.js'

export { WarehouseLoader, schemaSql, REVENUES_TABLE, MOVIES_TABLE } from './loader.js'
export type {
  LoadValidation,
  ValidationSection,
  RevenueTableSummary,
  MovieTableSummary,
} from './loader.js'
