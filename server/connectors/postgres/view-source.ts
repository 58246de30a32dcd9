/**
 * PostgreSQL View Source
 *
 * Reads whole views into a Table. Each instance owns one connection;
 * callers open one per export and close it on every path (see
 * withViewSource).
 */

import type { Client } from 'pg';
import { createClient } from '../../db.js';
import type { DatabaseSettings } from '../../config/app-config.js';
import { DataSourceError, errorMessage } from '../../export/errors.js';
import type { CellScalar, Table } from '../../export/types.js';
import { loggers } from '../../utils/logger.js';

const logger = loggers.db;

export interface ViewDataSource {
  connect(): Promise<void>;
  fetchView(schema: string, viewName: string): Promise<Table>;
  listViews(schema: string): Promise<string[]>;
  listColumns(schema: string, viewName: string): Promise<string[]>;
  close(): Promise<void>;
}

export type ViewDataSourceFactory = () => ViewDataSource;

// pg leaves these as text to avoid precision loss
export const INT8_OID = 20;
export const NUMERIC_OID = 1700;

function numericText(value: string, dataTypeID: number | undefined): CellScalar {
  if (dataTypeID === INT8_OID) {
    const n = Number(value);
    return Number.isSafeInteger(n) ? n : value;
  }
  if (dataTypeID === NUMERIC_OID) {
    const n = Number.parseFloat(value);
    return Number.isFinite(n) ? n : value;
  }
  return value;
}

/**
 * Driver values -> cell scalars. int8 within the safe integer range and
 * finite numerics become numbers, json/array columns become JSON text,
 * bytea becomes base64.
 */
export function toCellScalar(value: unknown, dataTypeID?: number): CellScalar {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return numericText(value, dataTypeID);
  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) return value;
  if (typeof value === 'bigint') return value.toString();
  if (Buffer.isBuffer(value)) return value.toString('base64');
  return JSON.stringify(value);
}

export class PostgresViewSource implements ViewDataSource {
  private client: Client | null = null;

  constructor(private settings: DatabaseSettings) {}

  get isConnected(): boolean {
    return this.client !== null;
  }

  async connect(): Promise<void> {
    if (this.client) return;

    const client = createClient(this.settings);
    try {
      await client.connect();
    } catch (error) {
      throw new DataSourceError(
        `Could not connect to ${this.settings.host}:${this.settings.port}/${this.settings.database}`,
        errorMessage(error),
      );
    }
    this.client = client;
    logger.info('Connected', { host: this.settings.host, database: this.settings.database });
  }

  async fetchView(schema: string, viewName: string): Promise<Table> {
    const client = this.requireClient();
    const relation = `${client.escapeIdentifier(schema)}.${client.escapeIdentifier(viewName)}`;

    logger.info(`Fetching ${schema}.${viewName}`);
    const result = await this.run(
      `Query on ${schema}.${viewName} failed`,
      () => client.query({ text: `SELECT * FROM ${relation}`, rowMode: 'array' }),
    );

    const columns = result.fields.map(field => field.name);
    const typeIds = result.fields.map(field => field.dataTypeID);
    const rows = result.rows.map((row: unknown[]) =>
      row.map((value, i) => toCellScalar(value, typeIds[i])),
    );
    logger.info(`Fetched ${rows.length} row(s) from ${schema}.${viewName}`, { columns: columns.length });
    return { columns, rows };
  }

  async listViews(schema: string): Promise<string[]> {
    const client = this.requireClient();
    const result = await this.run(
      `Listing views in ${schema} failed`,
      () => client.query<{ table_name: string }>(
        `SELECT table_name
         FROM information_schema.views
         WHERE table_schema = $1
         ORDER BY table_name`,
        [schema],
      ),
    );
    return result.rows.map(r => r.table_name);
  }

  async listColumns(schema: string, viewName: string): Promise<string[]> {
    const client = this.requireClient();
    const result = await this.run(
      `Listing columns of ${schema}.${viewName} failed`,
      () => client.query<{ column_name: string }>(
        `SELECT column_name
         FROM information_schema.columns
         WHERE table_schema = $1 AND table_name = $2
         ORDER BY ordinal_position`,
        [schema, viewName],
      ),
    );
    return result.rows.map(r => r.column_name);
  }

  async close(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;
    try {
      await client.end();
      logger.info('Connection closed');
    } catch (error) {
      logger.warn(`Error while closing connection: ${errorMessage(error)}`);
    }
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new DataSourceError('Not connected');
    }
    return this.client;
  }

  private async run<T>(context: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new DataSourceError(context, errorMessage(error));
    }
  }
}

/**
 * Open a source, run `fn`, close the source whatever happens.
 */
export async function withViewSource<T>(
  factory: ViewDataSourceFactory,
  fn: (source: ViewDataSource) => Promise<T>,
): Promise<T> {
  const source = factory();
  try {
    await source.connect();
    return await fn(source);
  } finally {
    await source.close();
  }
}

export function postgresSourceFactory(settings: DatabaseSettings): ViewDataSourceFactory {
  return () => new PostgresViewSource(settings);
}
