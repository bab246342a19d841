import { Client, ClientConfig, QueryResultRow } from 'pg';
import { CatalogColumn, CatalogForeignKey, ConnectionOptions, DatabaseAdapter } from './DatabaseAdapter';
import { ConnectionError, SchemaIntrospectionError, errorMessage } from '../core/ExportErrors';

/** The slice of `pg.Client` the adapter talks to. */
export interface PgClient {
  connect(): Promise<void>;
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
  end(): Promise<void>;
  escapeIdentifier(value: string): string;
}

export type PgClientFactory = (config: ClientConfig) => PgClient;

export const createPgClient: PgClientFactory = (config) => {
  const client = new Client(config);
  return {
    connect: async () => {
      await client.connect();
    },
    query: (text, values) => client.query(text, values),
    end: () => client.end(),
    escapeIdentifier: (value) => client.escapeIdentifier(value)
  };
};

// SQLSTATE class 08 and admin shutdown, plus socket errors from node
const CONNECTION_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'EPIPE', 'ETIMEDOUT', 'ENOTFOUND', '57P01']);

function isConnectionFailure(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
  if (code && (code.startsWith('08') || CONNECTION_ERROR_CODES.has(code))) return true;
  return /connection terminated|not queryable/i.test(err.message);
}

export class PostgreSQLAdapter implements DatabaseAdapter {
  private client?: PgClient;
  private schema = 'public';

  constructor(private readonly createClient: PgClientFactory = createPgClient) {}

  async connect(options: ConnectionOptions): Promise<this> {
    if (!options.connectionString) {
      throw new ConnectionError('A connection string is required');
    }
    this.schema = options.schema ?? 'public';
    const client = this.createClient({ connectionString: options.connectionString });
    try {
      await client.connect();
    } catch (err) {
      throw new ConnectionError(`Could not connect to Postgres: ${errorMessage(err)}`, { cause: err });
    }
    this.client = client;
    if (options.statementTimeoutMs !== undefined) {
      try {
        await this.run(
          "SELECT set_config('statement_timeout', $1, false)",
          [String(options.statementTimeoutMs)],
          'set statement timeout'
        );
      } catch (err) {
        await this.closeAfterFailedConnect(err);
        throw err;
      }
    }
    return this;
  }

  async close(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = undefined;
    try {
      await client.end();
    } catch (err) {
      throw new ConnectionError(`Failed to close Postgres connection: ${errorMessage(err)}`, { cause: err });
    }
  }

  // Ends a client whose connect could not complete.
  private async closeAfterFailedConnect(cause: unknown): Promise<void> {
    try {
      await this.close();
    } catch (closeErr) {
      throw new ConnectionError(
        `${errorMessage(cause)} (closing the connection also failed: ${errorMessage(closeErr)})`,
        { cause }
      );
    }
  }

  async getTables(): Promise<string[]> {
    const rows = await this.run(
      `SELECT table_name FROM information_schema.tables WHERE table_schema = $1`,
      [this.schema],
      'list tables'
    );
    return rows.map((r) => readString(r, 'table_name'));
  }

  async getPrimaryKeys(table: string): Promise<string[]> {
    const rows = await this.run(
      `SELECT kcu.column_name
       FROM information_schema.table_constraints tc
       JOIN information_schema.key_column_usage kcu
         ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
       WHERE tc.constraint_type = 'PRIMARY KEY' AND tc.table_schema = $1 AND tc.table_name = $2
       ORDER BY kcu.ordinal_position`,
      [this.schema, table],
      `read primary keys of ${table}`
    );
    return rows.map((r) => readString(r, 'column_name'));
  }

  async getForeignKeys(table: string): Promise<CatalogForeignKey[]> {
    const rows = await this.run(
      `SELECT kcu.column_name, ccu.table_name AS referenced_table_name, ccu.column_name AS referenced_column_name
       FROM information_schema.table_constraints tc
       JOIN information_schema.key_column_usage kcu
         ON tc.constraint_name = kcu.constraint_name AND tc.constraint_schema = kcu.constraint_schema
       JOIN information_schema.constraint_column_usage ccu
         ON ccu.constraint_name = tc.constraint_name AND ccu.constraint_schema = tc.constraint_schema
       WHERE tc.constraint_type = 'FOREIGN KEY' AND kcu.table_schema = $1 AND kcu.table_name = $2
       ORDER BY tc.constraint_name, kcu.ordinal_position`,
      [this.schema, table],
      `read foreign keys of ${table}`
    );
    return rows.map((r) => ({
      column: readString(r, 'column_name'),
      referencedTable: readString(r, 'referenced_table_name'),
      referencedColumn: readString(r, 'referenced_column_name')
    }));
  }

  async getColumns(table: string): Promise<CatalogColumn[]> {
    const rows = await this.run(
      `SELECT column_name, data_type
       FROM information_schema.columns
       WHERE table_schema = $1 AND table_name = $2
       ORDER BY ordinal_position`,
      [this.schema, table],
      `read columns of ${table}`
    );
    return rows.map((r) => ({ name: readString(r, 'column_name'), dataType: readString(r, 'data_type') }));
  }

  async sampleColumnValues(table: string, column: string, limit: number): Promise<string[]> {
    const client = this.requireClient();
    const col = client.escapeIdentifier(column);
    const relation = `${client.escapeIdentifier(this.schema)}.${client.escapeIdentifier(table)}`;
    const rows = await this.run(
      `SELECT ${col} AS sample FROM ${relation} WHERE ${col} IS NOT NULL LIMIT $1`,
      [limit],
      `sample ${table}.${column}`
    );
    return rows.map((r) => renderSampleValue(r.sample));
  }

  private requireClient(): PgClient {
    if (!this.client) {
      throw new ConnectionError('Postgres connection is not open');
    }
    return this.client;
  }

  private async run(sql: string, params: unknown[], action: string): Promise<QueryResultRow[]> {
    const client = this.requireClient();
    try {
      const res = await client.query(sql, params);
      return res.rows;
    } catch (err) {
      if (isConnectionFailure(err)) {
        throw new ConnectionError(`Lost Postgres connection while trying to ${action}: ${errorMessage(err)}`, { cause: err });
      }
      throw new SchemaIntrospectionError(`Failed to ${action}: ${errorMessage(err)}`, { cause: err });
    }
  }
}

function readString(row: QueryResultRow, key: string): string {
  const value: unknown = row[key];
  if (typeof value !== 'string') {
    throw new SchemaIntrospectionError(`Catalog row is missing text column '${key}'`);
  }
  return value;
}

/** Turns a driver value into the text stored in `value_samples`. */
export function renderSampleValue(value: unknown): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? String(value) : value.toISOString();
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('base64');
  }
  if (value !== null && typeof value === 'object') {
    // json/jsonb documents and array columns
    return JSON.stringify(value);
  }
  return String(value);
}
