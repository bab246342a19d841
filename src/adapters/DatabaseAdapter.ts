import { errorMessage } from '../core/ExportErrors';
import { Logger } from '../core/Logger';

export interface ConnectionOptions {
  connectionString: string;
  /** Schema the catalog queries are scoped to. Defaults to `public`. */
  schema?: string;
  /** Applied once per session when set; otherwise the server default holds. */
  statementTimeoutMs?: number;
}

export interface CatalogColumn {
  name: string;
  dataType: string;
}

export interface CatalogForeignKey {
  column: string;
  referencedTable: string;
  referencedColumn: string;
}

/**
 * Catalog access for one open connection. Query failures surface as
 * SchemaIntrospectionError, connection failures as ConnectionError.
 */
export interface DatabaseAdapter {
  connect(options: ConnectionOptions): Promise<this>;
  close(): Promise<void>;
  getTables(): Promise<string[]>;
  getPrimaryKeys(table: string): Promise<string[]>;
  getForeignKeys(table: string): Promise<CatalogForeignKey[]>;
  /** Ordered by ordinal position. */
  getColumns(table: string): Promise<CatalogColumn[]>;
  /** Up to `limit` non-null values of one column, rendered as strings. */
  sampleColumnValues(table: string, column: string, limit: number): Promise<string[]>;
}

/**
 * Opens the adapter, hands it to `work` and closes it exactly once whether or
 * not `work` succeeds. When `work` fails, its error is the one rethrown.
 */
export async function withConnection<T>(
  adapter: DatabaseAdapter,
  options: ConnectionOptions,
  logger: Logger,
  work: (connected: DatabaseAdapter) => Promise<T>
): Promise<T> {
  const connected = await adapter.connect(options);
  let result: T;
  try {
    result = await work(connected);
  } catch (err) {
    try {
      await connected.close();
    } catch (closeErr) {
      logger.warn(`Failed to close connection after error: ${errorMessage(closeErr)}`);
    }
    throw err;
  }
  await connected.close();
  return result;
}
