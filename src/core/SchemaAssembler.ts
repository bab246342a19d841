import { DatabaseAdapter } from '../adapters/DatabaseAdapter';
import { ColumnBuilderOptions, ColumnMetadataBuilder } from './ColumnMetadataBuilder';
import { UnresolvedTableWarning } from './ExportErrors';
import { Logger } from './Logger';
import { Manifest } from './ManifestLoader';
import { DatabaseRecord, SchemaDocument, TableRecord } from './SchemaDocument';
import { TableAssembler } from './TableAssembler';
import { TableEnumerator } from './TableEnumerator';
import { TableNameResolver } from './TableNameResolver';

export interface SchemaAssemblyResult {
  schema: SchemaDocument;
  warnings: UnresolvedTableWarning[];
}

/**
 * Walks the manifest, reconciles each nominal table name against the live
 * catalog and builds the schema document. Tables that cannot be resolved are
 * reported and left out; every other failure propagates.
 */
export class SchemaAssembler {
  private readonly enumerator: TableEnumerator;
  private readonly tables: TableAssembler;

  constructor(adapter: DatabaseAdapter, private readonly logger: Logger, options: ColumnBuilderOptions = {}) {
    this.enumerator = new TableEnumerator(adapter);
    this.tables = new TableAssembler(new ColumnMetadataBuilder(adapter, logger, options));
  }

  async assemble(manifest: Manifest): Promise<SchemaAssemblyResult> {
    const liveTables = await this.enumerator.listTables();
    this.logger.debug(`Found ${liveTables.length} live tables`);
    const resolver = new TableNameResolver(liveTables);

    const databases = new Map<string, DatabaseRecord>();
    const warnings: UnresolvedTableWarning[] = [];

    for (const db of manifest) {
      this.logger.debug(`Processing database: ${db.db_id}`);
      const tables = new Map<string, TableRecord>();

      for (const requested of db.table_names_original) {
        const resolution = resolver.resolve(requested);
        if (resolution.kind === 'unresolved') {
          const warning: UnresolvedTableWarning = {
            kind: 'unresolved-table',
            dbId: db.db_id,
            table: requested,
            message: `Table '${requested}' not found in Postgres, skipping`
          };
          this.logger.warn(`${db.db_id}: ${warning.message}`);
          warnings.push(warning);
          continue;
        }
        if (resolution.kind === 'case-insensitive') {
          this.logger.warn(
            `${db.db_id}: Table '${requested}' not found, using case-insensitive match '${resolution.resolved}'`
          );
        }
        if (tables.has(resolution.resolved)) {
          this.logger.debug(`${db.db_id}: '${resolution.resolved}' already exported, ignoring duplicate '${requested}'`);
          continue;
        }

        this.logger.debug(`Building schema for table: ${resolution.resolved}`);
        tables.set(resolution.resolved, await this.tables.assemble(resolution.resolved));
      }

      databases.set(db.db_id, { name: db.db_id, tables: Object.fromEntries(tables) });
    }

    return { schema: Object.fromEntries(databases), warnings };
  }
}
