import { DatabaseAdapter } from '../adapters/DatabaseAdapter';
import { ConstraintResolver } from './ConstraintResolver';
import { ConfigurationError } from './ExportErrors';
import { Logger } from './Logger';
import { ColumnDescriptor, MAX_VALUE_SAMPLES } from './SchemaDocument';

export interface ColumnBuilderOptions {
  /** Values sampled per column, 1 to MAX_VALUE_SAMPLES. */
  sampleLimit?: number;
}

/**
 * Builds the column list of one table: catalog order, constraint flags and a
 * handful of sample values per column. Issues one sampling query per column.
 */
export class ColumnMetadataBuilder {
  private readonly constraints: ConstraintResolver;
  private readonly sampleLimit: number;

  constructor(
    private readonly adapter: DatabaseAdapter,
    private readonly logger: Logger,
    options: ColumnBuilderOptions = {}
  ) {
    this.constraints = new ConstraintResolver(adapter);
    this.sampleLimit = options.sampleLimit ?? MAX_VALUE_SAMPLES;
    if (!Number.isInteger(this.sampleLimit) || this.sampleLimit < 1 || this.sampleLimit > MAX_VALUE_SAMPLES) {
      throw new ConfigurationError(`sampleLimit must be an integer between 1 and ${MAX_VALUE_SAMPLES}`);
    }
  }

  async buildColumns(table: string): Promise<ColumnDescriptor[]> {
    const primaryKeys = await this.constraints.getPrimaryKeys(table);
    const foreignKeys = await this.constraints.getForeignKeysByColumn(table);
    const catalogColumns = await this.adapter.getColumns(table);

    const columns: ColumnDescriptor[] = [];
    for (const column of catalogColumns) {
      this.logger.debug(`Sampling values for column: ${table}.${column.name}`);
      const samples = await this.adapter.sampleColumnValues(table, column.name, this.sampleLimit);
      columns.push({
        name: column.name,
        type: column.dataType.toUpperCase(),
        is_primary_key: primaryKeys.has(column.name),
        foreign_keys: foreignKeys.get(column.name) ?? [],
        description: '',
        value_samples: samples.slice(0, this.sampleLimit)
      });
    }
    return columns;
  }
}
