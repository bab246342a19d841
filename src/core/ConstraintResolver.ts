import { DatabaseAdapter } from '../adapters/DatabaseAdapter';
import { ForeignKeyRef } from './SchemaDocument';

export class ConstraintResolver {
  constructor(private readonly adapter: Pick<DatabaseAdapter, 'getPrimaryKeys' | 'getForeignKeys'>) {}

  async getPrimaryKeys(table: string): Promise<Set<string>> {
    return new Set(await this.adapter.getPrimaryKeys(table));
  }

  /**
   * Groups the table's foreign keys by source column. A column that takes part
   * in several constraints keeps every target, in catalog order.
   */
  async getForeignKeysByColumn(table: string): Promise<Map<string, ForeignKeyRef[]>> {
    const fks = await this.adapter.getForeignKeys(table);
    const byColumn = new Map<string, ForeignKeyRef[]>();
    for (const fk of fks) {
      const refs = byColumn.get(fk.column) ?? [];
      refs.push({ target_table: fk.referencedTable, target_column: fk.referencedColumn });
      byColumn.set(fk.column, refs);
    }
    return byColumn;
  }
}
