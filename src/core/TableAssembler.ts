import { ColumnMetadataBuilder } from './ColumnMetadataBuilder';
import { TableRecord } from './SchemaDocument';

export class TableAssembler {
  constructor(private readonly columns: ColumnMetadataBuilder) {}

  async assemble(table: string): Promise<TableRecord> {
    return {
      name: table,
      columns: await this.columns.buildColumns(table),
      description: '',
      table_str: ''
    };
  }
}
