/** Upper bound on `value_samples` per column. */
export const MAX_VALUE_SAMPLES = 5;

export interface ForeignKeyRef {
  target_table: string;
  target_column: string;
}

export interface ColumnDescriptor {
  name: string;
  /** Data type as the catalog reports it, upper-cased. */
  type: string;
  is_primary_key: boolean;
  foreign_keys: ForeignKeyRef[];
  /** Left empty for manual annotation. */
  description: string;
  value_samples: string[];
}

export interface TableRecord {
  /** Live table name, which may differ in case from the manifest entry. */
  name: string;
  columns: ColumnDescriptor[];
  description: string;
  table_str: string;
}

export interface DatabaseRecord {
  name: string;
  tables: Record<string, TableRecord>;
}

/** Keyed by manifest `db_id`. */
export type SchemaDocument = Record<string, DatabaseRecord>;
