import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { SchemaDocument } from './SchemaDocument';

const foreignKeyRefSchema = z.object({
  target_table: z.string(),
  target_column: z.string()
});

const columnSchema = z.object({
  name: z.string(),
  type: z.string(),
  is_primary_key: z.boolean(),
  foreign_keys: z.array(foreignKeyRefSchema),
  description: z.string(),
  value_samples: z.array(z.string())
});

const tableSchema = z.object({
  name: z.string(),
  columns: z.array(columnSchema),
  description: z.string(),
  table_str: z.string()
});

export const schemaDocumentSchema = z.record(
  z.object({
    name: z.string(),
    tables: z.record(tableSchema)
  })
);

export function serializeSchema(schema: SchemaDocument): string {
  return `${JSON.stringify(schema, null, 2)}\n`;
}

export function parseSchema(text: string): SchemaDocument {
  return schemaDocumentSchema.parse(JSON.parse(text));
}

/**
 * Writes the document next to its destination first and renames it into
 * place, so the target is either the previous file or the complete new one.
 */
export async function writeSchema(filePath: string, schema: SchemaDocument): Promise<void> {
  const target = path.resolve(filePath);
  const tmp = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);
  await fs.outputFile(tmp, serializeSchema(schema), 'utf8');
  try {
    await fs.move(tmp, target, { overwrite: true });
  } catch (err) {
    await fs.remove(tmp);
    throw err;
  }
}
