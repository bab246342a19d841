import fs from 'fs-extra';
import { z } from 'zod';
import { ManifestError, errorMessage } from './ExportErrors';

// Other keys of the manifest (column names, foreign keys, ...) are dropped.
const manifestEntrySchema = z.object({
  db_id: z.string().min(1),
  table_names_original: z.array(z.string())
});

export const manifestSchema = z.array(manifestEntrySchema);

export type ManifestEntry = z.infer<typeof manifestEntrySchema>;
export type Manifest = ManifestEntry[];

export function parseManifest(data: unknown, source = 'manifest'): Manifest {
  const parsed = manifestSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
    throw new ManifestError(`Invalid ${source}: ${issues}`);
  }
  return parsed.data;
}

export async function loadManifest(filePath: string): Promise<Manifest> {
  let data: unknown;
  try {
    data = await fs.readJson(filePath);
  } catch (err) {
    throw new ManifestError(`Could not read manifest ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
  return parseManifest(data, `manifest ${filePath}`);
}
