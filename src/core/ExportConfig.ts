import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './ExportErrors';

export const CONNECTION_STRING_ENV = 'POSTGRES_CONNECTION_STRING';
export const DEFAULT_MANIFEST_PATH = path.join('minidev', 'MINIDEV', 'dev_tables.json');
export const DEFAULT_OUTPUT_PATH = 'bird_mini_dev_postgres-schema.json';
export const DEFAULT_SCHEMA = 'public';

export interface ExportConfig {
  manifestPath: string;
  outputPath: string;
  connectionString: string;
  schema: string;
  statementTimeoutMs?: number;
}

/** Raw values as they arrive from the command line. */
export interface ExportConfigInput {
  manifestPath?: string;
  outputPath?: string;
  connectionString?: string;
  schema?: string;
  statementTimeoutMs?: number;
}

const exportConfigSchema = z.object({
  manifestPath: z.string().min(1),
  outputPath: z.string().min(1),
  connectionString: z.string().min(1),
  schema: z.string().min(1),
  statementTimeoutMs: z.number().int().positive().optional()
});

/**
 * Fills defaults and picks the connection string: the explicit value wins,
 * then the environment. Throws ConfigurationError when neither is set.
 */
export function resolveExportConfig(input: ExportConfigInput, env: NodeJS.ProcessEnv = process.env): ExportConfig {
  const connectionString = input.connectionString || env[CONNECTION_STRING_ENV];
  if (!connectionString) {
    throw new ConfigurationError(`${CONNECTION_STRING_ENV} is not set and no connection string was given`);
  }

  const parsed = exportConfigSchema.safeParse({
    manifestPath: input.manifestPath ?? DEFAULT_MANIFEST_PATH,
    outputPath: input.outputPath ?? DEFAULT_OUTPUT_PATH,
    connectionString,
    schema: input.schema ?? DEFAULT_SCHEMA,
    statementTimeoutMs: input.statementTimeoutMs
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

/** Connection string with the password masked, for log lines. */
export function redactConnectionString(connectionString: string): string {
  return connectionString.replace(/^([a-z][a-z0-9+.-]*:\/\/[^:/@]*:)[^@]*@/i, '$1****@');
}
