import yargs from 'yargs';
import { DatabaseAdapter } from './adapters/DatabaseAdapter';
import {
  CONNECTION_STRING_ENV,
  DEFAULT_MANIFEST_PATH,
  DEFAULT_OUTPUT_PATH,
  DEFAULT_SCHEMA,
  resolveExportConfig
} from './core/ExportConfig';
import { SchemaExportError, errorMessage } from './core/ExportErrors';
import { ConsoleLogger, LOG_LEVELS, Logger, isLogLevel } from './core/Logger';
import { MasterController } from './master/MasterController';

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  createAdapter?: () => DatabaseAdapter;
}

export function buildParser(args: string[]) {
  return yargs(args)
    .scriptName('pg-schema-export')
    .usage('$0 [options]\n\nExport Postgres schema with column-level PK/FK metadata.')
    .option('dev-tables-filepath', { type: 'string', default: DEFAULT_MANIFEST_PATH, describe: 'Path to dev_tables.json' })
    .option('output-filepath', { type: 'string', default: DEFAULT_OUTPUT_PATH, describe: 'Output JSON path' })
    .option('pg-conn-str', {
      type: 'string',
      describe: `Postgres connection string (overrides ${CONNECTION_STRING_ENV})`
    })
    .option('schema', { type: 'string', default: DEFAULT_SCHEMA, describe: 'Schema to introspect' })
    .option('statement-timeout', { type: 'number', describe: 'Per-statement timeout in milliseconds' })
    .option('log-level', { choices: LOG_LEVELS, default: 'info' as const })
    .strict();
}

/** Parses `args`, runs one export and resolves to the process exit code. */
export async function runCli(args: string[], deps: CliDependencies = {}): Promise<number> {
  const argv = await buildParser(args).parseAsync();
  const requestedLevel: unknown = argv['log-level'];
  const level = isLogLevel(requestedLevel) ? requestedLevel : 'info';
  const logger = deps.logger ?? new ConsoleLogger('Export', level);

  try {
    const config = resolveExportConfig(
      {
        manifestPath: argv['dev-tables-filepath'],
        outputPath: argv['output-filepath'],
        connectionString: argv['pg-conn-str'],
        schema: argv.schema,
        statementTimeoutMs: argv['statement-timeout']
      },
      deps.env ?? process.env
    );
    await new MasterController({ config, logger, createAdapter: deps.createAdapter }).execute();
    return 0;
  } catch (err) {
    if (err instanceof SchemaExportError) {
      logger.error(`${err.name}: ${err.message}`);
    } else {
      logger.error(`Unexpected failure: ${errorMessage(err)}`);
    }
    return 1;
  }
}
