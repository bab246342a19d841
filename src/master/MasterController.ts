import { DatabaseAdapter, withConnection } from '../adapters/DatabaseAdapter';
import { PostgreSQLAdapter } from '../adapters/PostgreSQLAdapter';
import { ExportConfig, redactConnectionString } from '../core/ExportConfig';
import { ConsoleLogger, Logger } from '../core/Logger';
import { loadManifest } from '../core/ManifestLoader';
import { SchemaAssembler, SchemaAssemblyResult } from '../core/SchemaAssembler';
import { writeSchema } from '../core/SchemaSerializer';

interface ControllerConfig {
  config: ExportConfig;
  logger?: Logger;
  /** Defaults to a fresh PostgreSQLAdapter. */
  createAdapter?: () => DatabaseAdapter;
}

/**
 * Runs one export: manifest, one connection, schema assembly, then a single
 * write of the output. Nothing is written when any earlier step fails.
 */
export class MasterController {
  private readonly logger: Logger;
  private readonly createAdapter: () => DatabaseAdapter;

  constructor(private readonly options: ControllerConfig) {
    this.logger = options.logger ?? new ConsoleLogger('Master');
    this.createAdapter = options.createAdapter ?? (() => new PostgreSQLAdapter());
  }

  async execute(): Promise<SchemaAssemblyResult> {
    const { config } = this.options;
    this.logger.info('Starting schema export');

    const manifest = await loadManifest(config.manifestPath);
    this.logger.info(`Loaded ${manifest.length} databases from ${config.manifestPath}`);

    this.logger.info(`Connecting to Postgres at ${redactConnectionString(config.connectionString)}`);
    const result = await withConnection(
      this.createAdapter(),
      {
        connectionString: config.connectionString,
        schema: config.schema,
        statementTimeoutMs: config.statementTimeoutMs
      },
      this.logger,
      (adapter) => new SchemaAssembler(adapter, this.logger).assemble(manifest)
    );
    this.logger.info('Postgres connection closed');

    await writeSchema(config.outputPath, result.schema);
    const skipped = result.warnings.length ? ` (${result.warnings.length} tables skipped)` : '';
    this.logger.info(`Schema written to ${config.outputPath}${skipped}`);
    return result;
  }
}
