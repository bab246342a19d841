import { DatabaseAdapter } from '../adapters/DatabaseAdapter';

export class TableEnumerator {
  constructor(private readonly adapter: Pick<DatabaseAdapter, 'getTables'>) {}

  /** Live table names, sorted so repeated exports diff cleanly. */
  async listTables(): Promise<string[]> {
    const tables = await this.adapter.getTables();
    return [...tables].sort();
  }
}
