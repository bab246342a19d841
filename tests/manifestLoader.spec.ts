import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { ManifestError } from '../src/core/ExportErrors';
import { loadManifest, parseManifest } from '../src/core/ManifestLoader';

describe('ManifestLoader', () => {
  it('keeps db ids and table names in file order and drops other keys', () => {
    const manifest = parseManifest([
      { db_id: 'shop', table_names_original: ['orders', 'Customers'], column_names: [[-1, '*']] },
      { db_id: 'crm', table_names_original: [] }
    ]);

    expect(manifest).toEqual([
      { db_id: 'shop', table_names_original: ['orders', 'Customers'] },
      { db_id: 'crm', table_names_original: [] }
    ]);
  });

  it('rejects entries without table names', () => {
    expect(() => parseManifest([{ db_id: 'shop' }])).toThrow(ManifestError);
    expect(() => parseManifest([{ db_id: 'shop' }])).toThrow('Invalid manifest: 0.table_names_original: Required');
  });

  it('rejects a manifest that is not a list', () => {
    expect(() => parseManifest({ db_id: 'shop' })).toThrow(ManifestError);
  });

  describe('loadManifest', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'manifest-'));
    });

    afterEach(async () => {
      await fs.remove(dir);
    });

    it('reads a manifest file', async () => {
      const file = path.join(dir, 'dev_tables.json');
      await fs.writeJson(file, [{ db_id: 'shop', table_names_original: ['orders'] }]);

      await expect(loadManifest(file)).resolves.toEqual([{ db_id: 'shop', table_names_original: ['orders'] }]);
    });

    it('wraps a missing file in a ManifestError', async () => {
      await expect(loadManifest(path.join(dir, 'missing.json'))).rejects.toBeInstanceOf(ManifestError);
    });

    it('wraps malformed JSON in a ManifestError', async () => {
      const file = path.join(dir, 'broken.json');
      await fs.writeFile(file, '[{"db_id": ');

      await expect(loadManifest(file)).rejects.toBeInstanceOf(ManifestError);
    });
  });
});
