import { ConstraintResolver } from '../src/core/ConstraintResolver';
import { TableEnumerator } from '../src/core/TableEnumerator';
import { FakeDatabaseAdapter, shopTables } from './support/FakeDatabaseAdapter';

describe('TableEnumerator', () => {
  it('returns live tables sorted by code unit order', async () => {
    const adapter = new FakeDatabaseAdapter({
      orders: { columns: [] },
      Customers: { columns: [] },
      audit_log: { columns: [] }
    });

    await expect(new TableEnumerator(adapter).listTables()).resolves.toEqual(['Customers', 'audit_log', 'orders']);
  });
});

describe('ConstraintResolver', () => {
  it('collects primary key columns into a set', async () => {
    const adapter = new FakeDatabaseAdapter({
      enrollment: { columns: [], primaryKey: ['student_id', 'course_id'] }
    });

    const pks = await new ConstraintResolver(adapter).getPrimaryKeys('enrollment');

    expect(pks).toEqual(new Set(['student_id', 'course_id']));
  });

  it('returns an empty set for a table without a primary key', async () => {
    const adapter = new FakeDatabaseAdapter({ log: { columns: [] } });

    const pks = await new ConstraintResolver(adapter).getPrimaryKeys('log');

    expect(pks.size).toBe(0);
  });

  it('groups foreign keys by source column in catalog order', async () => {
    const adapter = new FakeDatabaseAdapter({
      transfer: {
        columns: [],
        foreignKeys: [
          { column: 'account_id', referencedTable: 'account', referencedColumn: 'id' },
          { column: 'branch_id', referencedTable: 'branch', referencedColumn: 'id' },
          { column: 'account_id', referencedTable: 'legacy_account', referencedColumn: 'account_no' }
        ]
      }
    });

    const byColumn = await new ConstraintResolver(adapter).getForeignKeysByColumn('transfer');

    expect([...byColumn.keys()]).toEqual(['account_id', 'branch_id']);
    expect(byColumn.get('account_id')).toEqual([
      { target_table: 'account', target_column: 'id' },
      { target_table: 'legacy_account', target_column: 'account_no' }
    ]);
    expect(byColumn.get('branch_id')).toEqual([{ target_table: 'branch', target_column: 'id' }]);
  });

  it('leaves columns without constraints out of the map', async () => {
    const adapter = new FakeDatabaseAdapter(shopTables());

    const byColumn = await new ConstraintResolver(adapter).getForeignKeysByColumn('orders');

    expect(byColumn.has('note')).toBe(false);
    expect(byColumn.has('id')).toBe(false);
  });

  it('propagates catalog failures', async () => {
    const adapter = new FakeDatabaseAdapter(shopTables());
    adapter.failOn = { method: 'getForeignKeys', error: new Error('permission denied') };

    await expect(new ConstraintResolver(adapter).getForeignKeysByColumn('orders')).rejects.toThrow('permission denied');
  });
});
