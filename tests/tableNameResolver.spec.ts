import { AmbiguousTableError } from '../src/core/ExportErrors';
import { TableNameResolver } from '../src/core/TableNameResolver';

describe('TableNameResolver', () => {
  const resolver = new TableNameResolver(['Customers', 'orders', 'order_items']);

  it('returns an exact name unchanged', () => {
    expect(resolver.resolve('orders')).toEqual({ kind: 'exact', requested: 'orders', resolved: 'orders' });
    expect(resolver.resolve('Customers')).toEqual({ kind: 'exact', requested: 'Customers', resolved: 'Customers' });
  });

  it('falls back to a case-insensitive match', () => {
    expect(resolver.resolve('customers')).toEqual({
      kind: 'case-insensitive',
      requested: 'customers',
      resolved: 'Customers'
    });
    expect(resolver.resolve('ORDER_ITEMS')).toEqual({
      kind: 'case-insensitive',
      requested: 'ORDER_ITEMS',
      resolved: 'order_items'
    });
  });

  it('does not match partial or similar names', () => {
    expect(resolver.resolve('ghost_table')).toEqual({ kind: 'unresolved', requested: 'ghost_table' });
    expect(resolver.resolve('order')).toEqual({ kind: 'unresolved', requested: 'order' });
    expect(resolver.resolve('customer')).toEqual({ kind: 'unresolved', requested: 'customer' });
  });

  describe('tables differing only by case', () => {
    const twins = new TableNameResolver(['Users', 'users', 'USERS_ARCHIVE']);

    it('still resolves exact names', () => {
      expect(twins.resolve('Users')).toEqual({ kind: 'exact', requested: 'Users', resolved: 'Users' });
      expect(twins.resolve('users')).toEqual({ kind: 'exact', requested: 'users', resolved: 'users' });
    });

    it('refuses to guess between case variants', () => {
      expect(() => twins.resolve('USERS')).toThrow(AmbiguousTableError);
      expect(() => twins.resolve('USERS')).toThrow(
        "Table 'USERS' matches several tables when compared case-insensitively: 'Users', 'users'"
      );
    });

    it('resolves an unrelated single variant', () => {
      expect(twins.resolve('users_archive')).toEqual({
        kind: 'case-insensitive',
        requested: 'users_archive',
        resolved: 'USERS_ARCHIVE'
      });
    });
  });
});
