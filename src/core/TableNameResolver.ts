import { AmbiguousTableError } from './ExportErrors';

export type TableResolution =
  | { kind: 'exact'; requested: string; resolved: string }
  | { kind: 'case-insensitive'; requested: string; resolved: string }
  | { kind: 'unresolved'; requested: string };

/**
 * Maps manifest table names onto live table names: verbatim first, then by
 * case-insensitive comparison. No partial or fuzzy matching.
 */
export class TableNameResolver {
  private readonly live: Set<string>;
  private readonly byLowerCase = new Map<string, string[]>();

  constructor(liveTables: readonly string[]) {
    this.live = new Set(liveTables);
    for (const table of liveTables) {
      const key = table.toLowerCase();
      const names = this.byLowerCase.get(key) ?? [];
      if (!names.includes(table)) names.push(table);
      this.byLowerCase.set(key, names);
    }
  }

  /** @throws AmbiguousTableError when only case-insensitive candidates exist and there are several */
  resolve(requested: string): TableResolution {
    if (this.live.has(requested)) {
      return { kind: 'exact', requested, resolved: requested };
    }
    const candidates = this.byLowerCase.get(requested.toLowerCase()) ?? [];
    if (candidates.length > 1) {
      throw new AmbiguousTableError(requested, candidates);
    }
    const [match] = candidates;
    if (match === undefined) {
      return { kind: 'unresolved', requested };
    }
    return { kind: 'case-insensitive', requested, resolved: match };
  }
}
