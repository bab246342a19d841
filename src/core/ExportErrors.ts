/** Base class for every failure that aborts a schema export run. */
export class SchemaExportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Required configuration is missing or invalid. Raised before any database I/O. */
export class ConfigurationError extends SchemaExportError {}

/** The manifest file could not be read or does not have the expected shape. */
export class ManifestError extends SchemaExportError {}

/** The database connection could not be established or was lost. */
export class ConnectionError extends SchemaExportError {}

/** A catalog or sampling query failed. */
export class SchemaIntrospectionError extends SchemaExportError {}

export class AmbiguousTableError extends SchemaIntrospectionError {
  constructor(readonly requested: string, readonly candidates: string[]) {
    super(
      `Table '${requested}' matches several tables when compared case-insensitively: ${candidates
        .map((c) => `'${c}'`)
        .join(', ')}`
    );
  }
}

/**
 * A manifest table with no live counterpart. Not thrown: the assembler
 * reports it and leaves the table out of the document.
 */
export interface UnresolvedTableWarning {
  kind: 'unresolved-table';
  dbId: string;
  table: string;
  message: string;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
