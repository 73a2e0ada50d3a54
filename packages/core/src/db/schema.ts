/**
 * Schema descriptor construction.
 */

import { SchemaUnavailableError, errorMessage } from '../errors.js';
import type { ColumnSpec, SchemaDescriptor, TableSpec } from './types.js';

export interface SchemaSource {
  introspect(): Promise<TableSpec[]>;
}

/** Deep-copy and freeze a table list into a shareable descriptor. */
export function createSchemaDescriptor(tables: readonly TableSpec[]): SchemaDescriptor {
  const frozenTables = tables.map((table) => {
    const columns = table.columns.map((column): ColumnSpec => Object.freeze({ ...column }));
    const copy: TableSpec =
      table.rowCount === undefined
        ? { name: table.name, columns: Object.freeze(columns) }
        : { name: table.name, columns: Object.freeze(columns), rowCount: table.rowCount };
    return Object.freeze(copy);
  });
  return Object.freeze({ tables: Object.freeze(frozenTables) });
}

/**
 * Introspect the store once and return the immutable descriptor.
 * Throws SchemaUnavailableError when the store cannot be read.
 */
export async function describeSchema(source: SchemaSource): Promise<SchemaDescriptor> {
  let tables: TableSpec[];
  try {
    tables = await source.introspect();
  } catch (err: unknown) {
    throw new SchemaUnavailableError(`Schema introspection failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  if (tables.length === 0) {
    throw new SchemaUnavailableError('The database has no tables to query.');
  }
  return createSchemaDescriptor(tables);
}

export function findTable(schema: SchemaDescriptor, name: string): TableSpec | undefined {
  const lower = name.toLowerCase();
  return schema.tables.find((t) => t.name.toLowerCase() === lower);
}
