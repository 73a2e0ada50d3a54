/**
 * Store-facing types: the schema descriptor and the tabular result
 * shape every downstream component consumes.
 */

export interface ColumnSpec {
  readonly name: string;
  readonly declaredType: string;
  readonly nullable?: boolean;
  readonly isPrimaryKey?: boolean;
}

export interface TableSpec {
  readonly name: string;
  readonly columns: readonly ColumnSpec[];
  /** Row count captured at introspection time */
  readonly rowCount?: number;
}

/**
 * Immutable description of the tables and columns the generator may use.
 * Built once and shared read-only by every pipeline invocation.
 */
export interface SchemaDescriptor {
  readonly tables: readonly TableSpec[];
}

export type InferredType = 'number' | 'text' | 'datetime' | 'boolean' | 'blob' | 'unknown';

export interface ResultColumn {
  readonly name: string;
  readonly inferredType: InferredType;
}

export interface QueryResult {
  readonly columns: readonly ResultColumn[];
  /** Row tuples, values in column order */
  readonly rows: readonly (readonly unknown[])[];
  /** Rows actually returned (after truncation) */
  readonly rowCount: number;
  /** True when the query had more rows than maxRows */
  readonly truncated: boolean;
  readonly execMs: number;
}

export interface ExecuteLimits {
  maxRows: number;
  timeoutMs: number;
}
