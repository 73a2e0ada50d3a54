/**
 * Validator types.
 *
 * The validator classifies; it never rewrites. A verdict is the complete
 * record of why a candidate was or was not admitted.
 */

export type ReasonCode =
  | 'Admitted'
  | 'NoStatementFound'
  | 'NotReadOnly'
  | 'DeniedKeyword'
  | 'MultiStatement'
  | 'BlockedTable'
  | 'Unparseable';

export type DenyCategory =
  | 'dataModification'
  | 'schemaChange'
  | 'privilege'
  | 'statementChaining'
  | 'fileAccess'
  | 'administrative';

export interface ValidationVerdict {
  readonly admitted: boolean;
  readonly reasonCode: ReasonCode;
  /** The keyword or construct that caused the rejection */
  readonly matchedPattern: string | null;
  /** Denylist category, only for DeniedKeyword */
  readonly category: DenyCategory | null;
  readonly message: string;
  /** Non-blocking notes (e.g. the AST parser could not read the statement) */
  readonly warnings: readonly string[];
}

export interface ValidationPolicy {
  /** Confirm the text verdict with an AST parse. Default: true */
  useAst: boolean;
  /** Reject when the AST parser cannot read the statement. Default: false */
  requireParse: boolean;
  /** Tables that may never be referenced */
  blockedTables: string[];
  /** Parser dialect passed to node-sql-parser. Default: 'sqlite' */
  dialect: string;
}

export function defaultValidationPolicy(): ValidationPolicy {
  return {
    useAst: true,
    requireParse: false,
    blockedTables: [],
    dialect: 'sqlite',
  };
}
