/**
 * Statement AST dispatched on by the query executor.
 */

/**
 * Database privilege levels
 */
export type Privilege = 'NO_PRIVILEGES' | 'READ' | 'WRITE' | 'ALL';

/**
 * A measurement reference, optionally qualified by database and retention policy
 */
export interface Measurement {
  readonly database?: string;
  readonly retentionPolicy?: string;
  readonly name: string;
}

export type BinaryOperator = 'AND' | 'OR' | '=' | '!=' | '<' | '<=' | '>' | '>=' | '+' | '-';

export interface BinaryExpr {
  readonly type: 'binary';
  readonly op: BinaryOperator;
  readonly lhs: Expr;
  readonly rhs: Expr;
}

export interface VarRef {
  readonly type: 'ref';
  readonly name: string;
}

export interface StringLiteral {
  readonly type: 'string';
  readonly value: string;
}

export interface NumberLiteral {
  readonly type: 'number';
  readonly value: number;
  /** Source text, kept so nanosecond integers do not lose precision */
  readonly raw: string;
}

export interface BooleanLiteral {
  readonly type: 'boolean';
  readonly value: boolean;
}

export interface DurationLiteral {
  readonly type: 'duration';
  /** Duration in nanoseconds */
  readonly ns: bigint;
  readonly raw: string;
}

export interface NowCall {
  readonly type: 'now';
}

export type Expr =
  | BinaryExpr
  | VarRef
  | StringLiteral
  | NumberLiteral
  | BooleanLiteral
  | DurationLiteral
  | NowCall;

/**
 * A projected field in a SELECT; `*` is represented as a wildcard
 */
export type SelectField =
  | { readonly type: 'wildcard' }
  | { readonly type: 'field'; readonly name: string; readonly alias?: string };

export interface SelectStatement {
  readonly kind: 'select';
  readonly fields: readonly SelectField[];
  readonly sources: readonly Measurement[];
  readonly condition?: Expr;
  /** Maximum rows per series; 0 means unlimited */
  readonly limit: number;
  readonly offset: number;
}

export interface DropSeriesStatement {
  readonly kind: 'drop_series';
  readonly sources: readonly Measurement[];
  readonly condition?: Expr;
}

export interface DropMeasurementStatement {
  readonly kind: 'drop_measurement';
  readonly name: string;
}

export interface ShowMeasurementsStatement {
  readonly kind: 'show_measurements';
  readonly database?: string;
}

export interface ShowSeriesStatement {
  readonly kind: 'show_series';
  readonly database?: string;
  readonly sources: readonly Measurement[];
}

export interface ShowTagKeysStatement {
  readonly kind: 'show_tag_keys';
  readonly database?: string;
  readonly sources: readonly Measurement[];
}

export interface ShowTagValuesStatement {
  readonly kind: 'show_tag_values';
  readonly database?: string;
  readonly sources: readonly Measurement[];
  readonly tagKeys: readonly string[];
}

export interface ShowFieldKeysStatement {
  readonly kind: 'show_field_keys';
  readonly database?: string;
  readonly sources: readonly Measurement[];
}

export interface ShowDatabasesStatement {
  readonly kind: 'show_databases';
}

export interface CreateDatabaseStatement {
  readonly kind: 'create_database';
  readonly name: string;
  readonly ifNotExists: boolean;
}

export interface DropDatabaseStatement {
  readonly kind: 'drop_database';
  readonly name: string;
}

export interface ShowRetentionPoliciesStatement {
  readonly kind: 'show_retention_policies';
  readonly database: string;
}

export interface CreateUserStatement {
  readonly kind: 'create_user';
  readonly name: string;
  readonly password: string;
  /** WITH ALL PRIVILEGES */
  readonly admin: boolean;
}

export interface DropUserStatement {
  readonly kind: 'drop_user';
  readonly name: string;
}

export interface ShowUsersStatement {
  readonly kind: 'show_users';
}

export interface GrantStatement {
  readonly kind: 'grant';
  readonly privilege: Privilege;
  /** Database the privilege applies to; absent for `GRANT ALL PRIVILEGES TO user` */
  readonly database?: string;
  readonly user: string;
}

export interface RevokeStatement {
  readonly kind: 'revoke';
  readonly privilege: Privilege;
  readonly database?: string;
  readonly user: string;
}

export type Statement =
  | SelectStatement
  | DropSeriesStatement
  | DropMeasurementStatement
  | ShowMeasurementsStatement
  | ShowSeriesStatement
  | ShowTagKeysStatement
  | ShowTagValuesStatement
  | ShowFieldKeysStatement
  | ShowDatabasesStatement
  | CreateDatabaseStatement
  | DropDatabaseStatement
  | ShowRetentionPoliciesStatement
  | CreateUserStatement
  | DropUserStatement
  | ShowUsersStatement
  | GrantStatement
  | RevokeStatement;

export type StatementKind = Statement['kind'];

/**
 * A parsed query: an ordered list of statements
 */
export interface Query {
  readonly statements: readonly Statement[];
}

/**
 * A privilege a caller must hold to run a statement
 */
export interface RequiredPrivilege {
  /** The statement can only be run by an admin user */
  readonly admin: boolean;
  /** Database the privilege applies to; empty means the caller's default database */
  readonly database: string;
  readonly privilege: Privilege;
}

/**
 * Privileges required to execute a statement
 */
export function requiredPrivileges(stmt: Statement): RequiredPrivilege[] {
  switch (stmt.kind) {
    case 'select':
      return stmt.sources.map((m) => ({ admin: false, database: m.database ?? '', privilege: 'READ' }));
    case 'drop_series':
      if (stmt.sources.length === 0) return [{ admin: false, database: '', privilege: 'WRITE' }];
      return stmt.sources.map((m) => ({ admin: false, database: m.database ?? '', privilege: 'WRITE' }));
    case 'show_measurements':
    case 'show_series':
    case 'show_tag_keys':
    case 'show_tag_values':
    case 'show_field_keys':
      return [{ admin: false, database: stmt.database ?? '', privilege: 'READ' }];
    case 'show_retention_policies':
      return [{ admin: false, database: stmt.database, privilege: 'READ' }];
    case 'drop_measurement':
    case 'show_databases':
    case 'create_database':
    case 'drop_database':
    case 'create_user':
    case 'drop_user':
    case 'show_users':
    case 'grant':
    case 'revoke':
      return [{ admin: true, database: '', privilege: 'ALL' }];
  }
}
