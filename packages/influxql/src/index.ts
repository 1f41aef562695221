/**
 * @strata/influxql - Statement AST, parser and result shapes
 *
 * @example
 * ```typescript
 * import { mustParseQuery, marshalResults } from '@strata/influxql';
 *
 * const query = mustParseQuery("SELECT * FROM cpu WHERE host = 'server'; SHOW TAG KEYS FROM cpu");
 * query.statements.map((s) => s.kind); // ['select', 'show_tag_keys']
 * ```
 */

export type {
  BinaryExpr,
  BinaryOperator,
  BooleanLiteral,
  CreateDatabaseStatement,
  CreateUserStatement,
  DropDatabaseStatement,
  DropMeasurementStatement,
  DropSeriesStatement,
  DropUserStatement,
  DurationLiteral,
  Expr,
  GrantStatement,
  Measurement,
  NowCall,
  NumberLiteral,
  Privilege,
  Query,
  RequiredPrivilege,
  RevokeStatement,
  SelectField,
  SelectStatement,
  ShowDatabasesStatement,
  ShowFieldKeysStatement,
  ShowMeasurementsStatement,
  ShowRetentionPoliciesStatement,
  ShowSeriesStatement,
  ShowTagKeysStatement,
  ShowTagValuesStatement,
  ShowUsersStatement,
  Statement,
  StatementKind,
  StringLiteral,
  VarRef,
} from './ast.js';
export { requiredPrivileges } from './ast.js';

export {
  formatExpr,
  formatMeasurement,
  formatStatement,
  quoteIdent,
  quoteString,
} from './format.js';

export { mustParseQuery, parseDuration, parseQuery } from './parser.js';
export type { ParseError, ParseResult } from './parser.js';

export {
  combineResults,
  marshalResults,
  resultRowCount,
  resultToJSON,
  rowToJSON,
} from './result.js';
export type { Result, ResultJSON, Row, RowJSON, RowValue } from './result.js';
