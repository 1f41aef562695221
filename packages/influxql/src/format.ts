/**
 * Render statements back to query text, used in error messages and logs.
 */

import type { Expr, Measurement, Privilege, SelectField, Statement } from './ast.js';

export function quoteIdent(name: string): string {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(name) ? name : `"${name.replace(/"/g, '\\"')}"`;
}

export function quoteString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

export function formatMeasurement(m: Measurement): string {
  const parts: string[] = [];
  if (m.database) {
    parts.push(quoteIdent(m.database), m.retentionPolicy ? quoteIdent(m.retentionPolicy) : '');
  } else if (m.retentionPolicy) {
    parts.push(quoteIdent(m.retentionPolicy));
  }
  parts.push(quoteIdent(m.name));
  return parts.join('.');
}

export function formatExpr(expr: Expr): string {
  switch (expr.type) {
    case 'binary':
      return `${formatOperand(expr.lhs)} ${expr.op} ${formatOperand(expr.rhs)}`;
    case 'ref':
      return quoteIdent(expr.name);
    case 'string':
      return quoteString(expr.value);
    case 'number':
      return expr.raw;
    case 'boolean':
      return expr.value ? 'true' : 'false';
    case 'duration':
      return expr.raw;
    case 'now':
      return 'now()';
  }
}

function formatOperand(expr: Expr): string {
  return expr.type === 'binary' && (expr.op === 'AND' || expr.op === 'OR')
    ? `(${formatExpr(expr)})`
    : formatExpr(expr);
}

function formatField(field: SelectField): string {
  if (field.type === 'wildcard') return '*';
  return field.alias ? `${quoteIdent(field.name)} AS ${quoteIdent(field.alias)}` : quoteIdent(field.name);
}

function formatSources(sources: readonly Measurement[]): string {
  return sources.map(formatMeasurement).join(', ');
}

function formatPrivilege(privilege: Privilege): string {
  return privilege === 'ALL' ? 'ALL PRIVILEGES' : privilege;
}

function onDatabase(database: string | undefined): string {
  return database ? ` ON ${quoteIdent(database)}` : '';
}

function fromSources(sources: readonly Measurement[]): string {
  return sources.length > 0 ? ` FROM ${formatSources(sources)}` : '';
}

export function formatStatement(stmt: Statement): string {
  switch (stmt.kind) {
    case 'select': {
      let text = `SELECT ${stmt.fields.map(formatField).join(', ')} FROM ${formatSources(stmt.sources)}`;
      if (stmt.condition) text += ` WHERE ${formatExpr(stmt.condition)}`;
      if (stmt.limit > 0) text += ` LIMIT ${stmt.limit}`;
      if (stmt.offset > 0) text += ` OFFSET ${stmt.offset}`;
      return text;
    }
    case 'drop_series': {
      let text = `DROP SERIES${fromSources(stmt.sources)}`;
      if (stmt.condition) text += ` WHERE ${formatExpr(stmt.condition)}`;
      return text;
    }
    case 'drop_measurement':
      return `DROP MEASUREMENT ${quoteIdent(stmt.name)}`;
    case 'show_measurements':
      return `SHOW MEASUREMENTS${onDatabase(stmt.database)}`;
    case 'show_series':
      return `SHOW SERIES${onDatabase(stmt.database)}${fromSources(stmt.sources)}`;
    case 'show_tag_keys':
      return `SHOW TAG KEYS${onDatabase(stmt.database)}${fromSources(stmt.sources)}`;
    case 'show_tag_values': {
      const keys =
        stmt.tagKeys.length === 1
          ? `= ${quoteIdent(stmt.tagKeys[0] ?? '')}`
          : `IN (${stmt.tagKeys.map(quoteIdent).join(', ')})`;
      return `SHOW TAG VALUES${onDatabase(stmt.database)}${fromSources(stmt.sources)} WITH KEY ${keys}`;
    }
    case 'show_field_keys':
      return `SHOW FIELD KEYS${onDatabase(stmt.database)}${fromSources(stmt.sources)}`;
    case 'show_databases':
      return 'SHOW DATABASES';
    case 'create_database':
      return `CREATE DATABASE ${stmt.ifNotExists ? 'IF NOT EXISTS ' : ''}${quoteIdent(stmt.name)}`;
    case 'drop_database':
      return `DROP DATABASE ${quoteIdent(stmt.name)}`;
    case 'show_retention_policies':
      return `SHOW RETENTION POLICIES ON ${quoteIdent(stmt.database)}`;
    case 'create_user':
      // Never echo the password back
      return `CREATE USER ${quoteIdent(stmt.name)} WITH PASSWORD [REDACTED]${stmt.admin ? ' WITH ALL PRIVILEGES' : ''}`;
    case 'drop_user':
      return `DROP USER ${quoteIdent(stmt.name)}`;
    case 'show_users':
      return 'SHOW USERS';
    case 'grant':
      return `GRANT ${formatPrivilege(stmt.privilege)}${onDatabase(stmt.database)} TO ${quoteIdent(stmt.user)}`;
    case 'revoke':
      return `REVOKE ${formatPrivilege(stmt.privilege)}${onDatabase(stmt.database)} FROM ${quoteIdent(stmt.user)}`;
  }
}
