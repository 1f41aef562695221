/**
 * WHERE clause evaluation against stored rows.
 */

import { QueryError } from '@strata/core';
import type { BinaryOperator, Expr } from '@strata/influxql';
import { ownValue, type Fields, type Tags } from './point.js';
import { MIN_TIME, parseRFC3339Nano } from './time.js';

type Value = string | number | boolean | bigint | null;

/** A row as seen by a condition */
export interface ConditionRow {
  readonly time: bigint;
  readonly tags: Readonly<Tags>;
  readonly fields: Readonly<Fields>;
}

/** Inclusive nanosecond bounds */
export interface TimeRange {
  readonly min: bigint;
  readonly max: bigint;
}

/**
 * Bounds implied by `time` comparisons joined with AND at the top of the
 * condition. Without an upper bound the range ends at `now`.
 */
export function timeRange(condition: Expr | undefined, now: bigint): TimeRange {
  let min = MIN_TIME;
  let max: bigint | null = null;

  for (const expr of conjuncts(condition)) {
    if (expr.type !== 'binary') continue;
    let op = expr.op;
    let other: Expr;
    if (isTimeRef(expr.lhs)) {
      other = expr.rhs;
    } else if (isTimeRef(expr.rhs)) {
      other = expr.lhs;
      op = flip(op);
    } else {
      continue;
    }

    const value = timeValue(other, now);
    if (value === null) continue;
    switch (op) {
      case '>':
        min = maxOf(min, value + 1n);
        break;
      case '>=':
        min = maxOf(min, value);
        break;
      case '<':
        max = minOf(max, value - 1n);
        break;
      case '<=':
        max = minOf(max, value);
        break;
      case '=':
        min = maxOf(min, value);
        max = minOf(max, value);
        break;
      default:
        break;
    }
  }

  return { min, max: max ?? now };
}

/**
 * Tag equality filter from a condition made only of `tag = 'value'`
 * comparisons joined with AND
 */
export function tagFilter(condition: Expr | undefined): Tags {
  const tags: Tags = {};
  for (const expr of conjuncts(condition)) {
    if (expr.type === 'binary' && expr.op === '=') {
      if (expr.lhs.type === 'ref' && expr.rhs.type === 'string') {
        tags[expr.lhs.name] = expr.rhs.value;
        continue;
      }
      if (expr.rhs.type === 'ref' && expr.lhs.type === 'string') {
        tags[expr.rhs.name] = expr.lhs.value;
        continue;
      }
    }
    throw new QueryError('STRATA_Q500', 'only tag equality conditions joined by AND are supported here', {
      condition: expr.type,
    });
  }
  return tags;
}

/**
 * Whether a row satisfies the condition. References resolve to `time`, then
 * fields, then tags.
 */
export function matchesCondition(condition: Expr | undefined, row: ConditionRow, now: bigint): boolean {
  return condition === undefined || evaluate(condition, row, now) === true;
}

/** Resolve an expression to a nanosecond timestamp, or null if it is not one */
export function timeValue(expr: Expr, now: bigint): bigint | null {
  switch (expr.type) {
    case 'string':
      return parseRFC3339Nano(expr.value);
    case 'number':
      return /^-?\d+$/.test(expr.raw) ? BigInt(expr.raw) : BigInt(Math.trunc(expr.value));
    case 'duration':
      return expr.ns;
    case 'now':
      return now;
    case 'binary': {
      if (expr.op !== '+' && expr.op !== '-') return null;
      const lhs = timeValue(expr.lhs, now);
      const rhs = timeValue(expr.rhs, now);
      if (lhs === null || rhs === null) return null;
      return expr.op === '+' ? lhs + rhs : lhs - rhs;
    }
    default:
      return null;
  }
}

function evaluate(expr: Expr, row: ConditionRow, now: bigint): Value {
  switch (expr.type) {
    case 'ref': {
      if (isTimeRef(expr)) return row.time;
      const field = ownValue(row.fields, expr.name);
      if (field !== undefined) return field;
      return ownValue(row.tags, expr.name) ?? null;
    }
    case 'string':
    case 'boolean':
      return expr.value;
    case 'number':
      return Number.isSafeInteger(expr.value) || !/^-?\d+$/.test(expr.raw) ? expr.value : BigInt(expr.raw);
    case 'duration':
      return expr.ns;
    case 'now':
      return now;
    case 'binary':
      break;
  }

  if (expr.op === 'AND') {
    return evaluate(expr.lhs, row, now) === true && evaluate(expr.rhs, row, now) === true;
  }
  if (expr.op === 'OR') {
    return evaluate(expr.lhs, row, now) === true || evaluate(expr.rhs, row, now) === true;
  }

  const lhs = evaluate(expr.lhs, row, now);
  const rhs = evaluate(expr.rhs, row, now);
  if (expr.op === '+' || expr.op === '-') return arithmetic(expr.op, lhs, rhs);
  return compare(expr.op, lhs, rhs);
}

function arithmetic(op: '+' | '-', lhs: Value, rhs: Value): Value {
  if (typeof lhs === 'bigint' || typeof rhs === 'bigint') {
    const a = toNanos(lhs);
    const b = toNanos(rhs);
    if (a === null || b === null) return null;
    return op === '+' ? a + b : a - b;
  }
  if (typeof lhs === 'number' && typeof rhs === 'number') {
    return op === '+' ? lhs + rhs : lhs - rhs;
  }
  return null;
}

function compare(op: BinaryOperator, lhs: Value, rhs: Value): boolean {
  if (lhs === null || rhs === null) {
    return op === '!=' && lhs !== rhs;
  }

  let order: number | null = null;
  if (typeof lhs === 'bigint' || typeof rhs === 'bigint') {
    const a = toNanos(lhs);
    const b = toNanos(rhs);
    if (a !== null && b !== null) order = a < b ? -1 : a > b ? 1 : 0;
  } else if (typeof lhs === 'number' && typeof rhs === 'number') {
    order = lhs < rhs ? -1 : lhs > rhs ? 1 : 0;
  } else if (typeof lhs === 'string' && typeof rhs === 'string') {
    order = lhs < rhs ? -1 : lhs > rhs ? 1 : 0;
  } else if (typeof lhs === 'boolean' && typeof rhs === 'boolean') {
    if (op === '=') return lhs === rhs;
    if (op === '!=') return lhs !== rhs;
    return false;
  }

  if (order === null) return op === '!=';
  switch (op) {
    case '=':
      return order === 0;
    case '!=':
      return order !== 0;
    case '<':
      return order < 0;
    case '<=':
      return order <= 0;
    case '>':
      return order > 0;
    case '>=':
      return order >= 0;
    default:
      return false;
  }
}

function toNanos(value: Value): bigint | null {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? BigInt(Math.trunc(value)) : null;
  if (typeof value === 'string') return parseRFC3339Nano(value);
  return null;
}

function conjuncts(expr: Expr | undefined): Expr[] {
  if (!expr) return [];
  if (expr.type === 'binary' && expr.op === 'AND') {
    return [...conjuncts(expr.lhs), ...conjuncts(expr.rhs)];
  }
  return [expr];
}

function isTimeRef(expr: Expr): boolean {
  return expr.type === 'ref' && expr.name.toLowerCase() === 'time';
}

function flip(op: BinaryOperator): BinaryOperator {
  switch (op) {
    case '<':
      return '>';
    case '<=':
      return '>=';
    case '>':
      return '<';
    case '>=':
      return '<=';
    default:
      return op;
  }
}

function maxOf(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

function minOf(a: bigint | null, b: bigint): bigint {
  return a === null || b < a ? b : a;
}
