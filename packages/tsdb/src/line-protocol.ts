/**
 * Line protocol parser.
 *
 * ```
 * measurement[,tag=value...] field=value[,field=value...] [timestamp]
 * ```
 *
 * Field values are floats (`1.5`), integers (`42i`), double-quoted strings or
 * booleans (`t`, `true`, `F`, `false`, ...). Commas, equals signs and spaces in
 * names are escaped with a backslash. Lines starting with `#` are comments.
 */

import { ValidationError } from '@strata/core';
import { Point, type FieldValue, type Fields, type Tags } from './point.js';
import { nowNanos, precisionMultiplier, type Precision } from './time.js';

const TRUE_VALUES = new Set(['t', 'T', 'true', 'True', 'TRUE']);
const FALSE_VALUES = new Set(['f', 'F', 'false', 'False', 'FALSE']);
const FLOAT_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

class LineError extends Error {}

/**
 * Parse line protocol text into points. Lines without a timestamp get the
 * current time.
 */
export function parsePoints(text: string, precision: Precision = 'ns'): Point[] {
  const multiplier = precisionMultiplier(precision);
  const defaultTime = nowNanos();
  const points: Point[] = [];

  text.split('\n').forEach((raw, i) => {
    const line = raw.trim();
    if (!line || line.startsWith('#')) return;
    try {
      points.push(parseLine(line, multiplier, defaultTime));
    } catch (err) {
      if (err instanceof LineError) {
        throw new ValidationError([{ path: `line ${i + 1}`, message: err.message }], 'STRATA_V601', {
          line,
        });
      }
      throw err;
    }
  });

  return points;
}

function parseLine(line: string, multiplier: bigint, defaultTime: bigint): Point {
  const sections = splitUnescaped(line, ' ', true).filter(Boolean);
  if (sections.length < 2 || sections.length > 3) {
    throw new LineError('expected measurement, fields and optional timestamp');
  }
  const [keySection = '', fieldSection = '', timeSection] = sections;

  const [measurementText = '', ...tagTexts] = splitUnescaped(keySection, ',', false);
  const measurement = unescape(measurementText);
  if (!measurement) throw new LineError('missing measurement');

  const tags: Tags = {};
  for (const tagText of tagTexts) {
    const [name, value] = splitPair(tagText);
    if (!value) throw new LineError(`missing tag value for ${name}`);
    tags[name] = value;
  }

  const fields: Fields = {};
  for (const fieldText of splitUnescaped(fieldSection, ',', true)) {
    const eq = indexOfUnescaped(fieldText, '=');
    if (eq <= 0) throw new LineError(`invalid field: ${fieldText}`);
    fields[unescape(fieldText.slice(0, eq))] = parseFieldValue(fieldText.slice(eq + 1));
  }

  let time = defaultTime;
  if (timeSection !== undefined) {
    if (!/^-?\d+$/.test(timeSection)) throw new LineError(`invalid timestamp: ${timeSection}`);
    time = BigInt(timeSection) * multiplier;
  }

  return new Point(measurement, tags, fields, time);
}

function parseFieldValue(text: string): FieldValue {
  if (text.startsWith('"')) {
    if (text.length < 2 || !text.endsWith('"')) throw new LineError(`unterminated string: ${text}`);
    return text.slice(1, -1).replace(/\\(["\\])/g, '$1');
  }
  if (/^-?\d+i$/.test(text)) {
    const value = Number(text.slice(0, -1));
    if (!Number.isSafeInteger(value)) throw new LineError(`integer out of range: ${text}`);
    return value;
  }
  if (TRUE_VALUES.has(text)) return true;
  if (FALSE_VALUES.has(text)) return false;
  if (FLOAT_PATTERN.test(text)) return Number(text);
  throw new LineError(`invalid field value: ${text}`);
}

function splitPair(text: string): [string, string] {
  const eq = indexOfUnescaped(text, '=');
  if (eq <= 0) throw new LineError(`invalid tag: ${text}`);
  return [unescape(text.slice(0, eq)), unescape(text.slice(eq + 1))];
}

/** Split on `separator`, skipping escaped characters and, optionally, quoted strings */
function splitUnescaped(text: string, separator: string, quotes: boolean): string[] {
  const parts: string[] = [];
  let current = '';
  let quoted = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === '\\' && i + 1 < text.length) {
      current += ch + text.charAt(i + 1);
      i++;
    } else if (quotes && ch === '"') {
      quoted = !quoted;
      current += ch;
    } else if (ch === separator && !quoted) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  if (quoted) throw new LineError('unterminated string');
  parts.push(current);
  return parts;
}

function indexOfUnescaped(text: string, ch: string): number {
  for (let i = 0; i < text.length; i++) {
    if (text.charAt(i) === '\\') {
      i++;
    } else if (text.charAt(i) === ch) {
      return i;
    }
  }
  return -1;
}

function unescape(text: string): string {
  return text.replace(/\\([,= ])/g, '$1');
}
