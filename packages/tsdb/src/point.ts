/**
 * Point - a measurement name, tag set, field set and nanosecond timestamp.
 *
 * @example
 * ```typescript
 * const pt = new Point('cpu', { host: 'server01' }, { value: 0.64 }, new Date());
 * pt.key(); // 'cpu,host=server01'
 * pt.toString(); // 'cpu,host=server01 value=0.64 1700000000000000000'
 * ```
 */

import { ValidationError, type ValidationIssue } from '@strata/core';
import { z } from 'zod';
import { MAX_TIME, MIN_TIME, dateToNanos } from './time.js';

/** Value of a single field */
export type FieldValue = number | string | boolean;

export type Tags = Record<string, string>;
export type Fields = Record<string, FieldValue>;

export const fieldValueSchema = z.union([z.number().finite(), z.string(), z.boolean()]);

export const pointSchema = z.object({
  measurement: z.string().min(1, 'measurement name is required'),
  tags: z.record(z.string().min(1, 'tag key must not be empty'), z.string()),
  fields: z
    .record(z.string().min(1, 'field name must not be empty'), fieldValueSchema)
    .refine((fields) => Object.keys(fields).length > 0, 'at least one field is required'),
  time: z
    .bigint()
    .min(MIN_TIME, 'time is before the earliest supported timestamp')
    .max(MAX_TIME, 'time is after the latest supported timestamp'),
});

export class Point {
  readonly measurement: string;
  readonly tags: Tags;
  readonly fields: Fields;
  private nanos: bigint;

  constructor(measurement: string, tags: Tags, fields: Fields, time: bigint | Date) {
    this.measurement = measurement;
    this.tags = tags;
    this.fields = fields;
    this.nanos = typeof time === 'bigint' ? time : dateToNanos(time);

    const issues = this.validate();
    if (issues.length > 0) {
      throw new ValidationError(issues, 'STRATA_V601', { measurement });
    }
  }

  /** Timestamp in nanoseconds since the Unix epoch */
  get time(): bigint {
    return this.nanos;
  }

  /** Change the timestamp; has no effect on copies already written to a shard */
  setTime(time: bigint | Date): void {
    this.nanos = typeof time === 'bigint' ? time : dateToNanos(time);
  }

  /**
   * Series key: the escaped measurement followed by the tags sorted by key
   */
  key(): string {
    return seriesKey(this.measurement, this.tags);
  }

  validate(): ValidationIssue[] {
    const parsed = pointSchema.safeParse({
      measurement: this.measurement,
      tags: this.tags,
      fields: this.fields,
      time: this.nanos,
    });
    if (parsed.success) return [];
    return parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
  }

  clone(): Point {
    return new Point(this.measurement, { ...this.tags }, { ...this.fields }, this.nanos);
  }

  /** Render as one line of line protocol */
  toString(): string {
    const fields = Object.entries(this.fields)
      .map(([name, value]) => `${escapeKey(name)}=${formatFieldValue(value)}`)
      .join(',');
    return `${this.key()} ${fields} ${this.nanos}`;
  }
}

/**
 * Look up a tag or field by name. Only own properties count, so names such
 * as `constructor` never resolve through the object prototype.
 */
export function ownValue<T>(record: Readonly<Record<string, T>>, name: string): T | undefined {
  return Object.hasOwn(record, name) ? record[name] : undefined;
}

/**
 * Build the series key for a measurement and tag set
 */
export function seriesKey(measurement: string, tags: Readonly<Tags>): string {
  const parts = [escapeMeasurement(measurement)];
  for (const name of Object.keys(tags).sort()) {
    parts.push(`${escapeKey(name)}=${escapeKey(tags[name] ?? '')}`);
  }
  return parts.join(',');
}

/**
 * Validate a batch, reporting every invalid point by its position
 */
export function validatePoints(points: readonly Point[]): ValidationIssue[] {
  return points.flatMap((point, i) =>
    point.validate().map((issue) => ({
      path: issue.path ? `points.${i}.${issue.path}` : `points.${i}`,
      message: issue.message,
    }))
  );
}

function escapeMeasurement(value: string): string {
  return value.replace(/[, ]/g, (ch) => `\\${ch}`);
}

function escapeKey(value: string): string {
  return value.replace(/[,= ]/g, (ch) => `\\${ch}`);
}

function formatFieldValue(value: FieldValue): string {
  if (typeof value === 'string') {
    return `"${value.replace(/["\\]/g, (ch) => `\\${ch}`)}"`;
  }
  return String(value);
}
