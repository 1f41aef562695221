/**
 * In-memory series data and schema catalogue of one shard.
 *
 * Row data lives in `series`; tag keys and field keys live in a per-measurement
 * catalogue that dropping series does not touch. Every mutation runs to
 * completion synchronously, so readers observe a batch entirely or not at all.
 */

import { ownValue, seriesKey, type Fields, type Tags } from './point.js';

/** Field set recorded at one timestamp */
export interface SeriesRecord {
  readonly time: bigint;
  readonly fields: Readonly<Fields>;
}

export interface Series {
  readonly key: string;
  readonly measurement: string;
  readonly tags: Readonly<Tags>;
  /** Ascending by time, one record per timestamp */
  readonly records: SeriesRecord[];
}

/** Input accepted by {@link ShardIndex.apply} */
export interface PointData {
  readonly measurement: string;
  readonly tags: Readonly<Tags>;
  readonly fields: Readonly<Fields>;
  readonly time: bigint;
}

export interface ScanOptions {
  /** Inclusive lower time bound */
  start?: bigint;
  /** Inclusive upper time bound */
  end?: bigint;
  /** Only series whose tags equal all of these */
  tags?: Readonly<Tags>;
}

/** Rows of one series returned by a scan */
export interface ScanSeries {
  readonly key: string;
  readonly measurement: string;
  readonly tags: Readonly<Tags>;
  readonly rows: readonly SeriesRecord[];
}

interface MeasurementCatalogue {
  readonly seriesKeys: Set<string>;
  readonly tagKeys: Set<string>;
  /** Field names in discovery order */
  readonly fieldKeys: Set<string>;
}

export class ShardIndex {
  private readonly series = new Map<string, Series>();
  private readonly catalogue = new Map<string, MeasurementCatalogue>();

  /**
   * Apply a batch in order. A later point at the same series and timestamp
   * replaces the earlier field set.
   */
  apply(points: readonly PointData[]): void {
    for (const point of points) {
      const key = seriesKey(point.measurement, point.tags);
      const entry = this.measurement(point.measurement);

      let series = this.series.get(key);
      if (!series) {
        series = {
          key,
          measurement: point.measurement,
          tags: Object.freeze({ ...point.tags }),
          records: [],
        };
        this.series.set(key, series);
        entry.seriesKeys.add(key);
      }

      for (const tagKey of Object.keys(point.tags)) entry.tagKeys.add(tagKey);
      for (const name of Object.keys(point.fields)) entry.fieldKeys.add(name);

      insertRecord(series.records, { time: point.time, fields: Object.freeze({ ...point.fields }) });
    }
  }

  /**
   * Remove the row data of a measurement's series, optionally only the
   * series matching `tags`. The catalogue is kept.
   */
  dropSeries(measurement: string, tags?: Readonly<Tags>): number {
    const entry = this.catalogue.get(measurement);
    if (!entry) return 0;

    let dropped = 0;
    for (const key of [...entry.seriesKeys]) {
      const series = this.series.get(key);
      if (series && tags && !matchesTags(series.tags, tags)) continue;
      this.series.delete(key);
      entry.seriesKeys.delete(key);
      dropped++;
    }
    return dropped;
  }

  /** Remove a measurement's data and catalogue */
  dropMeasurement(measurement: string): boolean {
    const entry = this.catalogue.get(measurement);
    if (!entry) return false;
    for (const key of entry.seriesKeys) this.series.delete(key);
    this.catalogue.delete(measurement);
    return true;
  }

  /**
   * Rows of a measurement ascending by time within each series. Series are
   * returned in the order they were first written; series without matching
   * rows are left out.
   */
  scan(measurement: string, options: ScanOptions = {}): ScanSeries[] {
    const entry = this.catalogue.get(measurement);
    if (!entry) return [];

    const result: ScanSeries[] = [];
    for (const key of entry.seriesKeys) {
      const series = this.series.get(key);
      if (!series) continue;
      if (options.tags && !matchesTags(series.tags, options.tags)) continue;

      const rows = sliceByTime(series.records, options.start, options.end);
      if (rows.length > 0) {
        result.push({ key, measurement, tags: series.tags, rows });
      }
    }
    return result;
  }

  hasMeasurement(measurement: string): boolean {
    return this.catalogue.has(measurement);
  }

  measurements(): string[] {
    return [...this.catalogue.keys()].sort();
  }

  /** Series of a measurement in first-written order */
  seriesOf(measurement: string): Series[] {
    const keys = this.catalogue.get(measurement)?.seriesKeys ?? new Set<string>();
    return [...keys].flatMap((key) => {
      const series = this.series.get(key);
      return series ? [series] : [];
    });
  }

  tagKeys(measurement: string): string[] {
    return [...(this.catalogue.get(measurement)?.tagKeys ?? [])].sort();
  }

  /** Values of a tag key across the measurement's current series, sorted */
  tagValues(measurement: string, tagKey: string): string[] {
    const values = new Set<string>();
    for (const series of this.seriesOf(measurement)) {
      const value = ownValue(series.tags, tagKey);
      if (value !== undefined) values.add(value);
    }
    return [...values].sort();
  }

  /** Field names in discovery order */
  fieldKeys(measurement: string): string[] {
    return [...(this.catalogue.get(measurement)?.fieldKeys ?? [])];
  }

  /**
   * Register catalogue entries without row data, used when restoring a
   * measurement whose series were all dropped
   */
  restoreCatalogue(measurement: string, tagKeys: readonly string[], fieldKeys: readonly string[]): void {
    const entry = this.measurement(measurement);
    for (const key of tagKeys) entry.tagKeys.add(key);
    for (const name of fieldKeys) entry.fieldKeys.add(name);
  }

  /** Every series in first-written order */
  allSeries(): Series[] {
    return [...this.series.values()];
  }

  get seriesCount(): number {
    return this.series.size;
  }

  get pointCount(): number {
    let count = 0;
    for (const series of this.series.values()) count += series.records.length;
    return count;
  }

  private measurement(name: string): MeasurementCatalogue {
    let entry = this.catalogue.get(name);
    if (!entry) {
      entry = { seriesKeys: new Set(), tagKeys: new Set(), fieldKeys: new Set() };
      this.catalogue.set(name, entry);
    }
    return entry;
  }
}

export function matchesTags(tags: Readonly<Tags>, filter: Readonly<Tags>): boolean {
  return Object.entries(filter).every(([key, value]) => (ownValue(tags, key) ?? '') === value);
}

function insertRecord(records: SeriesRecord[], record: SeriesRecord): void {
  const last = records[records.length - 1];
  if (!last || last.time < record.time) {
    records.push(record);
    return;
  }

  const i = lowerBound(records, record.time);
  if (records[i]?.time === record.time) {
    records[i] = record;
  } else {
    records.splice(i, 0, record);
  }
}

/** Index of the first record with `time >= target` */
function lowerBound(records: readonly SeriesRecord[], target: bigint): number {
  let lo = 0;
  let hi = records.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const record = records[mid];
    if (record && record.time < target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

function sliceByTime(records: readonly SeriesRecord[], start?: bigint, end?: bigint): SeriesRecord[] {
  const from = start === undefined ? 0 : lowerBound(records, start);
  const to = end === undefined ? records.length : lowerBound(records, end + 1n);
  return records.slice(from, to);
}
