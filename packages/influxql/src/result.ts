/**
 * Query results and their JSON wire shape.
 */

/** A single cell of a result row */
export type RowValue = string | number | boolean | null;

/**
 * One series of a result: a measurement name, its tag set and tabular values
 */
export interface Row {
  name: string;
  tags?: Record<string, string>;
  columns: string[];
  values: RowValue[][];
}

/**
 * The output unit of one statement. Chunked statements produce several
 * Results sharing the same statementId.
 */
export interface Result {
  statementId: number;
  series: Row[];
  error?: Error;
}

/** JSON shape of a row; empty members are omitted */
export interface RowJSON {
  name?: string;
  tags?: Record<string, string>;
  columns?: string[];
  values?: RowValue[][];
}

/** JSON shape of a result: `{}`, `{ series }` or `{ error }` */
export interface ResultJSON {
  series?: RowJSON[];
  error?: string;
}

export function rowToJSON(row: Row): RowJSON {
  const json: RowJSON = {};
  if (row.name) json.name = row.name;
  if (row.tags && Object.keys(row.tags).length > 0) json.tags = row.tags;
  if (row.columns.length > 0) json.columns = row.columns;
  if (row.values.length > 0) json.values = row.values;
  return json;
}

export function resultToJSON(result: Result): ResultJSON {
  const json: ResultJSON = {};
  if (result.series.length > 0) json.series = result.series.map(rowToJSON);
  if (result.error) json.error = result.error.message;
  return json;
}

/**
 * Serialize results as the JSON array returned to clients.
 */
export function marshalResults(results: readonly Result[]): string {
  return JSON.stringify(results.map(resultToJSON));
}

/**
 * Count the value rows carried by a result
 */
export function resultRowCount(result: Result): number {
  return result.series.reduce((sum, row) => sum + row.values.length, 0);
}

/**
 * Merge chunked results of the same statement back into one Result per
 * statement. Consecutive rows with the same name and tag set are joined.
 */
export function combineResults(results: readonly Result[]): Result[] {
  const byStatement = new Map<number, Result>();
  for (const result of results) {
    let combined = byStatement.get(result.statementId);
    if (!combined) {
      combined = { statementId: result.statementId, series: [] };
      byStatement.set(result.statementId, combined);
    }
    if (result.error && !combined.error) combined.error = result.error;

    for (const row of result.series) {
      const last = combined.series[combined.series.length - 1];
      if (last && last.name === row.name && sameTags(last.tags, row.tags)) {
        last.values.push(...row.values);
      } else {
        combined.series.push({ ...row, values: [...row.values] });
      }
    }
  }
  return [...byStatement.values()].sort((a, b) => a.statementId - b.statementId);
}

function sameTags(a: Record<string, string> | undefined, b: Record<string, string> | undefined): boolean {
  const left = Object.entries(a ?? {});
  const right = b ?? {};
  return left.length === Object.keys(right).length && left.every(([k, v]) => Object.hasOwn(right, k) && right[k] === v);
}
