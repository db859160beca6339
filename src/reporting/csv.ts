/**
 * Bulk report files: `deepeval_results_*.csv` under a results directory.
 *
 * Each file carries rows in the shape of `ResultRow` with the header
 * `timestamp,test_case_name,metric_name,score,threshold,success,reason,error`.
 * Empty `threshold`, `reason` and `error` cells read back as null.
 */

import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import pLimit from 'p-limit';
import { PersistenceError, toError } from '../errors.js';
import { formatTimestamp, parseTimestamp, type ResultRow } from './rows.js';

export const RESULTS_CSV_PREFIX = 'deepeval_results_';

export const RESULTS_CSV_COLUMNS = [
  'timestamp',
  'test_case_name',
  'metric_name',
  'score',
  'threshold',
  'success',
  'reason',
  'error',
] as const;

type Column = (typeof RESULTS_CSV_COLUMNS)[number];

const MAX_NAME_ATTEMPTS = 1000;

export function isResultsCsvName(fileName: string): boolean {
  return fileName.startsWith(RESULTS_CSV_PREFIX) && fileName.endsWith('.csv');
}

// -- Encoding --

export function formatCsv(rows: ResultRow[]): string {
  const lines = [RESULTS_CSV_COLUMNS.join(',')];
  for (const row of rows) {
    lines.push(
      [
        row.timestamp,
        row.testCaseName,
        row.metricName,
        String(row.score),
        row.threshold === null ? '' : String(row.threshold),
        row.success ? 'True' : 'False',
        row.reason ?? '',
        row.error ?? '',
      ]
        .map(escapeField)
        .join(','),
    );
  }
  return `${lines.join('\n')}\n`;
}

function escapeField(value: string): string {
  if (/[",\r\n]/.test(value) || value !== value.trim()) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

// -- Decoding --

/**
 * Parse CSV text into rows. Columns are matched by header name; unknown
 * columns are ignored.
 */
export function parseCsv(text: string, source = 'csv'): ResultRow[] {
  const records = splitRecords(text, source);
  const header = records.shift();
  if (!header) return [];

  const index = new Map<Column, number>();
  for (const column of RESULTS_CSV_COLUMNS) {
    const i = header.indexOf(column);
    if (i === -1) {
      throw new PersistenceError(`${source}: missing column '${column}'`);
    }
    index.set(column, i);
  }

  return records.map((fields, n) => {
    const line = n + 2;
    const cell = (column: Column): string => fields[index.get(column) ?? -1] ?? '';
    const fail = (message: string) => new PersistenceError(`${source}, row ${line}: ${message}`);

    const timestamp = cell('timestamp');
    try {
      parseTimestamp(timestamp);
    } catch (e) {
      throw fail(toError(e).message);
    }

    const score = parseNumber(cell('score'));
    if (score === null) throw fail(`invalid score '${cell('score')}'`);

    const thresholdCell = cell('threshold');
    const threshold = thresholdCell === '' ? null : parseNumber(thresholdCell);
    if (thresholdCell !== '' && threshold === null) {
      throw fail(`invalid threshold '${thresholdCell}'`);
    }

    const success = parseBoolean(cell('success'));
    if (success === null) throw fail(`invalid success flag '${cell('success')}'`);

    return {
      timestamp,
      testCaseName: cell('test_case_name'),
      metricName: cell('metric_name'),
      score,
      threshold,
      success,
      reason: cell('reason') || null,
      error: cell('error') || null,
    };
  });
}

function parseNumber(value: string): number | null {
  if (value.trim() === '') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

function parseBoolean(value: string): boolean | null {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      return null;
  }
}

/**
 * RFC 4180 record splitting. Blank lines are skipped.
 */
function splitRecords(text: string, source: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = 0;

  const endRecord = () => {
    fields.push(field);
    if (!(fields.length === 1 && fields[0] === '')) records.push(fields);
    fields = [];
    field = '';
  };

  while (i < text.length) {
    const ch = text.charAt(i);
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && field === '') {
      inQuotes = true;
    } else if (ch === ',') {
      fields.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      endRecord();
    } else {
      field += ch;
    }
    i++;
  }

  if (inQuotes) {
    throw new PersistenceError(`${source}: unterminated quoted field`);
  }
  if (field !== '' || fields.length > 0) endRecord();
  return records;
}

// -- Files --

/**
 * Write rows to a new `deepeval_results_{YYYYMMDD_HHMMSS}.csv` file and
 * return its path. Existing files are never overwritten.
 */
export async function writeResultsCsv(
  dir: string,
  rows: ResultRow[],
  opts?: { now?: number },
): Promise<string> {
  const stem = `${RESULTS_CSV_PREFIX}${formatTimestamp(opts?.now ?? Date.now())}`;
  const content = formatCsv(rows);

  try {
    await mkdir(dir, { recursive: true });
    for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt++) {
      const path = join(dir, attempt === 1 ? `${stem}.csv` : `${stem}_${attempt}.csv`);
      try {
        await writeFile(path, content, { encoding: 'utf-8', flag: 'wx' });
        return path;
      } catch (e) {
        if (!(e instanceof Error && 'code' in e && e.code === 'EEXIST')) throw e;
      }
    }
  } catch (e) {
    const error = toError(e);
    throw new PersistenceError(`Could not write results CSV in '${dir}': ${error.message}`, {
      cause: error,
    });
  }
  throw new PersistenceError(`Could not find a free results CSV name for '${stem}' in '${dir}'`);
}

/**
 * Read every `deepeval_results_*.csv` file in `dir`, in file-name order.
 * A missing directory yields no rows.
 */
export async function loadResultRows(
  dir: string,
  opts?: { maxConcurrency?: number },
): Promise<ResultRow[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return [];
    const error = toError(e);
    throw new PersistenceError(`Could not list results directory '${dir}': ${error.message}`, {
      cause: error,
    });
  }

  const files = entries.filter(isResultsCsvName).sort();
  const limit = pLimit(opts?.maxConcurrency ?? 8);
  const perFile = await Promise.all(
    files.map((file) =>
      limit(async () => {
        let text: string;
        try {
          text = await readFile(join(dir, file), 'utf-8');
        } catch (e) {
          const error = toError(e);
          throw new PersistenceError(`Could not read '${file}': ${error.message}`, {
            cause: error,
          });
        }
        return parseCsv(text, file);
      }),
    ),
  );
  return perFile.flat();
}
