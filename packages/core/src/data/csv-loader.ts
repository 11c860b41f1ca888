/**
 * CSV Table Loader
 *
 * Reads a CSV file with a header row into a Table. Numeric cells are cast to
 * numbers; everything else stays a string.
 */

import { readFileSync } from 'fs';
import { parse as parseCsv } from 'csv-parse/sync';
import { z } from 'zod';
import { NotFoundError, ParseError } from '@trialkey/utils';
import type { Row, Table } from './table.js';

const CsvRecordsSchema = z.array(z.array(z.union([z.string(), z.number()])));

function readText(path: string): string {
  try {
    return readFileSync(path, 'utf8');
  } catch (error) {
    const code: unknown =
      typeof error === 'object' && error !== null ? Reflect.get(error, 'code') : undefined;
    if (code === 'ENOENT' || code === 'EISDIR') {
      throw new NotFoundError('Dataset file', path, { code });
    }
    throw error;
  }
}

/**
 * Load a CSV file into a Table
 *
 * @throws NotFoundError when the path does not resolve to a readable file
 * @throws ParseError on malformed content or a missing header row
 */
export function loadTable(path: string): Table {
  const content = readText(path);

  let parsed: unknown;
  try {
    parsed = parseCsv(content, { skip_empty_lines: true, cast: true });
  } catch (error) {
    throw new ParseError(
      `Could not parse CSV at "${path}": ${error instanceof Error ? error.message : String(error)}`,
      path
    );
  }

  const records = CsvRecordsSchema.safeParse(parsed);
  if (!records.success) {
    throw new ParseError(`Unexpected CSV cell content at "${path}"`, path, {
      issues: records.error.issues.map((issue) => issue.message),
    });
  }

  const [header, ...body] = records.data;
  if (!header) {
    throw new ParseError(`CSV at "${path}" has no header row`, path);
  }

  const columns = header.map((cell) => String(cell));
  const rows = body.map((cells): Row => {
    const row: Row = {};
    columns.forEach((column, index) => {
      row[column] = cells[index] ?? null;
    });
    return row;
  });

  return { columns, rows };
}
