/**
 * Canonical rendering for fingerprints
 *
 * Produces one string per value-equivalence class: object keys are sorted,
 * tables are rendered by content, and functions/classes by name plus a hash of
 * their source, so two separately built but equal configurations render the
 * same.
 */

import { createHash } from 'crypto';
import { ValidationError } from '@trialkey/utils';
import { isTable } from '../data/table.js';
import type { Table } from '../data/table.js';

function hashSource(source: string): string {
  return createHash('sha256').update(source, 'utf-8').digest('hex');
}

function renderCallable(value: Function): string {
  return `{"__callable__":{"name":${JSON.stringify(value.name)},"source":"${hashSource(value.toString())}"}}`;
}

function renderTable(table: Table, ancestors: WeakSet<object>): string {
  const columns = table.columns.map((column) => JSON.stringify(column)).join(',');
  const rows = table.rows
    .map((row) => `[${table.columns.map((column) => render(row[column], ancestors)).join(',')}]`)
    .join(',');
  return `{"__table__":{"columns":[${columns}],"rows":[${rows}]}}`;
}

function renderNumber(value: number): string {
  return Number.isFinite(value) ? JSON.stringify(value) : `{"__number__":"${String(value)}"}`;
}

function renderObject(value: object, ancestors: WeakSet<object>): string {
  if (ancestors.has(value)) {
    throw new ValidationError('Cannot fingerprint a cyclic structure');
  }
  ancestors.add(value);

  try {
    if (value instanceof Date) {
      return `{"__date__":${JSON.stringify(value.toISOString())}}`;
    }
    if (Array.isArray(value)) {
      return `[${value.map((item: unknown) => render(item, ancestors)).join(',')}]`;
    }
    if (isTable(value)) {
      return renderTable(value, ancestors);
    }

    const body = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${render(Reflect.get(value, key), ancestors)}`)
      .join(',');
    return `{${body}}`;
  } finally {
    ancestors.delete(value);
  }
}

function render(value: unknown, ancestors: WeakSet<object>): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'object') {
    return renderObject(value, ancestors);
  }

  switch (typeof value) {
    case 'number':
      return renderNumber(value);
    case 'bigint':
      return `{"__bigint__":"${value.toString()}"}`;
    case 'symbol':
      return `{"__symbol__":${JSON.stringify(value.description ?? '')}}`;
    case 'function':
      return renderCallable(value);
    default:
      return JSON.stringify(value);
  }
}

export function canonicalStringify(value: unknown): string {
  return render(value, new WeakSet<object>());
}
