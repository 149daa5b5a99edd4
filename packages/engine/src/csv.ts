// packages/engine/src/csv.ts
import type { JsonValue, Row } from '@rowsmith/core';
import { fieldOf } from '@rowsmith/core';

export interface CsvOptions {
  separator?: string;
  maxRows?: number;
}

// union of keys, first-seen order
export function csvColumns(rows: readonly Row[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) for (const k of Object.keys(row)) seen.add(k);
  return [...seen];
}

function cellText(v: JsonValue | undefined): string {
  if (v === undefined || v === null) return '';
  switch (typeof v) {
    case 'string': return v;
    case 'number':
    case 'boolean': return String(v);
    default: return JSON.stringify(v);
  }
}

function quote(text: string, sep: string): string {
  if (!text.includes(sep) && !/["\r\n]/.test(text)) return text;
  return `"${text.replace(/"/g, '""')}"`;
}

export function toCsv(rows: readonly Row[], options: CsvOptions = {}): string {
  const sep = options.separator ?? ',';
  const body = options.maxRows === undefined ? rows : rows.slice(0, options.maxRows);
  const columns = csvColumns(body);
  if (columns.length === 0) return '';

  const line = (cells: string[]) => cells.map(c => quote(c, sep)).join(sep) + '\n';
  return line(columns) + body.map(row => line(columns.map(c => cellText(fieldOf(row, c))))).join('');
}
