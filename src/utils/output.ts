/**
 * Output Formatter Module
 * 輸出格式化模組 - 支援 JSON、Table、CSV 格式
 */

import Table from 'cli-table3';

/**
 * 欄位定義
 */
export interface ColumnDef<T> {
  key: keyof T & string;
  label: string;
  align?: 'left' | 'right' | 'center';
  format?: (value: T[keyof T & string], row: T) => string;
}

/**
 * 輸出格式類型
 */
export type OutputFormat = 'json' | 'table' | 'csv';

const FORMATS: readonly OutputFormat[] = ['json', 'table', 'csv'];

/**
 * Validate the global --format option; unknown values fall back to json
 */
export function parseFormat(value: unknown): OutputFormat {
  return FORMATS.find((format) => format === value) ?? 'json';
}

function cellText<T>(row: T, column: ColumnDef<T>): string {
  const value = row[column.key];
  if (column.format) {
    return column.format(value, row);
  }
  if (value === null || value === undefined) {
    return '';
  }
  if (Array.isArray(value)) {
    return value.join(' ');
  }
  return String(value);
}

/**
 * 格式化表格
 */
export function formatTable<T>(data: T[], columns: ColumnDef<T>[]): string {
  if (data.length === 0) {
    return '';
  }

  const table = new Table({
    head: columns.map((col) => col.label),
    style: { head: ['cyan'] },
    colAligns: columns.map((col) => col.align ?? 'left'),
  });

  for (const row of data) {
    table.push(columns.map((col) => cellText(row, col)));
  }

  return table.toString();
}

/**
 * 格式化 CSV
 */
export function formatCSV<T>(data: T[], columns: ColumnDef<T>[]): string {
  if (data.length === 0) {
    return '';
  }

  const escapeCSV = (value: string): string => {
    if (value.includes(',') || value.includes('"') || value.includes('\n')) {
      return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
  };

  const lines: string[] = [];
  lines.push(columns.map((col) => escapeCSV(col.label)).join(','));
  for (const row of data) {
    lines.push(columns.map((col) => escapeCSV(cellText(row, col))).join(','));
  }

  return lines.join('\n');
}

/**
 * 格式化 JSON
 */
export function formatJSON<T>(data: T, pretty: boolean = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * 通用輸出函數
 */
export function output<T>(data: T[], columns: ColumnDef<T>[], format: OutputFormat = 'json'): string {
  switch (format) {
    case 'table':
      return formatTable(data, columns);
    case 'csv':
      return formatCSV(data, columns);
    case 'json':
    default:
      return formatJSON(data);
  }
}
