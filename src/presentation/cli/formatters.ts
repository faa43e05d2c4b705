import { CallRecord } from '../../application/types/index';

export const OUTPUT_FORMATS = ['json', 'csv', 'jsonl'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

export function toJson(records: CallRecord[]): string {
  return JSON.stringify(records, null, 2);
}

/**
 * One record per line. Each line stands alone, so output can be written as
 * records arrive.
 */
export function toJsonLine(record: CallRecord): string {
  return `${JSON.stringify(record)}\n`;
}

function formatCsvValue(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }

  const text = typeof value === 'object' ? JSON.stringify(value) : String(value);

  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Columns are the union of record keys in first-seen order.
 */
export function toCsv(records: CallRecord[]): string {
  const columns: string[] = [];
  const seen = new Set<string>();

  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  const lines = [columns.map(formatCsvValue).join(',')];
  for (const record of records) {
    lines.push(columns.map(column => formatCsvValue(record[column])).join(','));
  }

  return lines.join('\n') + '\n';
}

export function formatRecords(records: CallRecord[], format: OutputFormat): string {
  switch (format) {
    case 'csv':
      return toCsv(records);
    case 'jsonl':
      return records.map(toJsonLine).join('');
    default:
      return `${toJson(records)}\n`;
  }
}
