import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { AcceptedRecord } from '../types.js';

export const PROFILES_CSV_HEADER = ['name', 'email', 'profile_link', 'role_type'] as const;

export function escapeCell(value: string): string {
  const needsQuote = /[",\r\n]/.test(value);
  const escaped = value.replace(/"/g, '""');
  return needsQuote ? `"${escaped}"` : escaped;
}

function toRow(record: AcceptedRecord): string {
  return [record.name, record.email, record.profile_link, record.role_type]
    .map((cell) => escapeCell(cell))
    .join(',');
}

export function renderProfilesCsv(records: readonly AcceptedRecord[]): string {
  const lines = [PROFILES_CSV_HEADER.join(','), ...records.map((record) => toRow(record))];
  return `${lines.join('\n')}\n`;
}

export async function writeProfilesCsv(filePath: string, records: readonly AcceptedRecord[]): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, renderProfilesCsv(records), 'utf8');
}
