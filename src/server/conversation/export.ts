/**
 * export.ts — Transcript export (CSV)
 *
 * Pull-based: callers hand over a transcript snapshot, we format rows.
 * Output carries a UTF-8 BOM by default so spreadsheet tools pick the
 * right encoding for non-Latin text.
 */

import type { Turn } from "./transcript.js";

const UTF8_BOM = "\uFEFF";

export const EXPORT_HEADERS = ["Role", "Message", "Timestamp"] as const;

const ROLE_LABELS: Record<Turn["role"], string> = {
  user: "User",
  model: "Model",
};

export interface CsvExportOptions {
  /** Prefix with a byte-order mark (default: true). */
  bom?: boolean;
}

function escapeCell(value: string): string {
  if (value.includes(",") || value.includes('"') || value.includes("\n") || value.includes("\r")) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Role/text/timestamp rows, header first. */
export function transcriptToRows(turns: readonly Turn[]): string[][] {
  return [
    [...EXPORT_HEADERS],
    ...turns.map((t) => [ROLE_LABELS[t.role], t.text, t.timestamp]),
  ];
}

export function transcriptToCsv(turns: readonly Turn[], options: CsvExportOptions = {}): string {
  const body = transcriptToRows(turns)
    .map((row) => row.map(escapeCell).join(","))
    .join("\r\n");
  return (options.bom ?? true) ? `${UTF8_BOM}${body}\r\n` : `${body}\r\n`;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** history_log_YYYY-MM-DD_HHMMSS.csv in UTC. */
export function exportFilename(now: Date = new Date()): string {
  const date = `${now.getUTCFullYear()}-${pad(now.getUTCMonth() + 1)}-${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `history_log_${date}_${time}.csv`;
}
