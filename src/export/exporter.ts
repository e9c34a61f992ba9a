import fs from 'fs/promises';
import path from 'path';
import type { ScanSession } from '../scanner/session.js';
import type { ExportDocument, ExportRow } from '../schemas/export.js';
import type { ProbeResult, ScanProgress } from '../types/scanner.js';

export type ExportFormat = 'json' | 'csv';

const CSV_COLUMNS: Array<keyof ExportRow> = ['ip', 'port', 'device_type', 'open', 'elapsed_ms', 'banner'];

export function toExportRow(result: ProbeResult): ExportRow {
  return {
    ip: result.target.ip,
    port: result.target.port,
    device_type: result.deviceType,
    open: result.open,
    elapsed_ms: Math.round(result.elapsedMs),
    banner: result.banner,
  };
}

export function toJson(results: ProbeResult[], progress: ScanProgress, generatedAt = new Date()): string {
  const document: ExportDocument = {
    generated_at: generatedAt.toISOString(),
    stats: {
      scanned: progress.scanned,
      total: progress.total,
      open: progress.open,
      elapsed_ms: progress.elapsedMs,
    },
    results: results.map(toExportRow),
  };
  return JSON.stringify(document, null, 2);
}

function csvField(value: ExportRow[keyof ExportRow]): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(results: ProbeResult[]): string {
  const lines = [CSV_COLUMNS.join(',')];
  for (const result of results) {
    const row = toExportRow(result);
    lines.push(CSV_COLUMNS.map((column) => csvField(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Write a finished session's results to disk. Only open ports are written
 * unless `includeClosed` is set, which needs a session started with
 * `retainClosed`.
 */
export async function exportSession(
  session: ScanSession,
  filePath: string,
  format: ExportFormat,
  includeClosed = false
): Promise<number> {
  if (!session.isDone()) {
    throw new Error(`Session ${session.id} is still running`);
  }
  if (includeClosed && !session.retainsClosed) {
    throw new Error(`Session ${session.id} kept open ports only`);
  }

  const results = includeClosed ? session.results() : session.openResults();
  const content = format === 'json' ? toJson(results, session.progress()) : toCsv(results);

  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, 'utf8');
  return results.length;
}
