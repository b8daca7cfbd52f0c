import path from 'path';
import * as XLSX from 'xlsx';
import { saveBinaryFile } from '../utils/fileSystem';
import { ResultTable } from './result.service';

export const EXPORT_COLUMNS = [
  'field_key',
  'field_label',
  'field_type',
  'document_identifier',
  'value',
  'value_raw',
  'value_normalized',
  'review_state',
  'confidence',
  'confidence_reasons',
  'citation_location',
  'citation_location_type',
  'citation_char_start',
  'citation_char_end',
  'citation_snippet',
] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];
export type ExportRow = Record<ExportColumn, string | number | null>;
export type ExportFormat = 'csv' | 'xlsx';

export interface ResultProvider {
  result(jobId?: string): Promise<ResultTable>;
}

export interface ExportFile {
  fileName: string;
  filePath: string;
  rowCount: number;
}

/** Flattens the result table to one line per cell */
export function buildExportRows(table: ResultTable): ExportRow[] {
  return table.rows.flatMap((row) =>
    row.cells.map((cell) => ({
      field_key: row.field_key,
      field_label: row.field_label,
      field_type: row.field_type,
      document_identifier: cell.document_identifier,
      value: cell.value,
      value_raw: cell.value_raw,
      value_normalized: cell.value_normalized,
      review_state: cell.review_state,
      confidence: cell.confidence,
      confidence_reasons: cell.confidence_reasons.join(','),
      citation_location: cell.citation?.location ?? null,
      citation_location_type: cell.citation?.location_type ?? null,
      citation_char_start: cell.citation?.char_start ?? null,
      citation_char_end: cell.citation?.char_end ?? null,
      citation_snippet: cell.citation?.snippet ?? null,
    }))
  );
}

export function buildExportSheet(table: ResultTable): XLSX.WorkSheet {
  const rows = buildExportRows(table);
  return XLSX.utils.aoa_to_sheet([
    [...EXPORT_COLUMNS],
    ...rows.map((row) => EXPORT_COLUMNS.map((column) => row[column])),
  ]);
}

export function renderCsv(table: ResultTable): string {
  return XLSX.utils.sheet_to_csv(buildExportSheet(table));
}

export function renderXlsx(table: ResultTable): Buffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, buildExportSheet(table), 'review_table');
  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
}

export function exportFileName(table: ResultTable, format: ExportFormat, timestamp: string): string {
  return `legal_review_${table.job?.id ?? 'none'}_${timestamp.replace(/:/g, '-')}.${format}`;
}

export class ExportService {
  constructor(
    private readonly results: ResultProvider,
    private readonly exportsDir: string
  ) {}

  async export(format: ExportFormat, jobId?: string): Promise<ExportFile> {
    const table = await this.results.result(jobId);
    const fileName = exportFileName(table, format, new Date().toISOString());
    const filePath = path.join(this.exportsDir, fileName);

    await saveBinaryFile(filePath, format === 'csv' ? renderCsv(table) : renderXlsx(table));

    const rowCount = table.rows.reduce((sum, row) => sum + row.cells.length, 0);
    console.log(`[Export] Wrote ${rowCount} row(s) to ${fileName}`);
    return { fileName, filePath, rowCount };
  }
}
