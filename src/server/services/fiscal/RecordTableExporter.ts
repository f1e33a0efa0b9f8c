/**
 * Record Table Exporter
 *
 * Writes processed records to an xlsx workbook: one row per document on "Documentos",
 * counts per document kind on "Resumo".
 */

import ExcelJS from 'exceljs';
import { logger } from '../../utils/logger.js';
import { DocumentKind, KIND_LABELS } from '../../adapters/fiscal/documentKinds.js';
import { isFailureRecord } from '../../adapters/fiscal/canonicalRecord.js';
import type { CanonicalRecord } from '../../adapters/fiscal/canonicalRecord.js';

export interface RecordEntry {
  /** Where the document came from or was written to */
  source: string;
  record: CanonicalRecord;
}

export const RECORD_COLUMNS = [
  'source',
  'document_kind',
  'access_key',
  'issuer_id',
  'recipient_id',
  'emission_date',
  'protocol',
  'is_event',
  'event_family',
  'event_type',
  'event_sequence',
  'event_description',
  'event_date',
  'status_code',
  'status_reason',
  'registered_at',
  'error',
] as const;

export type RecordColumn = (typeof RECORD_COLUMNS)[number];
export type RecordRow = Record<RecordColumn, string | boolean | null>;

const HEADER_FONT: Partial<ExcelJS.Font> = { bold: true, color: { argb: 'FFFFFFFF' } };
const HEADER_FILL: ExcelJS.Fill = {
  type: 'pattern',
  pattern: 'solid',
  fgColor: { argb: 'FF4472C4' },
};
const ERROR_FONT: Partial<ExcelJS.Font> = { color: { argb: 'FFFF0000' } };

const KIND_ORDER: readonly DocumentKind[] = [
  DocumentKind.Invoice,
  DocumentKind.TransportManifest,
  DocumentKind.FreightManifest,
  DocumentKind.ServiceInvoice,
  DocumentKind.Event,
  DocumentKind.EventEnvelope,
];

/**
 * Flatten a record into one value per column; fields a record does not have are null
 */
export function toRecordRow(entry: RecordEntry): RecordRow {
  const row: RecordRow = {
    source: entry.source,
    document_kind: null,
    access_key: null,
    issuer_id: null,
    recipient_id: null,
    emission_date: null,
    protocol: null,
    is_event: null,
    event_family: null,
    event_type: null,
    event_sequence: null,
    event_description: null,
    event_date: null,
    status_code: null,
    status_reason: null,
    registered_at: null,
    error: null,
  };

  const { record } = entry;
  row.document_kind = record.document_kind;

  if (isFailureRecord(record)) {
    row.error = record.error;
    return row;
  }

  row.access_key = record.access_key;
  row.issuer_id = record.issuer_id;
  row.protocol = record.protocol;
  row.is_event = record.is_event;

  if (!record.is_event) {
    row.recipient_id = record.recipient_id;
    row.emission_date = record.emission_date;
    return row;
  }

  row.event_family = record.event_family;
  row.event_type = record.event_type;
  row.event_sequence = record.event_sequence;
  row.event_description = record.event_description;
  row.event_date = record.event_date;

  if (record.document_kind === DocumentKind.EventEnvelope) {
    row.status_code = record.status_code;
    row.status_reason = record.status_reason;
    row.registered_at = record.registered_at;
  }

  return row;
}

export interface KindSummary {
  label: string;
  documents: number;
  failures: number;
}

/**
 * Per-kind counts; unclassified failures are reported under "Não classificado"
 */
export function summarizeRecords(records: readonly CanonicalRecord[]): KindSummary[] {
  const summaries: KindSummary[] = KIND_ORDER.map(kind => ({ label: KIND_LABELS[kind], documents: 0, failures: 0 }));
  const unclassified: KindSummary = { label: 'Não classificado', documents: 0, failures: 0 };

  for (const record of records) {
    const index = record.document_kind === null ? -1 : KIND_ORDER.indexOf(record.document_kind);
    const summary = index === -1 ? unclassified : summaries[index];
    summary.documents += 1;
    if (isFailureRecord(record)) {
      summary.failures += 1;
    }
  }

  return unclassified.documents > 0 ? [...summaries, unclassified] : summaries;
}

export class RecordTableExporter {
  /**
   * Build the workbook in memory
   */
  async toBuffer(entries: readonly RecordEntry[]): Promise<Buffer> {
    const workbook = this.buildWorkbook(entries);
    const buffer = await workbook.xlsx.writeBuffer();
    return Buffer.from(buffer);
  }

  async toFile(entries: readonly RecordEntry[], filePath: string): Promise<void> {
    const workbook = this.buildWorkbook(entries);
    await workbook.xlsx.writeFile(filePath);
    logger.info({ filePath, rows: entries.length }, 'Record table exported');
  }

  private buildWorkbook(entries: readonly RecordEntry[]): ExcelJS.Workbook {
    const workbook = new ExcelJS.Workbook();
    workbook.creator = 'dfe-harvester';
    workbook.created = new Date();

    this.createDocumentsSheet(workbook, entries);
    this.createSummarySheet(
      workbook,
      entries.map(entry => entry.record)
    );

    return workbook;
  }

  private createDocumentsSheet(workbook: ExcelJS.Workbook, entries: readonly RecordEntry[]): void {
    const sheet = workbook.addWorksheet('Documentos');

    sheet.addRow([...RECORD_COLUMNS]);
    const headerRow = sheet.getRow(1);
    headerRow.font = HEADER_FONT;
    headerRow.fill = HEADER_FILL;

    const errorColumn = RECORD_COLUMNS.indexOf('error') + 1;
    for (const entry of entries) {
      const values = toRecordRow(entry);
      const row = sheet.addRow(RECORD_COLUMNS.map(column => values[column]));
      if (values.error !== null) {
        row.getCell(errorColumn).font = ERROR_FONT;
      }
    }

    sheet.columns.forEach(column => {
      column.width = 22;
    });
    sheet.views = [{ state: 'frozen', ySplit: 1 }];
  }

  private createSummarySheet(workbook: ExcelJS.Workbook, records: readonly CanonicalRecord[]): void {
    const sheet = workbook.addWorksheet('Resumo');

    sheet.addRow(['Tipo', 'Documentos', 'Falhas']);
    const headerRow = sheet.getRow(1);
    headerRow.font = HEADER_FONT;
    headerRow.fill = HEADER_FILL;

    const summaries = summarizeRecords(records);
    for (const summary of summaries) {
      sheet.addRow([summary.label, summary.documents, summary.failures]);
    }

    const totalRow = sheet.addRow([
      'Total',
      records.length,
      records.filter(record => isFailureRecord(record)).length,
    ]);
    totalRow.font = { bold: true };

    sheet.columns = [{ width: 24 }, { width: 14 }, { width: 14 }];
  }
}
