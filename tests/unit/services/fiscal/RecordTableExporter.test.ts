import ExcelJS from 'exceljs';
import { describe, it, expect } from 'vitest';
import {
  RECORD_COLUMNS,
  RecordTableExporter,
  summarizeRecords,
  toRecordRow,
} from '../../../../src/server/services/fiscal/RecordTableExporter.js';
import type { RecordEntry } from '../../../../src/server/services/fiscal/RecordTableExporter.js';
import { FiscalDocumentProcessor } from '../../../../src/server/adapters/fiscal/FiscalDocumentProcessor.js';
import { NFE_KEY, nfeEnvelopeXml, nfeXml } from '../../../fixtures/fiscalDocuments.js';

const processor = new FiscalDocumentProcessor();

const entries: RecordEntry[] = [
  { source: 'nfe.xml', record: processor.process(nfeXml()) },
  { source: 'envelope.xml', record: processor.process(nfeEnvelopeXml()) },
  { source: 'broken.xml', record: { document_kind: null, error: 'broken' } },
];

describe('toRecordRow', () => {
  it('fills document columns and leaves event columns null', () => {
    const row = toRecordRow(entries[0]);
    expect(row).toMatchObject({
      source: 'nfe.xml',
      document_kind: 'Invoice',
      access_key: NFE_KEY,
      emission_date: '2024-12-09 08:30:00',
      is_event: false,
      event_type: null,
      status_code: null,
      error: null,
    });
  });

  it('fills envelope status columns', () => {
    expect(toRecordRow(entries[1])).toMatchObject({
      is_event: true,
      event_family: 'Invoice',
      event_type: '110110',
      status_code: '135',
      registered_at: '2024-12-10 14:06:30',
      recipient_id: null,
    });
  });

  it('fills only the error for failures', () => {
    const row = toRecordRow(entries[2]);
    expect(row.error).toBe('broken');
    expect(RECORD_COLUMNS.filter(column => row[column] !== null)).toEqual(['source', 'error']);
  });
});

describe('summarizeRecords', () => {
  it('counts documents and failures per kind', () => {
    const summaries = summarizeRecords(entries.map(entry => entry.record));
    expect(summaries).toHaveLength(7);
    expect(summaries[0]).toEqual({ label: 'NF-e', documents: 1, failures: 0 });
    expect(summaries[5]).toEqual({ label: 'Evento processado', documents: 1, failures: 0 });
    expect(summaries[6]).toEqual({ label: 'Não classificado', documents: 1, failures: 1 });
  });
});

describe('RecordTableExporter', () => {
  it('writes the documents and summary sheets', async () => {
    const buffer = await new RecordTableExporter().toBuffer(entries);

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(buffer);

    const documents = workbook.getWorksheet('Documentos');
    expect(documents?.getRow(1).getCell(1).value).toBe('source');
    expect(documents?.getRow(1).getCell(17).value).toBe('error');
    expect(documents?.getRow(2).getCell(3).value).toBe(NFE_KEY);
    expect(documents?.getRow(2).getCell(8).value).toBe(false);
    expect(documents?.getRow(4).getCell(1).value).toBe('broken.xml');
    expect(documents?.getRow(4).getCell(17).value).toBe('broken');

    const summary = workbook.getWorksheet('Resumo');
    expect(summary?.getRow(2).getCell(1).value).toBe('NF-e');
    expect(summary?.getRow(2).getCell(2).value).toBe(1);
    expect(summary?.getRow(9).getCell(1).value).toBe('Total');
    expect(summary?.getRow(9).getCell(2).value).toBe(3);
    expect(summary?.getRow(9).getCell(3).value).toBe(1);
  });
});
