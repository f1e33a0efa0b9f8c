import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { FiscalDocumentWriter } from '../../../../src/server/services/fiscal/FiscalDocumentWriter.js';
import { FiscalDocumentProcessor } from '../../../../src/server/adapters/fiscal/FiscalDocumentProcessor.js';
import { ISSUER_CNPJ, NFE_KEY, eventXml, nfeXml } from '../../../fixtures/fiscalDocuments.js';

const processor = new FiscalDocumentProcessor();

describe('FiscalDocumentWriter', () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await mkdtemp(path.join(os.tmpdir(), 'dfe-writer-'));
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it('writes documents under the day, type and issuer directories', async () => {
    const xml = nfeXml();
    const writer = new FiscalDocumentWriter(baseDir);

    const written = await writer.write(processor.process(xml), xml, ['2024', '12', '09', 'NFe']);

    expect(written).toBe(path.join(baseDir, '2024', '12', '09', 'NFe', ISSUER_CNPJ, `${NFE_KEY}_Invoice.xml`));
    expect(await readFile(written, 'utf8')).toBe(xml);
  });

  it('writes events to the events directory', async () => {
    const xml = eventXml();
    const written = await new FiscalDocumentWriter(baseDir).write(processor.process(xml), xml);
    expect(written).toBe(path.join(baseDir, ISSUER_CNPJ, 'eventos', `${NFE_KEY}_Event_110111_1.xml`));
  });

  it('gives each failure its own temporary file', async () => {
    const writer = new FiscalDocumentWriter(baseDir);
    const xml = '<broken>';
    const record = processor.process(xml);

    const first = await writer.write(record, xml);
    const second = await writer.write(record, xml);

    expect(path.dirname(first)).toBe(baseDir);
    expect(path.basename(first)).toMatch(/^temp_[0-9a-f]{64}\.xml$/);
    expect(second).not.toBe(first);
    expect(await readFile(second, 'utf8')).toBe(xml);
  });
});
