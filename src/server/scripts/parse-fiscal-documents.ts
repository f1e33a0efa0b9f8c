/**
 * Parse Fiscal Documents
 *
 * Classifies and extracts every XML file below a directory and prints one JSON record per
 * line. Optionally exports the records to an xlsx workbook.
 *
 * Usage:
 *   tsx src/server/scripts/parse-fiscal-documents.ts <directory> [--export=records.xlsx]
 */

import { fileURLToPath } from 'url';
import { validateEnv } from '../config/env.js';
import { FiscalDocumentProcessor } from '../adapters/fiscal/FiscalDocumentProcessor.js';
import { failureRecord } from '../adapters/fiscal/canonicalRecord.js';
import { listXmlFiles, readXmlFile } from '../services/fiscal/xmlFileReader.js';
import { RecordTableExporter } from '../services/fiscal/RecordTableExporter.js';
import type { RecordEntry } from '../services/fiscal/RecordTableExporter.js';

/**
 * Process every XML file below `directory`, one entry per file, in path order
 */
export async function parseDirectory(
  directory: string,
  maxFileBytes: number,
  processor: FiscalDocumentProcessor = new FiscalDocumentProcessor()
): Promise<RecordEntry[]> {
  const entries: RecordEntry[] = [];
  for (const file of await listXmlFiles(directory)) {
    try {
      const xml = await readXmlFile(file, maxFileBytes);
      entries.push({ source: file, record: processor.process(xml) });
    } catch (error) {
      entries.push({ source: file, record: failureRecord(error) });
    }
  }
  return entries;
}

async function main() {
  const args = process.argv.slice(2);
  const directory = args.find(arg => !arg.startsWith('--'));
  const exportPath = args.find(arg => arg.startsWith('--export='))?.slice('--export='.length);

  if (!directory) {
    console.error('Usage: tsx src/server/scripts/parse-fiscal-documents.ts <directory> [--export=file.xlsx]');
    process.exit(1);
  }

  const env = validateEnv();
  const entries = await parseDirectory(directory, env.XML_MAX_FILE_BYTES);

  for (const entry of entries) {
    console.log(JSON.stringify({ source: entry.source, ...entry.record }));
  }

  if (exportPath) {
    await new RecordTableExporter().toFile(entries, exportPath);
    console.error(`Exported ${entries.length} records to ${exportPath}`);
  }
}

// Run if called directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch(error => {
    console.error('❌ Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
