/**
 * Download Fiscal Documents
 *
 * Fetches NF-e, CT-e and other DF-e documents from the SIEG API for a date range, classifies
 * and extracts each one, and writes the raw XML under OUTPUT_DIR.
 *
 * Usage:
 *   tsx src/server/scripts/download-fiscal-documents.ts --from=YYYY-MM-DD [--to=YYYY-MM-DD]
 *     [--types=NFe,CTe] [--no-events] [--export=records.xlsx]
 */

import { fileURLToPath } from 'url';
import { validateEnv } from '../config/env.js';
import { SiegApiClient, XmlType, parseXmlType } from '../clients/SiegApiClient.js';
import { FiscalDocumentWriter } from '../services/fiscal/FiscalDocumentWriter.js';
import { FiscalDocumentDownloadService } from '../services/fiscal/FiscalDocumentDownloadService.js';
import { RecordTableExporter } from '../services/fiscal/RecordTableExporter.js';
import { parseCalendarDay } from '../utils/dateUtils.js';

export interface DownloadArgs {
  from: string;
  to: string;
  xmlTypes: XmlType[];
  downloadEvents: boolean;
  exportPath: string | null;
}

const DEFAULT_TYPES: readonly XmlType[] = [XmlType.NFe, XmlType.CTe];

function optionValue(args: readonly string[], name: string): string | undefined {
  return args.find(arg => arg.startsWith(`--${name}=`))?.slice(name.length + 3);
}

/**
 * @throws Error with a usage message when an option is missing or invalid
 */
export function parseDownloadArgs(args: readonly string[]): DownloadArgs {
  const fromValue = optionValue(args, 'from');
  if (!fromValue) {
    throw new Error('Missing required option --from=YYYY-MM-DD');
  }
  const from = parseCalendarDay(fromValue);
  const to = parseCalendarDay(optionValue(args, 'to') ?? from);

  const typesValue = optionValue(args, 'types');
  const xmlTypes: XmlType[] = [];
  if (typesValue) {
    for (const name of typesValue.split(',')) {
      const xmlType = parseXmlType(name);
      if (xmlType === null) {
        throw new Error(`Unknown document type "${name}". Use NFe, CTe, NFSe, NFCe or CFe.`);
      }
      xmlTypes.push(xmlType);
    }
  } else {
    xmlTypes.push(...DEFAULT_TYPES);
  }

  return {
    from,
    to,
    xmlTypes,
    downloadEvents: !args.includes('--no-events'),
    exportPath: optionValue(args, 'export') ?? null,
  };
}

async function main() {
  let options: DownloadArgs;
  try {
    options = parseDownloadArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    console.error(
      'Usage: tsx src/server/scripts/download-fiscal-documents.ts --from=YYYY-MM-DD [--to=YYYY-MM-DD] [--types=NFe,CTe] [--no-events] [--export=file.xlsx]'
    );
    process.exit(1);
  }

  const env = validateEnv();
  const service = new FiscalDocumentDownloadService(new SiegApiClient(), new FiscalDocumentWriter(env.OUTPUT_DIR));

  const summary = await service.download({
    from: options.from,
    to: options.to,
    xmlTypes: options.xmlTypes,
    windowHours: env.DOWNLOAD_WINDOW_HOURS,
    downloadEvents: options.downloadEvents,
  });

  console.log(`\n📥 Download ${options.from} → ${options.to}`);
  console.log('─'.repeat(50));
  console.log(`Windows:        ${summary.windows}`);
  console.log(`Failed windows: ${summary.failedWindows.length}`);
  console.log(`Documents:      ${summary.documents}`);
  console.log(`Failures:       ${summary.failures}`);

  if (options.exportPath) {
    await new RecordTableExporter().toFile(summary.entries, options.exportPath);
    console.log(`Exported:       ${options.exportPath}`);
  }

  if (summary.failedWindows.length > 0) {
    process.exitCode = 2;
  }
}

// Run if called directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch(error => {
    console.error('❌ Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
