/**
 * Fiscal Document Download Service
 *
 * Walks a date range day by day, type by type and window by window, fetching every document
 * from the retrieval API, processing it and writing it under
 * `<output>/<YYYY>/<MM>/<DD>/<type>/<issuer>/[eventos/]`.
 */

import type { Logger } from 'pino';
import { logger as rootLogger } from '../../utils/logger.js';
import { buildTimeWindows, calendarDaySegments, enumerateCalendarDays } from '../../utils/dateUtils.js';
import type { TimeWindow } from '../../utils/dateUtils.js';
import { XML_TYPE_NAMES } from '../../clients/SiegApiClient.js';
import type { XmlType } from '../../clients/SiegApiClient.js';
import { FiscalDocumentProcessor } from '../../adapters/fiscal/FiscalDocumentProcessor.js';
import { decodeDocument } from '../../adapters/fiscal/transportDecoder.js';
import { failureRecord, isFailureRecord } from '../../adapters/fiscal/canonicalRecord.js';
import type { CanonicalRecord } from '../../adapters/fiscal/canonicalRecord.js';
import type { RecordEntry } from './RecordTableExporter.js';

/**
 * The part of the retrieval client the service depends on
 */
export interface DocumentSource {
  fetchWindow(xmlType: XmlType, window: TimeWindow, downloadEvents?: boolean): Promise<string[]>;
}

/**
 * The part of the writer the service depends on
 */
export interface DocumentSink {
  write(record: CanonicalRecord, content: string, subdirectories?: readonly string[]): Promise<string>;
}

export interface DownloadOptions {
  from: string;
  to: string;
  xmlTypes: readonly XmlType[];
  windowHours: number;
  downloadEvents?: boolean;
}

export interface FailedWindow {
  day: string;
  xmlType: XmlType;
  window: TimeWindow;
  error: string;
}

export interface DownloadSummary {
  windows: number;
  failedWindows: FailedWindow[];
  documents: number;
  failures: number;
  entries: RecordEntry[];
}

export class FiscalDocumentDownloadService {
  private readonly logger: Logger;

  constructor(
    private readonly source: DocumentSource,
    private readonly sink: DocumentSink,
    private readonly processor: FiscalDocumentProcessor = new FiscalDocumentProcessor(),
    logger: Logger = rootLogger
  ) {
    this.logger = logger.child({ component: 'FiscalDocumentDownloadService' });
  }

  async download(options: DownloadOptions): Promise<DownloadSummary> {
    const summary: DownloadSummary = { windows: 0, failedWindows: [], documents: 0, failures: 0, entries: [] };

    for (const day of enumerateCalendarDays(options.from, options.to)) {
      for (const xmlType of options.xmlTypes) {
        const directories = [...calendarDaySegments(day), XML_TYPE_NAMES[xmlType]];

        for (const window of buildTimeWindows(day, options.windowHours)) {
          summary.windows += 1;

          let blobs: string[];
          try {
            blobs = await this.source.fetchWindow(xmlType, window, options.downloadEvents ?? true);
          } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.error({ day, xmlType: XML_TYPE_NAMES[xmlType], window, error: message }, 'Window retrieval failed');
            summary.failedWindows.push({ day, xmlType, window, error: message });
            continue;
          }

          for (const blob of blobs) {
            const entry = await this.storeDocument(blob, directories);
            summary.entries.push(entry);
            summary.documents += 1;
            if (isFailureRecord(entry.record)) {
              summary.failures += 1;
            }
          }
        }
      }
    }

    this.logger.info(
      {
        windows: summary.windows,
        failedWindows: summary.failedWindows.length,
        documents: summary.documents,
        failures: summary.failures,
      },
      'Download finished'
    );

    return summary;
  }

  /**
   * Decode, process and write one blob. Blobs that do not decode have no text to write and
   * only produce a failure entry.
   */
  private async storeDocument(blob: string, directories: readonly string[]): Promise<RecordEntry> {
    let xml: string;
    try {
      xml = decodeDocument(blob);
    } catch (error) {
      this.logger.warn(
        { error: error instanceof Error ? error.message : String(error), length: blob.length },
        'Document does not decode'
      );
      return { source: '', record: failureRecord(error) };
    }

    const { record } = this.processor.processDetailed(xml);
    try {
      const source = await this.sink.write(record, xml, directories);
      return { source, record };
    } catch (error) {
      this.logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Failed to write document');
      return { source: '', record: failureRecord(error, record.document_kind) };
    }
  }
}
