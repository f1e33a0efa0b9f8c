/**
 * Fiscal document processor
 *
 * Parses, classifies and dispatches one document to its extractor. Every outcome is a
 * CanonicalRecord: nothing thrown inside the pipeline reaches the caller.
 */

import type { Logger } from 'pino';
import { logger as rootLogger } from '../../utils/logger.js';
import { UnknownDocumentKindError, toAppError } from '../../types/errors.js';
import type { AppError } from '../../types/errors.js';
import { DocumentKind, classifyDocument } from './documentKinds.js';
import type { Classification } from './documentKinds.js';
import { failureRecord } from './canonicalRecord.js';
import type { CanonicalRecord, SuccessRecord } from './canonicalRecord.js';
import { parseXmlDocument } from './xmlTree.js';
import type { XmlNode } from './xmlTree.js';
import { decodeDocument } from './transportDecoder.js';
import { extractPrimaryDocument } from './extractors/primaryDocumentExtractor.js';
import { extractServiceInvoice } from './extractors/serviceInvoiceExtractor.js';
import { extractEvent } from './extractors/eventExtractor.js';
import { extractEventEnvelope } from './extractors/eventEnvelopeExtractor.js';

export interface ProcessingResult {
  record: CanonicalRecord;
  /** Structured failure behind `record.error`, null on success */
  failure: AppError | null;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled document kind: ${JSON.stringify(value)}`);
}

/**
 * One extractor per kind, selected by an exhaustive switch
 */
export function extractRecord(root: XmlNode, classification: Classification): SuccessRecord {
  switch (classification.kind) {
    case DocumentKind.Invoice:
    case DocumentKind.TransportManifest:
    case DocumentKind.FreightManifest:
      return extractPrimaryDocument(root, classification.kind);
    case DocumentKind.ServiceInvoice:
      return extractServiceInvoice(root);
    case DocumentKind.Event:
      return extractEvent(root);
    case DocumentKind.EventEnvelope:
      return extractEventEnvelope(root);
    default:
      return assertNever(classification);
  }
}

export class FiscalDocumentProcessor {
  private readonly logger: Logger;

  constructor(logger: Logger = rootLogger) {
    this.logger = logger.child({ component: 'FiscalDocumentProcessor' });
  }

  /**
   * Process one document's XML text into a record; never throws
   */
  process(xml: string): CanonicalRecord {
    return this.processDetailed(xml).record;
  }

  /**
   * Like process, also returning the structured failure for logging and metrics
   */
  processDetailed(xml: string): ProcessingResult {
    let kind: DocumentKind | null = null;
    try {
      const root = parseXmlDocument(xml);
      const classification = classifyDocument(root);
      if (!classification) {
        throw new UnknownDocumentKindError(root.localName);
      }
      kind = classification.kind;

      const record = extractRecord(root, classification);
      this.logger.debug(
        { kind: record.document_kind, accessKey: record.access_key },
        'Fiscal document extracted'
      );
      return { record, failure: null };
    } catch (error) {
      return this.fail(error, kind);
    }
  }

  /**
   * One record per input, in input order
   */
  processBatch(xmls: readonly string[]): CanonicalRecord[] {
    return xmls.map(xml => this.process(xml));
  }

  /**
   * Decode a base64 transport blob, then process it
   */
  processEncoded(blob: string): ProcessingResult {
    let xml: string;
    try {
      xml = decodeDocument(blob);
    } catch (error) {
      return this.fail(error, null);
    }
    return this.processDetailed(xml);
  }

  private fail(error: unknown, kind: DocumentKind | null): ProcessingResult {
    const failure = toAppError(error, 'Unexpected extraction failure');
    this.logger.warn({ code: failure.code, kind, context: failure.context }, failure.message);
    return { record: failureRecord(failure, kind), failure };
  }
}
