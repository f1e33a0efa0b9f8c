/**
 * Canonical output records
 *
 * Every processed document becomes exactly one record. A record carries either business
 * fields or an `error` string, never both. Field names are the external contract consumed
 * by the writer and the table exporter.
 */

import { InvalidAccessKeyError, MalformedTimestampError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import { DocumentKind } from './documentKinds.js';
import type { DocumentFamily } from './documentKinds.js';
import { normalizeOptionalTimestamp, normalizeTimestamp } from './timestamps.js';

export type PrimaryDocumentKind = DocumentFamily | DocumentKind.ServiceInvoice;

interface SuccessFields {
  access_key: string | null;
  issuer_id: string | null;
  protocol: string | null;
  error?: never;
}

export interface DocumentRecord extends SuccessFields {
  document_kind: PrimaryDocumentKind;
  recipient_id: string | null;
  emission_date: string | null;
  is_event: false;
}

interface EventFields extends SuccessFields {
  event_family: DocumentFamily;
  is_event: true;
  event_type: string | null;
  event_sequence: string | null;
  event_description: string | null;
  event_date: string | null;
}

export interface BareEventRecord extends EventFields {
  document_kind: DocumentKind.Event;
}

export interface EnvelopeEventRecord extends EventFields {
  document_kind: DocumentKind.EventEnvelope;
  status_code: string | null;
  status_reason: string | null;
  registered_at: string | null;
}

export type EventRecord = BareEventRecord | EnvelopeEventRecord;

export interface FailureRecord {
  /** Null when the document could not be classified */
  document_kind: DocumentKind | null;
  error: string;
}

export type SuccessRecord = DocumentRecord | EventRecord;
export type CanonicalRecord = SuccessRecord | FailureRecord;

export function isFailureRecord(record: CanonicalRecord): record is FailureRecord {
  return typeof record.error === 'string';
}

export function isEventRecord(record: CanonicalRecord): record is EventRecord {
  return !isFailureRecord(record) && record.is_event;
}

/**
 * Fields read by a primary-document extractor, before normalization
 */
export interface ExtractedDocument {
  kind: PrimaryDocumentKind;
  accessKey: string;
  issuerId: string;
  recipientId: string | null;
  emissionDate: string;
  protocol: string | null;
}

/**
 * Fields read by an event extractor, before normalization
 */
export interface ExtractedEvent {
  family: DocumentFamily;
  accessKey: string | null;
  authorId: string | null;
  protocol: string | null;
  eventType: string | null;
  eventSequence: string | null;
  eventDescription: string | null;
  eventDate: string | null;
}

export interface ExtractedEventResult {
  statusCode: string | null;
  statusReason: string | null;
  registeredAt: string | null;
}

const ACCESS_KEY_PATTERN = /^\d{44}$/;

/**
 * Strip the kind prefix (`NFe`, `CTe`, `MDFe`) and require exactly 44 ASCII digits
 *
 * @throws {InvalidAccessKeyError}
 */
export function normalizeAccessKey(rawId: string, prefix: string, kind: string): string {
  const trimmed = rawId.trim();
  const key = trimmed.startsWith(prefix) ? trimmed.slice(prefix.length) : trimmed;
  if (!ACCESS_KEY_PATTERN.test(key)) {
    throw new InvalidAccessKeyError(kind, rawId);
  }
  return key;
}

export function documentRecord(fields: ExtractedDocument): DocumentRecord {
  return {
    document_kind: fields.kind,
    access_key: fields.accessKey,
    issuer_id: fields.issuerId,
    recipient_id: fields.recipientId,
    emission_date: normalizeTimestamp(fields.emissionDate),
    protocol: fields.protocol,
    is_event: false,
  };
}

function eventFields(fields: ExtractedEvent): EventFields {
  return {
    event_family: fields.family,
    access_key: fields.accessKey,
    issuer_id: fields.authorId,
    protocol: fields.protocol,
    is_event: true,
    event_type: fields.eventType,
    event_sequence: fields.eventSequence,
    event_description: fields.eventDescription,
    event_date: normalizeOptionalTimestamp(fields.eventDate),
  };
}

export function bareEventRecord(fields: ExtractedEvent): BareEventRecord {
  return { document_kind: DocumentKind.Event, ...eventFields(fields) };
}

/**
 * Result-block timestamp; an unreadable value becomes null
 */
function registrationTimestamp(raw: string | null): string | null {
  try {
    return normalizeOptionalTimestamp(raw);
  } catch (error) {
    if (!(error instanceof MalformedTimestampError)) {
      throw error;
    }
    logger.warn({ rawValue: raw }, 'Ignoring malformed event registration timestamp');
    return null;
  }
}

export function envelopeEventRecord(fields: ExtractedEvent, result: ExtractedEventResult): EnvelopeEventRecord {
  return {
    document_kind: DocumentKind.EventEnvelope,
    ...eventFields(fields),
    status_code: result.statusCode,
    status_reason: result.statusReason,
    registered_at: registrationTimestamp(result.registeredAt),
  };
}

export function failureRecord(error: unknown, kind: DocumentKind | null = null): FailureRecord {
  return {
    document_kind: kind,
    error: error instanceof Error ? error.message : String(error),
  };
}
