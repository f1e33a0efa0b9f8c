/**
 * File naming for downloaded documents
 *
 * Successful records are stored under a name derived from their access key and kind, so a
 * re-download overwrites the same file. Failures get a temporary name from a counter and
 * the content hash.
 */

import { isEventRecord, isFailureRecord } from '../../adapters/fiscal/canonicalRecord.js';
import type { CanonicalRecord } from '../../adapters/fiscal/canonicalRecord.js';
import { computeSequencedHash } from '../../utils/contentHash.js';

export const EVENTS_DIRECTORY = 'eventos';

export interface StoragePlan {
  /** Directories below the output root */
  directories: string[];
  fileName: string;
}

/**
 * Keep a value usable as a single path segment
 */
export function sanitizeSegment(value: string): string {
  const cleaned = value.trim().replace(/[^A-Za-z0-9._-]/g, '_');
  return /^\.+$/.test(cleaned) || cleaned === '' ? '_' : cleaned;
}

export function temporaryFileName(counter: number, content: string): string {
  return `temp_${computeSequencedHash(counter, content)}.xml`;
}

/**
 * File name for a record; `counter` only matters when a temporary name is needed
 */
export function buildFileName(record: CanonicalRecord, content: string, counter: number): string {
  if (isFailureRecord(record) || !record.access_key) {
    return temporaryFileName(counter, content);
  }

  const parts = [record.access_key, record.document_kind];
  if (isEventRecord(record)) {
    parts.push(record.event_type ?? '0', record.event_sequence ?? '0');
  }
  return `${parts.map(sanitizeSegment).join('_')}.xml`;
}

/**
 * Directories and file name for a record: `<issuer>/[eventos/]<name>`
 */
export function planStorage(record: CanonicalRecord, content: string, counter: number): StoragePlan {
  const fileName = buildFileName(record, content, counter);
  if (isFailureRecord(record)) {
    return { directories: [], fileName };
  }

  const directories: string[] = [];
  if (record.issuer_id) {
    directories.push(sanitizeSegment(record.issuer_id));
  }
  if (record.is_event) {
    directories.push(EVENTS_DIRECTORY);
  }
  return { directories, fileName };
}
