/**
 * Transport decoder for documents delivered as base64-encoded UTF-8 text
 */

import { DecodeError } from '../../types/errors.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function validateBase64(compact: string): void {
  if (!BASE64_PATTERN.test(compact)) {
    throw new DecodeError('Document is not valid base64: unexpected character', { length: compact.length });
  }

  const unpadded = compact.replace(/=+$/, '');
  const padding = compact.length - unpadded.length;
  if (unpadded.length % 4 === 1) {
    throw new DecodeError('Document is not valid base64: truncated input', { length: compact.length });
  }
  if (padding > 0 && compact.length % 4 !== 0) {
    throw new DecodeError('Document is not valid base64: bad padding', { length: compact.length });
  }
}

/**
 * Decode one base64 blob into document text
 *
 * @throws {DecodeError} When the blob is not base64 or the bytes are not UTF-8
 */
export function decodeDocument(blob: string): string {
  const compact = blob.replace(/\s+/g, '');
  validateBase64(compact);

  const bytes = Buffer.from(compact, 'base64');
  try {
    return utf8Decoder.decode(bytes);
  } catch (error) {
    throw new DecodeError('Document bytes are not valid UTF-8', {
      length: bytes.length,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

export function encodeDocument(text: string): string {
  return Buffer.from(text, 'utf8').toString('base64');
}
