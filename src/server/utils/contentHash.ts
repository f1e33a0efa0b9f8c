import crypto from 'crypto';

/**
 * SHA-256 hex digest of a document's raw content
 */
export function computeContentHash(content: string): string {
  return crypto.createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * SHA-256 hex digest of `<sequence>:<content>`
 *
 * @param sequence Position of the document in its batch or run
 * @param content Raw document content
 */
export function computeSequencedHash(sequence: number, content: string): string {
  return computeContentHash(`${sequence}:${content}`);
}
