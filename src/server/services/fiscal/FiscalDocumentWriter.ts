/**
 * Writes downloaded documents to disk under the names chosen by planStorage()
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { Logger } from 'pino';
import { logger as rootLogger } from '../../utils/logger.js';
import { isFailureRecord } from '../../adapters/fiscal/canonicalRecord.js';
import type { CanonicalRecord } from '../../adapters/fiscal/canonicalRecord.js';
import { planStorage } from './fileNaming.js';

export class FiscalDocumentWriter {
  private temporaryCounter = 0;
  private readonly logger: Logger;

  /**
   * @param baseDir - Root directory; nothing is written outside it
   */
  constructor(
    private readonly baseDir: string,
    logger: Logger = rootLogger
  ) {
    this.logger = logger.child({ component: 'FiscalDocumentWriter' });
  }

  /**
   * Write the raw XML of one document and return the written path
   *
   * @param subdirectories - Extra directories between the root and the per-issuer layout
   */
  async write(record: CanonicalRecord, content: string, subdirectories: readonly string[] = []): Promise<string> {
    const needsTemporaryName = isFailureRecord(record) || !record.access_key;
    if (needsTemporaryName) {
      this.temporaryCounter += 1;
    }

    const plan = planStorage(record, content, this.temporaryCounter);
    const directory = path.join(this.baseDir, ...subdirectories, ...plan.directories);
    const filePath = path.join(directory, plan.fileName);

    await mkdir(directory, { recursive: true });
    await writeFile(filePath, content, 'utf8');

    if (isFailureRecord(record)) {
      this.logger.warn({ filePath, error: record.error }, 'Document saved under temporary name');
    } else {
      this.logger.debug({ filePath, kind: record.document_kind }, 'Document saved');
    }

    return filePath;
  }
}
