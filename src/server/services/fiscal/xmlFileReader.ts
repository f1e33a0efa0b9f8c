/**
 * Local XML file access for re-processing saved documents
 */

import { readFile, stat } from 'fs/promises';
import path from 'path';
import { glob } from 'glob';
import { DocumentFileError } from '../../types/errors.js';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode file bytes as UTF-8, or Latin-1 when they are not valid UTF-8
 * (older documents are sometimes saved as ISO-8859-1)
 */
export function decodeXmlBytes(bytes: Uint8Array): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch {
    return Buffer.from(bytes).toString('latin1');
  }
}

/**
 * Read one XML file as text
 *
 * @throws {DocumentFileError} When the path is not a file or exceeds `maxBytes`
 */
export async function readXmlFile(filePath: string, maxBytes: number): Promise<string> {
  const info = await stat(filePath);
  if (!info.isFile()) {
    throw new DocumentFileError(filePath, 'not a regular file');
  }
  if (info.size > maxBytes) {
    throw new DocumentFileError(filePath, `file is ${info.size} bytes, limit is ${maxBytes}`, {
      size: info.size,
      maxBytes,
    });
  }

  return decodeXmlBytes(await readFile(filePath));
}

/**
 * All `.xml` files below a directory, sorted
 */
export async function listXmlFiles(directory: string): Promise<string[]> {
  const files = await glob('**/*.xml', {
    cwd: directory,
    nodir: true,
    nocase: true,
  });
  return files.map(file => path.join(directory, file)).sort();
}
