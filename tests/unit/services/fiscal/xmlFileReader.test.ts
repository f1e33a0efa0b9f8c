import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { decodeXmlBytes, listXmlFiles, readXmlFile } from '../../../../src/server/services/fiscal/xmlFileReader.js';
import { DocumentFileError } from '../../../../src/server/types/errors.js';

describe('decodeXmlBytes', () => {
  it('decodes UTF-8 and drops the byte order mark', () => {
    expect(decodeXmlBytes(Buffer.from('\uFEFF<a>São</a>', 'utf8'))).toBe('<a>São</a>');
  });

  it('falls back to Latin-1', () => {
    expect(decodeXmlBytes(Buffer.from('<a>São</a>', 'latin1'))).toBe('<a>São</a>');
  });
});

describe('xml files on disk', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'dfe-reader-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a file within the size limit', async () => {
    const file = path.join(dir, 'a.xml');
    await writeFile(file, '<NFe/>', 'utf8');
    expect(await readXmlFile(file, 100)).toBe('<NFe/>');
  });

  it('rejects files over the limit', async () => {
    const file = path.join(dir, 'big.xml');
    await writeFile(file, '<NFe>0123456789</NFe>', 'utf8');
    await expect(readXmlFile(file, 10)).rejects.toThrow(DocumentFileError);
  });

  it('rejects directories', async () => {
    await expect(readXmlFile(dir, 100)).rejects.toThrow(`${dir}: not a regular file`);
  });

  it('lists xml files recursively in path order', async () => {
    await mkdir(path.join(dir, 'sub'), { recursive: true });
    await writeFile(path.join(dir, 'b.xml'), '<b/>');
    await writeFile(path.join(dir, 'sub', 'a.XML'), '<a/>');
    await writeFile(path.join(dir, 'notes.txt'), 'skip');

    expect(await listXmlFiles(dir)).toEqual([path.join(dir, 'b.xml'), path.join(dir, 'sub', 'a.XML')]);
  });
});
