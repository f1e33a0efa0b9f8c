import { describe, it, expect } from 'vitest';
import {
  firstText,
  optionalAttribute,
  optionalText,
  requireNode,
  requiredAttribute,
  requiredFirstText,
  requiredText,
} from '../../../../src/server/adapters/fiscal/fieldLookup.js';
import { parseXmlDocument } from '../../../../src/server/adapters/fiscal/xmlTree.js';
import { MissingFieldError } from '../../../../src/server/types/errors.js';

const NS = 'urn:test';
const root = parseXmlDocument(
  `<doc xmlns="${NS}"><info Id=" K1 " Empty=""><emit><CPF>111</CPF></emit><ide><dEmi>2024-01-02</dEmi></ide></info></doc>`
);

describe('field lookup', () => {
  it('reads optional fields as null when absent', () => {
    expect(optionalText(root, NS, ['emit', 'CPF'])).toBe('111');
    expect(optionalText(root, NS, ['emit', 'CNPJ'])).toBeNull();
  });

  it('takes the first path that has text', () => {
    expect(firstText(root, NS, [['emit', 'CNPJ'], ['emit', 'CPF']])).toBe('111');
    expect(firstText(root, NS, [['ide', 'dhEmi'], ['ide', 'dEmi']])).toBe('2024-01-02');
    expect(firstText(root, NS, [['dest', 'CNPJ']])).toBeNull();
  });

  it('throws MissingFieldError for absent required fields', () => {
    expect(() => requiredText(root, NS, ['emit', 'CNPJ'], 'NF-e', 'issuer tax id')).toThrow(MissingFieldError);
    expect(() => requiredFirstText(root, NS, [['dest', 'CNPJ'], ['dest', 'CPF']], 'NF-e', 'recipient tax id')).toThrow(
      'Required field "recipient tax id" not found in NF-e document'
    );
    expect(() => requireNode(root, NS, ['infNFe'], 'NF-e', 'information block')).toThrow(MissingFieldError);
  });

  it('reads attributes trimmed, blank as absent', () => {
    const info = requireNode(root, NS, ['info'], 'NF-e', 'information block');
    expect(requiredAttribute(info, 'Id', 'NF-e', 'access key')).toBe('K1');
    expect(optionalAttribute(info, 'Empty')).toBeNull();
    expect(() => requiredAttribute(info, 'Missing', 'NF-e', 'access key')).toThrow(
      'Required field "access key" not found in NF-e document'
    );
  });
});
