/**
 * Extractor for NF-e, CT-e and MDF-e documents
 *
 * The three families share one layout: an information block whose `Id` carries the access
 * key, `emit` and a recipient block with CNPJ/CPF, `ide` with the emission timestamp and an
 * optional authorization protocol block.
 */

import { FAMILY_PROFILES } from '../documentKinds.js';
import type { DocumentFamily } from '../documentKinds.js';
import { documentRecord, normalizeAccessKey } from '../canonicalRecord.js';
import type { DocumentRecord } from '../canonicalRecord.js';
import {
  firstText,
  optionalText,
  requireNode,
  requiredAttribute,
  requiredFirstText,
  requireValue,
} from '../fieldLookup.js';
import type { FieldPath } from '../fieldLookup.js';
import type { XmlNode } from '../xmlTree.js';

export function extractPrimaryDocument(root: XmlNode, family: DocumentFamily): DocumentRecord {
  const profile = FAMILY_PROFILES[family];
  const { namespace, label } = profile;

  const infoBlock = requireNode(root, namespace, [profile.infoBlock], label, 'information block');
  const accessKey = normalizeAccessKey(
    requiredAttribute(infoBlock, 'Id', label, 'access key'),
    profile.keyPrefix,
    label
  );

  const issuerId = requiredFirstText(
    root,
    namespace,
    [
      ['emit', 'CNPJ'],
      ['emit', 'CPF'],
    ],
    label,
    'issuer tax id'
  );

  const recipientId = firstText(root, namespace, [
    [profile.recipientBlock, 'CNPJ'],
    [profile.recipientBlock, 'CPF'],
  ]);
  if (profile.recipientRequired) {
    requireValue(recipientId, label, 'recipient tax id');
  }

  // Older NF-e layouts only carry the date-only dEmi
  const emissionPaths: FieldPath[] = [['ide', 'dhEmi']];
  if (profile.legacyEmissionDate) {
    emissionPaths.push(['ide', profile.legacyEmissionDate]);
  }
  const emissionDate = requiredFirstText(root, namespace, emissionPaths, label, 'emission date');

  return documentRecord({
    kind: family,
    accessKey,
    issuerId,
    recipientId,
    emissionDate,
    protocol: optionalText(root, namespace, [profile.protocolBlock, 'infProt', 'nProt']),
  });
}
