/**
 * Extractor for processed-event envelopes (procEventoNFe, procEventoCTe, procEventoMDFe)
 *
 * The envelope bundles the signed event and the authority's result block. Only the event's
 * information block is required; every other field is read when present.
 */

import { FAMILY_PROFILES, detectEnvelopeFamily } from '../documentKinds.js';
import type { FamilyProfile } from '../documentKinds.js';
import { UnknownDocumentKindError } from '../../../types/errors.js';
import { envelopeEventRecord, normalizeAccessKey } from '../canonicalRecord.js';
import type { EnvelopeEventRecord, ExtractedEventResult } from '../canonicalRecord.js';
import { firstText, optionalText, requireNode, requireValue } from '../fieldLookup.js';
import { findChild, findFirst, textOf } from '../xmlTree.js';
import type { XmlNode } from '../xmlTree.js';

function findFirstOf(root: XmlNode, namespace: string, tags: readonly string[]): XmlNode | null {
  for (const tag of tags) {
    const node = findFirst(root, namespace, [tag]);
    if (node) {
      return node;
    }
  }
  return null;
}

function readResult(root: XmlNode, profile: FamilyProfile): ExtractedEventResult & { protocol: string | null } {
  const result = findFirstOf(root, profile.namespace, profile.resultBlocks);
  if (!result) {
    return { statusCode: null, statusReason: null, registeredAt: null, protocol: null };
  }
  return {
    statusCode: optionalText(result, profile.namespace, ['cStat']),
    statusReason: optionalText(result, profile.namespace, ['xMotivo']),
    registeredAt: optionalText(result, profile.namespace, ['dhRegEvento']),
    protocol: optionalText(result, profile.namespace, ['nProt']),
  };
}

/**
 * The family comes from the envelope's root tag
 */
export function extractEventEnvelope(root: XmlNode): EnvelopeEventRecord {
  const family = detectEnvelopeFamily(root.localName);
  if (family === null) {
    throw new UnknownDocumentKindError(root.localName);
  }
  const profile = FAMILY_PROFILES[family];
  const { namespace } = profile;
  const label = `${profile.label} event envelope`;

  const event = requireValue(findFirstOf(root, namespace, profile.eventTags), label, 'event');
  const info = requireNode(event, namespace, ['infEvento'], label, 'infEvento');

  const rawKey = textOf(findChild(info, namespace, profile.accessKeyElement));
  const { protocol: resultProtocol, ...result } = readResult(root, profile);

  return envelopeEventRecord(
    {
      family,
      accessKey: rawKey === null ? null : normalizeAccessKey(rawKey, '', label),
      authorId: textOf(findChild(info, namespace, 'CNPJ')) ?? textOf(findChild(info, namespace, 'CPF')),
      protocol: resultProtocol ?? optionalText(info, namespace, ['nProt']),
      eventType: textOf(findChild(info, namespace, 'tpEvento')),
      eventSequence: textOf(findChild(info, namespace, 'nSeqEvento')),
      eventDescription: firstText(info, namespace, [['descEvento'], ['xEvento']]),
      eventDate: textOf(findChild(info, namespace, 'dhEvento')),
    },
    result
  );
}
