import { FAMILY_PROFILES, resolveEventFamily } from '../documentKinds.js';
import { bareEventRecord, normalizeAccessKey } from '../canonicalRecord.js';
import type { BareEventRecord } from '../canonicalRecord.js';
import { firstText, optionalText, requiredFirstText, requiredText } from '../fieldLookup.js';
import type { XmlNode } from '../xmlTree.js';

/**
 * Bare event (`evento`, `eventoProc`). Access key, type, description and timestamp are all
 * required; sequence, author and protocol are optional.
 */
export function extractEvent(root: XmlNode): BareEventRecord {
  const family = resolveEventFamily(root);
  const profile = FAMILY_PROFILES[family];
  const { namespace } = profile;
  const label = `${profile.label} event`;

  const accessKey = normalizeAccessKey(
    requiredText(root, namespace, [profile.accessKeyElement], label, 'access key'),
    '',
    label
  );
  const eventType = requiredText(root, namespace, ['tpEvento'], label, 'event type');
  const eventDescription = requiredFirstText(
    root,
    namespace,
    [['descEvento'], ['xEvento']],
    label,
    'event description'
  );
  const eventDate = requiredText(root, namespace, ['dhEvento'], label, 'event timestamp');

  return bareEventRecord({
    family,
    accessKey,
    authorId: firstText(root, namespace, [
      ['infEvento', 'CNPJ'],
      ['infEvento', 'CPF'],
    ]),
    protocol: optionalText(root, namespace, ['nProt']),
    eventType,
    eventSequence: optionalText(root, namespace, ['nSeqEvento']),
    eventDescription,
    eventDate,
  });
}
