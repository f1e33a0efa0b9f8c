import { DocumentKind, KIND_LABELS, NAMESPACES } from '../documentKinds.js';
import { documentRecord } from '../canonicalRecord.js';
import type { DocumentRecord } from '../canonicalRecord.js';
import { optionalText, requireNode, requireValue } from '../fieldLookup.js';
import { findChild, findFirst, textOf } from '../xmlTree.js';
import type { XmlNode } from '../xmlTree.js';

const LABEL = KIND_LABELS[DocumentKind.ServiceInvoice];
const NAMESPACE = NAMESPACES.nfse;

/**
 * First party subtree found under any of `blocks`, e.g. PrestadorServico (ABRASF 1) or Prestador (ABRASF 2)
 */
function findParty(root: XmlNode, blocks: readonly string[]): XmlNode | null {
  for (const block of blocks) {
    const node = findFirst(root, NAMESPACE, [block]);
    if (node) {
      return node;
    }
  }
  return null;
}

/**
 * Cnpj preferred over Cpf, at any depth in the party subtree
 */
function partyTaxId(party: XmlNode | null): string | null {
  if (!party) {
    return null;
  }
  return optionalText(party, NAMESPACE, ['Cnpj']) ?? optionalText(party, NAMESPACE, ['Cpf']);
}

/**
 * NFS-e (ABRASF layout). The NFS-e number stands in for the access key.
 */
export function extractServiceInvoice(root: XmlNode): DocumentRecord {
  const info = requireNode(root, NAMESPACE, ['InfNfse'], LABEL, 'InfNfse');

  const number = requireValue(
    textOf(findChild(info, NAMESPACE, 'Numero')) ?? optionalText(info, NAMESPACE, ['Numero']),
    LABEL,
    'number'
  );

  const issuerId = requireValue(
    partyTaxId(findParty(root, ['PrestadorServico', 'Prestador'])),
    LABEL,
    'provider tax id'
  );

  const recipientId = partyTaxId(findParty(root, ['TomadorServico', 'Tomador']));

  const emissionDate = requireValue(textOf(findChild(info, NAMESPACE, 'DataEmissao')), LABEL, 'emission date');

  return documentRecord({
    kind: DocumentKind.ServiceInvoice,
    accessKey: number,
    issuerId,
    recipientId,
    emissionDate,
    protocol: textOf(findChild(info, NAMESPACE, 'CodigoVerificacao')),
  });
}
