/**
 * Document kinds and root-tag classification
 *
 * Classification looks only at the lower-cased local name of the root element and tests it
 * against an ordered suffix table. The first matching suffix wins, so longer suffixes that
 * contain shorter ones (`proceventonfe` contains `nfe`) must come first.
 */

import type { XmlNode } from './xmlTree.js';

export enum DocumentKind {
  Invoice = 'Invoice',
  TransportManifest = 'TransportManifest',
  FreightManifest = 'FreightManifest',
  ServiceInvoice = 'ServiceInvoice',
  Event = 'Event',
  EventEnvelope = 'EventEnvelope',
}

/**
 * Kinds that share the NF-e style layout (information block, emit/dest, protocol block)
 */
export type DocumentFamily = DocumentKind.Invoice | DocumentKind.TransportManifest | DocumentKind.FreightManifest;

export type Classification =
  | { kind: DocumentKind.Invoice }
  | { kind: DocumentKind.TransportManifest }
  | { kind: DocumentKind.FreightManifest }
  | { kind: DocumentKind.ServiceInvoice }
  | { kind: DocumentKind.Event }
  | { kind: DocumentKind.EventEnvelope; family: DocumentFamily };

export interface ClassificationRule {
  suffix: string;
  classification: Classification;
}

export const NAMESPACES = {
  nfe: 'http://www.portalfiscal.inf.br/nfe',
  cte: 'http://www.portalfiscal.inf.br/cte',
  mdfe: 'http://www.portalfiscal.inf.br/mdfe',
  nfse: 'http://www.abrasf.org.br/nfse.xsd',
} as const;

const ENVELOPE_RULES: readonly ClassificationRule[] = [
  { suffix: 'proceventonfe', classification: { kind: DocumentKind.EventEnvelope, family: DocumentKind.Invoice } },
  { suffix: 'proceventocte', classification: { kind: DocumentKind.EventEnvelope, family: DocumentKind.TransportManifest } },
  { suffix: 'proceventomdfe', classification: { kind: DocumentKind.EventEnvelope, family: DocumentKind.FreightManifest } },
];

/**
 * Ordered suffix table; earlier entries take priority
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  ...ENVELOPE_RULES,
  { suffix: 'eventoproc', classification: { kind: DocumentKind.Event } },
  { suffix: 'evento', classification: { kind: DocumentKind.Event } },
  { suffix: 'cteproc', classification: { kind: DocumentKind.TransportManifest } },
  { suffix: 'cte', classification: { kind: DocumentKind.TransportManifest } },
  { suffix: 'mdfeproc', classification: { kind: DocumentKind.FreightManifest } },
  { suffix: 'mdfe', classification: { kind: DocumentKind.FreightManifest } },
  { suffix: 'compnfse', classification: { kind: DocumentKind.ServiceInvoice } },
  { suffix: 'nfse', classification: { kind: DocumentKind.ServiceInvoice } },
  { suffix: 'nfeproc', classification: { kind: DocumentKind.Invoice } },
  { suffix: 'nfe', classification: { kind: DocumentKind.Invoice } },
];

function matchRule(rules: readonly ClassificationRule[], localName: string): Classification | null {
  const tag = localName.toLowerCase();
  return rules.find(rule => tag.endsWith(rule.suffix))?.classification ?? null;
}

/**
 * Classify a root local name, or null when no suffix matches
 */
export function classifyRootName(localName: string): Classification | null {
  return matchRule(CLASSIFICATION_RULES, localName);
}

export function classifyDocument(root: XmlNode): Classification | null {
  return classifyRootName(root.localName);
}

/**
 * Family of a processed-event envelope, from its root tag
 */
export function detectEnvelopeFamily(localName: string): DocumentFamily | null {
  const classification = matchRule(ENVELOPE_RULES, localName);
  return classification?.kind === DocumentKind.EventEnvelope ? classification.family : null;
}

/**
 * Layout of one document family
 */
export interface FamilyProfile {
  label: string;
  namespace: string;
  /** Prefix of the information block `Id` attribute */
  keyPrefix: string;
  infoBlock: string;
  protocolBlock: string;
  accessKeyElement: string;
  /** Inner event tags of a processed-event envelope, in lookup order */
  eventTags: readonly string[];
  resultBlocks: readonly string[];
  recipientBlock: string;
  recipientRequired: boolean;
  legacyEmissionDate: string | null;
}

const EVENT_TAGS = ['evento', 'eventoCTe', 'eventoMDFe'] as const;
const RESULT_BLOCKS = ['retEvento', 'retEventoCTe', 'retEventoMDFe'] as const;

export const FAMILY_PROFILES: Readonly<Record<DocumentFamily, FamilyProfile>> = {
  [DocumentKind.Invoice]: {
    label: 'NF-e',
    namespace: NAMESPACES.nfe,
    keyPrefix: 'NFe',
    infoBlock: 'infNFe',
    protocolBlock: 'protNFe',
    accessKeyElement: 'chNFe',
    eventTags: EVENT_TAGS,
    resultBlocks: RESULT_BLOCKS,
    recipientBlock: 'dest',
    recipientRequired: true,
    legacyEmissionDate: 'dEmi',
  },
  [DocumentKind.TransportManifest]: {
    label: 'CT-e',
    namespace: NAMESPACES.cte,
    keyPrefix: 'CTe',
    infoBlock: 'infCte',
    protocolBlock: 'protCTe',
    accessKeyElement: 'chCTe',
    eventTags: EVENT_TAGS,
    resultBlocks: RESULT_BLOCKS,
    recipientBlock: 'dest',
    recipientRequired: true,
    legacyEmissionDate: null,
  },
  [DocumentKind.FreightManifest]: {
    label: 'MDF-e',
    namespace: NAMESPACES.mdfe,
    keyPrefix: 'MDFe',
    infoBlock: 'infMDFe',
    protocolBlock: 'protMDFe',
    accessKeyElement: 'chMDFe',
    eventTags: EVENT_TAGS,
    resultBlocks: RESULT_BLOCKS,
    recipientBlock: 'infContratante',
    recipientRequired: false,
    legacyEmissionDate: null,
  },
};

export const KIND_LABELS: Readonly<Record<DocumentKind, string>> = {
  [DocumentKind.Invoice]: 'NF-e',
  [DocumentKind.TransportManifest]: 'CT-e',
  [DocumentKind.FreightManifest]: 'MDF-e',
  [DocumentKind.ServiceInvoice]: 'NFS-e',
  [DocumentKind.Event]: 'Evento',
  [DocumentKind.EventEnvelope]: 'Evento processado',
};

const FAMILIES: readonly DocumentFamily[] = [
  DocumentKind.Invoice,
  DocumentKind.TransportManifest,
  DocumentKind.FreightManifest,
];

/**
 * Family of a bare event, from the root namespace; NF-e when the namespace is not a family's
 */
export function resolveEventFamily(root: XmlNode): DocumentFamily {
  return FAMILIES.find(family => FAMILY_PROFILES[family].namespace === root.namespace) ?? DocumentKind.Invoice;
}
