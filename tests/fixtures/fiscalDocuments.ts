/**
 * Small hand-written DF-e documents for tests. Every id, key and name is made up.
 */

export const NFE_NS = 'http://www.portalfiscal.inf.br/nfe';
export const CTE_NS = 'http://www.portalfiscal.inf.br/cte';
export const MDFE_NS = 'http://www.portalfiscal.inf.br/mdfe';
export const NFSE_NS = 'http://www.abrasf.org.br/nfse.xsd';

export const NFE_KEY = '35200159594315000157550010000000012062777161';
export const CTE_KEY = '35241111222333000181570010000004561000004567';
export const MDFE_KEY = '35241111222333000181580010000000781000000789';

export const ISSUER_CNPJ = '59594315000157';
export const RECIPIENT_CNPJ = '11222333000181';
export const RECIPIENT_CPF = '12345678909';

export interface NfeParts {
  id?: string;
  ide?: string;
  emit?: string;
  dest?: string;
  prot?: string;
}

export function nfeXml(parts: NfeParts = {}): string {
  const {
    id = `NFe${NFE_KEY}`,
    ide = '<ide><cUF>35</cUF><nNF>1</nNF><dhEmi>2024-12-09T08:30:00-03:00</dhEmi></ide>',
    emit = `<emit><CNPJ>${ISSUER_CNPJ}</CNPJ><xNome>Emitente Teste</xNome></emit>`,
    dest = `<dest><CNPJ>${RECIPIENT_CNPJ}</CNPJ><xNome>Destinatario Teste</xNome></dest>`,
    prot = '<protNFe versao="4.00"><infProt><cStat>100</cStat><nProt>135240000000001</nProt></infProt></protNFe>',
  } = parts;

  return `<?xml version="1.0" encoding="UTF-8"?>
<nfeProc xmlns="${NFE_NS}" versao="4.00">
  <NFe>
    <infNFe Id="${id}" versao="4.00">
      ${ide}
      ${emit}
      ${dest}
    </infNFe>
  </NFe>
  ${prot}
</nfeProc>`;
}

export function cteXml(): string {
  return `<cteProc xmlns="${CTE_NS}" versao="4.00">
  <CTe>
    <infCte Id="CTe${CTE_KEY}" versao="4.00">
      <ide><dhEmi>2024-11-20T17:45:10-03:00</dhEmi></ide>
      <emit><CNPJ>${RECIPIENT_CNPJ}</CNPJ></emit>
      <rem><CNPJ>99888777000166</CNPJ></rem>
      <dest><CPF>${RECIPIENT_CPF}</CPF></dest>
    </infCte>
  </CTe>
  <protCTe versao="4.00"><infProt><nProt>235240000000002</nProt></infProt></protCTe>
</cteProc>`;
}

export function mdfeXml(contratante: string = ''): string {
  return `<mdfeProc xmlns="${MDFE_NS}" versao="3.00">
  <MDFe>
    <infMDFe Id="MDFe${MDFE_KEY}" versao="3.00">
      <ide><dhEmi>2024-11-21T06:00:00-03:00</dhEmi></ide>
      <emit><CNPJ>${RECIPIENT_CNPJ}</CNPJ></emit>
      ${contratante}
    </infMDFe>
  </MDFe>
</mdfeProc>`;
}

export function nfseXml(tomador: string = `<TomadorServico><IdentificacaoTomador><CpfCnpj><Cpf>${RECIPIENT_CPF}</Cpf></CpfCnpj></IdentificacaoTomador></TomadorServico>`): string {
  return `<CompNfse xmlns="${NFSE_NS}">
  <Nfse versao="2.02">
    <InfNfse Id="nfse1">
      <Numero>2024000123</Numero>
      <CodigoVerificacao>ABCD1234</CodigoVerificacao>
      <DataEmissao>2024-12-09T10:15:00</DataEmissao>
      <PrestadorServico>
        <IdentificacaoPrestador><CpfCnpj><Cnpj>${ISSUER_CNPJ}</Cnpj></CpfCnpj></IdentificacaoPrestador>
      </PrestadorServico>
      ${tomador}
    </InfNfse>
  </Nfse>
</CompNfse>`;
}

export interface EventParts {
  key?: string;
  type?: string;
  description?: string;
  timestamp?: string;
}

export function eventXml(parts: EventParts = {}): string {
  const {
    key = `<chNFe>${NFE_KEY}</chNFe>`,
    type = '<tpEvento>110111</tpEvento>',
    description = '<descEvento>Cancelamento</descEvento>',
    timestamp = '<dhEvento>2024-12-10T14:05:00-03:00</dhEvento>',
  } = parts;

  return `<evento xmlns="${NFE_NS}" versao="1.00">
  <infEvento Id="ID110111${NFE_KEY}01">
    <cOrgao>35</cOrgao>
    <CNPJ>${ISSUER_CNPJ}</CNPJ>
    ${key}
    ${timestamp}
    ${type}
    <nSeqEvento>1</nSeqEvento>
    <detEvento versao="1.00">
      ${description}
      <nProt>135240000000001</nProt>
      <xJust>Nota emitida com dados incorretos</xJust>
    </detEvento>
  </infEvento>
</evento>`;
}

export function nfeEnvelopeXml(eventTimestamp: string = '2024-12-10T14:05:00-03:00', result: boolean = true): string {
  const retEvento = result
    ? `<retEvento versao="1.00">
    <infEvento>
      <cStat>135</cStat>
      <xMotivo>Evento registrado e vinculado a NF-e</xMotivo>
      <chNFe>${NFE_KEY}</chNFe>
      <dhRegEvento>2024-12-10T14:06:30-03:00</dhRegEvento>
      <nProt>135240000000777</nProt>
    </infEvento>
  </retEvento>`
    : '';

  return `<procEventoNFe xmlns="${NFE_NS}" versao="1.00">
  <evento versao="1.00">
    <infEvento Id="ID110110${NFE_KEY}02">
      <CNPJ>${ISSUER_CNPJ}</CNPJ>
      <chNFe>${NFE_KEY}</chNFe>
      <dhEvento>${eventTimestamp}</dhEvento>
      <tpEvento>110110</tpEvento>
      <nSeqEvento>2</nSeqEvento>
      <detEvento versao="1.00">
        <descEvento>Carta de Correcao</descEvento>
        <xCorrecao>Corrige o endereco do destinatario</xCorrecao>
      </detEvento>
    </infEvento>
  </evento>
  ${retEvento}
</procEventoNFe>`;
}

export function cteEnvelopeXml(): string {
  return `<procEventoCTe xmlns="${CTE_NS}" versao="4.00">
  <eventoCTe versao="4.00">
    <infEvento Id="ID110111${CTE_KEY}01">
      <CNPJ>${RECIPIENT_CNPJ}</CNPJ>
      <chCTe>${CTE_KEY}</chCTe>
      <dhEvento>2024-11-22T09:00:00-03:00</dhEvento>
      <tpEvento>110111</tpEvento>
      <nSeqEvento>1</nSeqEvento>
      <detEvento versao="4.00"><evCancCTe><descEvento>Cancelamento</descEvento><nProt>235240000000002</nProt></evCancCTe></detEvento>
    </infEvento>
  </eventoCTe>
  <retEventoCTe versao="4.00">
    <infEvento>
      <cStat>135</cStat>
      <xMotivo>Evento registrado e vinculado a CT-e</xMotivo>
      <nProt>235240000000999</nProt>
    </infEvento>
  </retEventoCTe>
</procEventoCTe>`;
}
