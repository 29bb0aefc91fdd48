import { describe, it, expect } from 'vitest';
import { XMLParser } from 'fast-xml-parser';
import { loadFinanceConfig } from '@clubledger/core/config/finance-config';
import { PAIN_NAMESPACE, buildMessageId, buildSepaPain, mandateSignatureDate } from '../helpers/sepa-pain';
import type { PainTransaction } from '../helpers/sepa-pain';

const creditor = loadFinanceConfig({}).sepa;
const now = new Date('2024-06-03T10:00:00Z');

function painTx(overrides: Partial<PainTransaction>): PainTransaction {
  return {
    transactionId: 't-1',
    sequenceType: 'RCUR',
    amountCents: 2800,
    mandateReference: 'CL-m-1',
    mandateGrantedOn: '2020-05-05',
    debtorName: 'Anna Schmidt',
    iban: 'DE89370400440532013000',
    remittance: 'CL-m-1, Schmidt, Anna',
    ...overrides,
  };
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  isArray: (name) => ['PmtInf', 'DrctDbtTxInf', 'AdrLine'].includes(name),
});

function parse(xml: string) {
  return parser.parse(xml).Document;
}

describe('mandateSignatureDate', () => {
  it('dates pre-migration mandates at the cutoff', () => {
    expect(mandateSignatureDate('2012-03-01', creditor)).toBe('2013-10-14');
    expect(mandateSignatureDate('2013-07-30', creditor)).toBe('2013-07-30');
  });
});

describe('buildMessageId', () => {
  it('combines the timestamp with a random suffix', () => {
    expect(buildMessageId(now, () => 0)).toBe('1717408800.000000-AAAAAAAAAA');
  });
});

describe('buildSepaPain', () => {
  const transactions = [
    painTx({ transactionId: 't-1', sequenceType: 'RCUR', amountCents: 1234 }),
    painTx({
      transactionId: 't-2',
      sequenceType: 'FRST',
      amountCents: 2800,
      mandateReference: 'CL-m-2',
      mandateGrantedOn: '2013-01-01',
      debtorName: 'Jörg Müller',
    }),
    painTx({ transactionId: 't-3', sequenceType: 'RCUR', amountCents: 66, remittance: 'x'.repeat(200) }),
  ];
  const doc = buildSepaPain(transactions, { creditor, collectionDate: '2024-06-20', now, random: () => 0 });

  it('summarizes counts and exact sums', () => {
    expect(doc.messageId).toBe('1717408800.000000-AAAAAAAAAA');
    expect(doc.count).toBe(3);
    expect(doc.ctrlSum).toBe('41.00');
    expect(doc.groups).toEqual([
      { sequenceType: 'FRST', count: 1, ctrlSum: '28.00' },
      { sequenceType: 'RCUR', count: 2, ctrlSum: '13.00' },
    ]);
    expect(doc.xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n')).toBe(true);
  });

  it('writes the group header', () => {
    const parsed = parse(doc.xml);
    expect(parsed['@_xmlns']).toBe(PAIN_NAMESPACE);
    expect(parsed.CstmrDrctDbtInitn.GrpHdr).toEqual({
      MsgId: '1717408800.000000-AAAAAAAAAA',
      CreDtTm: '2024-06-03T10:00:00',
      NbOfTxs: '3',
      CtrlSum: '41.00',
      InitgPty: { Nm: 'Club Ledger e.V.' },
    });
  });

  it('puts first collections before recurring ones', () => {
    const blocks = parse(doc.xml).CstmrDrctDbtInitn.PmtInf;
    expect(blocks).toHaveLength(2);
    expect(blocks[0].PmtInfId).toBe('1717408800.000000-AAAAAAAAAA-FRST');
    expect(blocks[0].PmtTpInf).toEqual({ SvcLvl: { Cd: 'SEPA' }, LclInstrm: { Cd: 'CORE' }, SeqTp: 'FRST' });
    expect(blocks[1].PmtTpInf.SeqTp).toBe('RCUR');
    expect(blocks[1].NbOfTxs).toBe('2');
    expect(blocks[1].CtrlSum).toBe('13.00');
    expect(blocks[1].ReqdColltnDt).toBe('2024-06-20');
    expect(blocks[0].Cdtr.PstlAdr.AdrLine).toEqual(['Musterstrasse 1', '12345 Musterstadt']);
    expect(blocks[0].CdtrSchmeId.Id.PrvtId.Othr.Id).toBe('DE98ZZZ09999999999');
  });

  it('writes each transaction', () => {
    const blocks = parse(doc.xml).CstmrDrctDbtInitn.PmtInf;
    const first = blocks[0].DrctDbtTxInf[0];
    expect(first.PmtId.EndToEndId).toBe('t-2');
    expect(first.InstdAmt).toEqual({ '#text': '28.00', '@_Ccy': 'EUR' });
    expect(first.DrctDbtTx.MndtRltdInf).toEqual({ MndtId: 'CL-m-2', DtOfSgntr: '2013-10-14' });
    expect(first.Dbtr.Nm).toBe('Joerg Mueller');
    expect(first.DbtrAcct.Id.IBAN).toBe('DE89370400440532013000');

    const recurring = blocks[1].DrctDbtTxInf;
    expect(recurring.map((t: { PmtId: { EndToEndId: string } }) => t.PmtId.EndToEndId)).toEqual(['t-1', 't-3']);
    expect(recurring[0].DrctDbtTx.MndtRltdInf.DtOfSgntr).toBe('2020-05-05');
    expect(recurring[1].InstdAmt['#text']).toBe('0.66');
    expect(recurring[1].RmtInf.Ustrd).toBe('x'.repeat(140));
  });

  it('omits empty groups', () => {
    const only = buildSepaPain([painTx({})], { creditor, collectionDate: '2024-06-20', now });
    expect(only.groups).toEqual([{ sequenceType: 'RCUR', count: 1, ctrlSum: '28.00' }]);
    expect(parse(only.xml).CstmrDrctDbtInitn.PmtInf).toHaveLength(1);
  });
});
