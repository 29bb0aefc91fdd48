import { XMLBuilder } from 'fast-xml-parser';
import { formatCents, randomAlphanumeric, sumCents, toSepaText } from '@clubledger/shared';
import type { SepaCreditorConfig } from '@clubledger/core/config/finance-config';
import { SEQUENCE_TYPES } from '../validation';
import type { SequenceType } from '../validation';

export const PAIN_NAMESPACE = 'urn:iso:std:iso:20022:tech:xsd:pain.008.001.02';

const NAME_LENGTH = 70;
const REMITTANCE_LENGTH = 140;

export interface PainTransaction {
  transactionId: string;
  sequenceType: SequenceType;
  amountCents: number;
  mandateReference: string;
  /** `YYYY-MM-DD` the mandate was granted. */
  mandateGrantedOn: string;
  debtorName: string;
  iban: string;
  remittance: string;
}

export interface PainOptions {
  creditor: SepaCreditorConfig;
  /** Requested collection date, `YYYY-MM-DD`. */
  collectionDate: string;
  now: Date;
  random?: () => number;
}

export interface PainGroupSummary {
  sequenceType: SequenceType;
  count: number;
  ctrlSum: string;
}

export interface PainDocument {
  xml: string;
  messageId: string;
  count: number;
  ctrlSum: string;
  groups: PainGroupSummary[];
}

/** Mandates from before the SEPA migration carry the migration cutoff as signature date. */
export function mandateSignatureDate(grantedOn: string, creditor: SepaCreditorConfig): string {
  return grantedOn >= creditor.initialisationDate ? grantedOn : creditor.cutoffDate;
}

export function buildMessageId(now: Date, random: () => number = Math.random): string {
  return `${(now.getTime() / 1000).toFixed(6)}-${randomAlphanumeric(10, random)}`;
}

function notProvidedAgent() {
  return { FinInstnId: { Othr: { Id: 'NOTPROVIDED' } } };
}

function transactionElement(t: PainTransaction, creditor: SepaCreditorConfig) {
  return {
    PmtId: { EndToEndId: t.transactionId },
    InstdAmt: { '@_Ccy': 'EUR', '#text': formatCents(t.amountCents) },
    DrctDbtTx: {
      MndtRltdInf: {
        MndtId: t.mandateReference,
        DtOfSgntr: mandateSignatureDate(t.mandateGrantedOn, creditor),
      },
    },
    DbtrAgt: notProvidedAgent(),
    Dbtr: { Nm: toSepaText(t.debtorName, NAME_LENGTH) },
    DbtrAcct: { Id: { IBAN: t.iban } },
    RmtInf: { Ustrd: toSepaText(t.remittance, REMITTANCE_LENGTH) },
  };
}

/**
 * Serialize transactions into a pain.008.001.02 direct debit initiation.
 * One payment block per sequence type, FRST first; sums are exact cents.
 */
export function buildSepaPain(transactions: PainTransaction[], options: PainOptions): PainDocument {
  const { creditor, collectionDate, now } = options;
  const messageId = buildMessageId(now, options.random);
  const creditorName = toSepaText(creditor.name, NAME_LENGTH);

  const groups: PainGroupSummary[] = [];
  const paymentBlocks: Array<Record<string, unknown>> = [];
  for (const sequenceType of SEQUENCE_TYPES) {
    const members = transactions.filter((t) => t.sequenceType === sequenceType);
    if (members.length === 0) continue;
    const ctrlSum = formatCents(sumCents(members.map((t) => t.amountCents)));
    groups.push({ sequenceType, count: members.length, ctrlSum });
    paymentBlocks.push({
      PmtInfId: `${messageId}-${sequenceType}`,
      PmtMtd: 'DD',
      BtchBookg: 'true',
      NbOfTxs: String(members.length),
      CtrlSum: ctrlSum,
      PmtTpInf: {
        SvcLvl: { Cd: 'SEPA' },
        LclInstrm: { Cd: 'CORE' },
        SeqTp: sequenceType,
      },
      ReqdColltnDt: collectionDate,
      Cdtr: {
        Nm: creditorName,
        PstlAdr: {
          Ctry: creditor.country,
          AdrLine: creditor.addressLines.map((line) => toSepaText(line, NAME_LENGTH)),
        },
      },
      CdtrAcct: { Id: { IBAN: creditor.iban } },
      CdtrAgt: notProvidedAgent(),
      ChrgBr: 'SLEV',
      CdtrSchmeId: {
        Id: { PrvtId: { Othr: { Id: creditor.creditorId, SchmeNm: { Prtry: 'SEPA' } } } },
      },
      DrctDbtTxInf: members.map((t) => transactionElement(t, creditor)),
    });
  }

  const count = transactions.length;
  const ctrlSum = formatCents(sumCents(transactions.map((t) => t.amountCents)));
  const document = {
    Document: {
      '@_xmlns': PAIN_NAMESPACE,
      '@_xmlns:xsi': 'http://www.w3.org/2001/XMLSchema-instance',
      CstmrDrctDbtInitn: {
        GrpHdr: {
          MsgId: messageId,
          CreDtTm: now.toISOString().slice(0, 19),
          NbOfTxs: String(count),
          CtrlSum: ctrlSum,
          InitgPty: { Nm: creditorName },
        },
        PmtInf: paymentBlocks,
      },
    },
  };

  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    format: true,
    indentBy: '  ',
  });
  const xml = `<?xml version="1.0" encoding="UTF-8"?>\n${builder.build(document)}`;
  return { xml, messageId, count, ctrlSum, groups };
}
