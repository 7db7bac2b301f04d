import { attr } from '../entity/attributes.js';
import { defineEntity } from '../entity/entity.js';

export const CreditMemo = defineEntity({
  name: 'CreditMemo',
  table: 'transaction',
  attributes: {
    id: attr.string(),
    account: attr.string(),
    amountPaid: attr.number({ alias: 'amountPaid', context: 'rest' }),
    class: attr.string({ context: 'rest' }),
    entity: attr.string(),
    subsidiary: attr.string(),
    memo: attr.string(),
    transactionId: attr.string({ alias: 'tranId' }),
    transactionDate: attr.date({ alias: 'tranDate' }),
    location: attr.string(),
    terms: attr.string(),
    subtotal: attr.number({ context: 'rest' }),
    recordType: attr.literal('creditmemo', { alias: 'recordType', context: 'ql' }),
  },
});
