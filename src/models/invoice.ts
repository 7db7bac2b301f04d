import { attr } from '../entity/attributes.js';
import { defineEntity } from '../entity/entity.js';

/** Invoices share the `transaction` table with every other transaction type. */
export const Invoice = defineEntity({
  name: 'Invoice',
  table: 'transaction',
  attributes: {
    id: attr.string(),
    memo: attr.string(),
    transactionId: attr.string({ alias: 'tranId' }),
    transactionDate: attr.date({ alias: 'tranDate' }),
    account: attr.string({ context: 'rest' }),
    amountPaid: attr.number({ alias: 'amountPaid', aliasQl: 'foreignAmountPaid' }),
    amountRemaining: attr.number({ alias: 'amountRemaining', aliasQl: 'foreignAmountUnpaid' }),
    class: attr.string({ context: 'rest' }),
    entity: attr.string(),
    employee: attr.string({ context: 'ql' }),
    createdFrom: attr.string({ alias: 'createdFrom', context: 'rest' }),
    subsidiary: attr.string({ context: 'rest' }),
    location: attr.string({ context: 'rest' }),
    terms: attr.string({ context: 'rest' }),
    subtotal: attr.number({ context: 'rest' }),
    recordType: attr.literal('invoice', { alias: 'recordType', context: 'ql' }),
  },
});
