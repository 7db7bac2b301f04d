import { attr } from '../entity/attributes.js';
import { defineEntity } from '../entity/entity.js';

export const CustomerPayment = defineEntity({
  name: 'CustomerPayment',
  table: 'transaction',
  attributes: {
    id: attr.string(),
    account: attr.string(),
    customer: attr.string(),
    payment: attr.number(),
    transactionDate: attr.date({ alias: 'tranDate' }),
    recordType: attr.literal('customerpayment', { alias: 'recordType', context: 'ql' }),
  },
});
