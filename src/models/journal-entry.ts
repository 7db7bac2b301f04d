import { attr } from '../entity/attributes.js';
import { defineEntity } from '../entity/entity.js';

export const JournalEntry = defineEntity({
  name: 'JournalEntry',
  table: 'transaction',
  attributes: {
    id: attr.string(),
    memo: attr.string(),
    subsidiary: attr.string(),
    transactionDate: attr.date({ alias: 'tranDate' }),
    recordType: attr.literal('journalentry', { alias: 'recordType', context: 'ql' }),
  },
});
