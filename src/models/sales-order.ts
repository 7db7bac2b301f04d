import { attr } from '../entity/attributes.js';
import { defineEntity } from '../entity/entity.js';

export const SalesOrder = defineEntity({
  name: 'SalesOrder',
  attributes: {
    id: attr.string(),
    memo: attr.string(),
  },
});
