import { attr } from '../entity/attributes.js';
import { defineEntity } from '../entity/entity.js';

export const Department = defineEntity({
  name: 'Department',
  attributes: {
    id: attr.string(),
    name: attr.string(),
    fullName: attr.string({ alias: 'fullName' }),
  },
});
