import { attr } from '../entity/attributes.js';
import { defineEntity } from '../entity/entity.js';
import { Employee } from './employee.js';

export const Customer = defineEntity({
  name: 'Customer',
  attributes: {
    id: attr.string(),
    companyName: attr.string({ alias: 'companyName' }),
    salesRep: attr.reference(() => Employee, { alias: 'salesRep' }),
  },
});
