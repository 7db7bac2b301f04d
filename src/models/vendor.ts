import { attr } from '../entity/attributes.js';
import { defineEntity } from '../entity/entity.js';
import { Department } from './department.js';

export const Vendor = defineEntity({
  name: 'Vendor',
  attributes: {
    id: attr.string(),
    companyName: attr.string({ alias: 'companyName' }),
    // account-specific custom field holding the vendor's department
    department: attr.reference(() => Department, { alias: 'custentityinvdeptvendor' }),
  },
});
