import { attr } from '../entity/attributes.js';
import { defineEntity } from '../entity/entity.js';

export const Employee = defineEntity({
  name: 'Employee',
  attributes: {
    id: attr.string(),
    firstName: attr.string({ alias: 'firstName' }),
    lastName: attr.string({ alias: 'lastName' }),
    email: attr.string(),
    location: attr.string(),
  },
});
