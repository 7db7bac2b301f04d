export { CreditMemo } from './credit-memo.js';
export { Customer } from './customer.js';
export { CustomerPayment } from './customer-payment.js';
export { Department } from './department.js';
export { Employee } from './employee.js';
export { Invoice } from './invoice.js';
export { JournalEntry } from './journal-entry.js';
export { SalesOrder } from './sales-order.js';
export { Vendor } from './vendor.js';
