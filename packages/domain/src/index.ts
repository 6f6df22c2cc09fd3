export * from './decimal.js';
export * from './order.js';
export * from './deal.js';
