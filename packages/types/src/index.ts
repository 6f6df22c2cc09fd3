export * from './order.js';
export * from './deal.js';
export * from './market.js';
export * from './exchange.js';
