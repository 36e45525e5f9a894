export * from './market.js';
