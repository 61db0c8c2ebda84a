export * from './transfer.js';
export * from './scrape.js';
