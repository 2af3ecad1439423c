export * from './database.js';
export * from './roadmap-store.js';
