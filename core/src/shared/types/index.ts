export * from './database.js';
export * from './tenancy.js';
