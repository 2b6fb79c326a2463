export * from './check.js';
export * from './health-client.js';
