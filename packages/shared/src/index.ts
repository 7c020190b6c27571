export * from './wmbus.js';
