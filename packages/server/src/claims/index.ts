export * from './claims-mapper.js';
