export * from './record.js';
export * from './filter.js';
export * from './schema.js';
export * from './aggregate.js';
