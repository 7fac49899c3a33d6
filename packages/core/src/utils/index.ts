export * from './values.js';
export * from './keys.js';
export * from './filter.js';
export * from './records.js';
export * from './aggregate.js';
