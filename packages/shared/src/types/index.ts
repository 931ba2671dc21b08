export * from './scan.js';
export * from './records.js';
export * from './stats.js';
