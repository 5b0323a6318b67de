export * from './tutorial.js';
export * from './chat.js';
export * from './export.js';
export * from './health.js';
