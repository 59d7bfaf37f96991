export * from './location.js';
export * from './sites.js';
export * from './grid.js';
export * from './api.js';
