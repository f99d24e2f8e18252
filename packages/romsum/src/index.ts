export * from './args.js';
export * from './format.js';
export * from './read-file.js';
export * from './run.js';
