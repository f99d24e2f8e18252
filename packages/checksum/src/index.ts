export * from './accumulator.js';
export * from './checksum.js';
export * from './errors.js';
export * from './mirror.js';
export * from './stream.js';
