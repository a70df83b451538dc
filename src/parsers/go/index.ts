// Type definitions and constants
export * from './types';

// AST traversal utilities
export * from './traversal-utils';

// Declaration extraction utilities
export * from './symbol-extractors';

// File-level structure checks
export * from './structure-validator';
