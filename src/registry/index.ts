export * from './types';
export * from './file-discovery-service';
export * from './registry';
