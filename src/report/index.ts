export * from './types';
export * from './sorting';
export * from './formatter';
