export * from './naming';
export * from './rename-tool';
export * from './rename-fixer';
