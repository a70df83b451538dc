export { config } from './config';
export type { Config, LoggingConfig, FixConfig } from './config';
export { logger, createComponentLogger, flushLogs } from './logger';
export { AnalysisError, AnalysisErrorKind, isAnalysisError, errorMessage } from './errors';
export { getProjectPath, assertProjectPath } from './project-path';
