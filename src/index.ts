export * from './parsers';
export * from './registry';
export * from './report';
export * from './fix';
export { runAnalysis } from './cli/run';
export type { RunIO, RunOutcome, Progress } from './cli/run';
export { parseCliOptions, parseIgnoreList } from './cli/options';
export type { CliOptions } from './cli/options';
export { AnalysisError, AnalysisErrorKind, isAnalysisError } from './utils/errors';
