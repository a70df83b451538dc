import * as fs from 'fs';
import * as path from 'path';
import { AnalysisError, AnalysisErrorKind } from './errors';

/**
 * Resolve the project path given on the command line.
 *
 * `.` resolves to the current working directory; anything else is made
 * absolute against it.
 */
export function getProjectPath(cliPath: string, cwd: string = process.cwd()): string {
  if (!cliPath) {
    throw new AnalysisError(AnalysisErrorKind.INVALID_INPUT, 'no project path provided');
  }

  if (cliPath === '.') {
    return cwd;
  }

  return path.resolve(cwd, cliPath);
}

/**
 * Check that a root path is usable for analysis
 *
 * @throws AnalysisError (INVALID_INPUT) when the path is empty or missing
 */
export function assertProjectPath(projectPath: string): void {
  if (!projectPath) {
    throw new AnalysisError(AnalysisErrorKind.INVALID_INPUT, 'path cannot be empty');
  }

  if (!fs.existsSync(projectPath)) {
    throw new AnalysisError(AnalysisErrorKind.INVALID_INPUT, `path does not exist: ${projectPath}`);
  }
}
