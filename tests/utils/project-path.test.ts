import * as path from 'path';
import { assertProjectPath, getProjectPath } from '../../src/utils/project-path';
import { AnalysisErrorKind, isAnalysisError } from '../../src/utils/errors';

describe('getProjectPath', () => {
  const cwd = path.resolve('/work/repo');

  it('should resolve "." to the working directory', () => {
    expect(getProjectPath('.', cwd)).toBe(cwd);
  });

  it('should resolve relative paths against the working directory', () => {
    expect(getProjectPath('svc/api', cwd)).toBe(path.join(cwd, 'svc', 'api'));
    expect(getProjectPath('../other', cwd)).toBe(path.resolve('/work/other'));
  });

  it('should keep absolute paths', () => {
    const absolute = path.resolve('/srv/project');

    expect(getProjectPath(absolute, cwd)).toBe(absolute);
  });

  it('should reject an empty path', () => {
    let caught: unknown;
    try {
      getProjectPath('', cwd);
    } catch (error) {
      caught = error;
    }

    expect(isAnalysisError(caught, AnalysisErrorKind.INVALID_INPUT)).toBe(true);
    expect(caught).toHaveProperty('message', 'no project path provided');
  });
});

describe('assertProjectPath', () => {
  it('should accept an existing directory', () => {
    expect(() => assertProjectPath(__dirname)).not.toThrow();
  });

  it('should reject empty and missing paths', () => {
    const missing = path.join(__dirname, 'no-such-dir');

    expect(() => assertProjectPath('')).toThrow('path cannot be empty');
    expect(() => assertProjectPath(missing)).toThrow(`path does not exist: ${missing}`);
  });
});
