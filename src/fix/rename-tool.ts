import { execFileSync } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { SourcePosition, formatPosition } from '../parsers/base';
import { config } from '../utils/config';
import { errorMessage } from '../utils/errors';

export type RenameOutcome = { ok: true } | { ok: false; message: string };

/**
 * An external capability that renames the identifier at a position, updating
 * every reference to it
 */
export interface RenameTool {
  readonly name: string;
  /** Hint shown when the tool cannot be found */
  readonly installHint: string;
  isAvailable(): boolean;
  rename(position: SourcePosition, newName: string): RenameOutcome;
}

/**
 * Locate an executable the way a shell would: used as-is when it contains a
 * path separator, otherwise searched for on PATH
 */
export function findExecutable(command: string, envPath: string = process.env.PATH ?? ''): string | null {
  const candidates = command.includes(path.sep) || command.includes('/')
    ? [command]
    : envPath
        .split(path.delimiter)
        .filter(dir => dir.length > 0)
        .map(dir => path.join(dir, command));

  const extensions = process.platform === 'win32'
    ? (process.env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';')
    : [''];

  for (const candidate of candidates) {
    for (const extension of extensions) {
      const file = candidate + extension;
      try {
        fs.accessSync(file, fs.constants.X_OK);
        if (fs.statSync(file).isFile()) {
          return file;
        }
      } catch {
        // not executable here; try the next candidate
      }
    }
  }

  return null;
}

/**
 * Renames through `gopls rename -w file:line:column newName`
 */
export class GoplsRenameTool implements RenameTool {
  readonly name: string;
  readonly installHint = 'Install with: go install golang.org/x/tools/gopls@latest';

  constructor(private readonly command: string = config.fix.renameTool) {
    this.name = path.basename(command);
  }

  isAvailable(): boolean {
    return findExecutable(this.command) !== null;
  }

  rename(position: SourcePosition, newName: string): RenameOutcome {
    const executable = findExecutable(this.command) ?? this.command;

    try {
      execFileSync(executable, ['rename', '-w', formatPosition(position), newName], {
        stdio: ['ignore', 'pipe', 'pipe'],
        encoding: 'utf-8',
      });
      return { ok: true };
    } catch (error) {
      return { ok: false, message: describeFailure(error) };
    }
  }
}

function describeFailure(error: unknown): string {
  const message = errorMessage(error);
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const stderr = String(error.stderr ?? '').trim();
    if (stderr && !message.includes(stderr)) {
      return `${message}\n  ${stderr}`;
    }
  }
  return message;
}
