import { RenameOutcome, RenameTool } from '../../src/fix/rename-tool';
import { SourcePosition, formatPosition } from '../../src/parsers/base';

/**
 * In-process rename tool: records every call and fails the positions it is
 * told to fail
 */
export class FakeRenameTool implements RenameTool {
  readonly name = 'fake-rename';
  readonly installHint = 'Install the fake tool';
  readonly calls: Array<{ position: string; newName: string }> = [];

  constructor(
    private readonly available = true,
    private readonly failures: ReadonlyMap<string, string> = new Map()
  ) {}

  isAvailable(): boolean {
    return this.available;
  }

  rename(position: SourcePosition, newName: string): RenameOutcome {
    const key = formatPosition(position);
    this.calls.push({ position: key, newName });

    const failure = this.failures.get(key);
    return failure === undefined ? { ok: true } : { ok: false, message: failure };
  }
}
