import { RenameFixer, FixSummary } from '../fix/rename-fixer';
import { GoplsRenameTool, RenameTool } from '../fix/rename-tool';
import { Registry } from '../registry/registry';
import { ReportFormatter } from '../report/formatter';
import { getProjectPath } from '../utils/project-path';
import { CliOptions, parseIgnoreList } from './options';

/** The subset of an ora spinner the run reports progress through */
export interface Progress {
  start(text?: string): unknown;
  succeed(text?: string): unknown;
  fail(text?: string): unknown;
}

export interface RunIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  renameTool?: RenameTool;
  progress?: Progress;
  cwd?: string;
}

export interface RunOutcome {
  registry: Registry;
  fixSummary?: FixSummary;
}

/**
 * Scan, classify, then report or fix
 */
export async function runAnalysis(options: CliOptions, io: RunIO): Promise<RunOutcome> {
  const projectPath = getProjectPath(options.path, io.cwd);
  const registry = new Registry(projectPath);

  const ignore = parseIgnoreList(options.ignore);
  if (ignore.length > 0) {
    registry.withIgnoreList(ignore);
  }

  io.progress?.start(`Scanning ${projectPath}`);
  try {
    await registry.run();
  } catch (error) {
    io.progress?.fail('Scan failed');
    throw error;
  }
  io.progress?.succeed(
    `Scanned ${registry.declarations.size} exported declarations, ${registry.result.length} unused`
  );

  if (options.fix) {
    const fixer = new RenameFixer(io.renameTool ?? new GoplsRenameTool(), {
      dryRun: options.dryRun,
      write: io.stdout,
      writeError: io.stderr,
    });
    return { registry, fixSummary: fixer.fix(registry.result) };
  }

  const formatter = new ReportFormatter();
  if (options.json) {
    io.stdout(formatter.formatJson(registry));
  } else {
    formatter.formatText(registry).forEach(line => io.stdout(line));
  }

  return { registry };
}
