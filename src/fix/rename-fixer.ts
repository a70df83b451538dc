import { formatPosition } from '../parsers/base';
import { Declaration } from '../registry/types';
import { sortByLocation } from '../report/sorting';
import { AnalysisError, AnalysisErrorKind } from '../utils/errors';
import { createComponentLogger } from '../utils/logger';
import { toUnexported } from './naming';
import { RenameTool } from './rename-tool';

const logger = createComponentLogger('rename-fixer');

export interface FixOptions {
  dryRun?: boolean;
  /** Line sink for progress output; defaults to stdout */
  write?: (line: string) => void;
  /** Line sink for per-item failures; defaults to stderr */
  writeError?: (line: string) => void;
}

export interface FixSummary {
  renamed: number;
  skipped: number;
  failed: number;
  dryRun: boolean;
}

/**
 * Renames unused exported declarations to their unexported form
 */
export class RenameFixer {
  private readonly dryRun: boolean;
  private readonly write: (line: string) => void;
  private readonly writeError: (line: string) => void;

  constructor(private readonly tool: RenameTool, options: FixOptions = {}) {
    this.dryRun = options.dryRun ?? false;
    this.write = options.write ?? (line => console.log(line));
    this.writeError = options.writeError ?? (line => console.error(line));
  }

  /**
   * Rename every declaration, in file then line order. Individual failures
   * are reported and do not stop the remaining renames; the run fails once
   * all of them were attempted.
   */
  fix(declarations: readonly Declaration[]): FixSummary {
    if (!this.tool.isAvailable()) {
      throw new AnalysisError(
        AnalysisErrorKind.MISSING_TOOL,
        `${this.tool.name} not found. ${this.tool.installHint}`
      );
    }

    const summary: FixSummary = { renamed: 0, skipped: 0, failed: 0, dryRun: this.dryRun };

    if (declarations.length === 0) {
      this.write('No unused exported symbols to fix!');
      return summary;
    }

    for (const declaration of sortByLocation(declarations)) {
      const newName = toUnexported(declaration.name);
      const position = formatPosition(declaration.position);

      if (newName === declaration.name) {
        if (this.dryRun) {
          this.write(`⊘ Skip: ${declaration.name} (already unexported) at ${position}`);
        }
        summary.skipped++;
        continue;
      }

      if (this.dryRun) {
        this.write(`→ Would rename: ${declaration.name} -> ${newName} at ${position}`);
        summary.renamed++;
        continue;
      }

      const outcome = this.tool.rename(declaration.position, newName);
      if (!outcome.ok) {
        logger.debug('Rename failed', { name: declaration.name, position, reason: outcome.message });
        this.writeError(`✗ Failed to rename ${declaration.name}: ${outcome.message}`);
        summary.failed++;
        continue;
      }

      this.write(`✓ Renamed: ${declaration.name} -> ${newName}`);
      summary.renamed++;
    }

    this.write('');
    if (this.dryRun) {
      this.write(`Dry-run summary: ${summary.renamed} would be renamed, ${summary.skipped} skipped`);
      return summary;
    }

    this.write(
      `Summary: ${summary.renamed} renamed, ${summary.skipped} skipped, ${summary.failed} failed`
    );

    if (summary.failed > 0) {
      throw new AnalysisError(AnalysisErrorKind.RENAME_FAILURE, 'some renames failed');
    }

    return summary;
  }
}
