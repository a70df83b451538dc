import { formatPosition } from '../parsers/base';
import { Declaration } from '../registry/types';
import { compareStrings, sortByLineCount } from './sorting';
import { FileIssues, Issue, ReportInput } from './types';

export const REPORT_HEADER = 'Unused Exported Symbols (ignoring test-only usage):';
export const REPORT_DIVIDER = '='.repeat(56);
export const NO_FINDINGS_MESSAGE = 'No unused exported identifiers found!';

/**
 * Formats classification results as plain text or as JSON grouped by file
 */
export class ReportFormatter {
  /**
   * Plain-text report lines, smallest declarations first
   */
  formatText(input: ReportInput): string[] {
    if (input.result.length === 0) {
      return [NO_FINDINGS_MESSAGE];
    }

    const lines = [REPORT_HEADER, REPORT_DIVIDER];

    for (const declaration of sortByLineCount(input.result)) {
      lines.push(this.formatEntry(declaration));
    }

    lines.push(REPORT_DIVIDER);
    lines.push(
      `Total Unused Lines: ${input.totalUnusedLoc}, Declarations: ${input.result.length}`
    );

    return lines;
  }

  /**
   * JSON report: files ascending, issues ascending by line. No findings
   * serializes to `[]`.
   */
  formatJson(input: ReportInput): string {
    return JSON.stringify(this.groupByFile(input.result), null, 2);
  }

  /**
   * Group findings by file path
   */
  groupByFile(declarations: readonly Declaration[]): FileIssues[] {
    const fileMap = new Map<string, Issue[]>();

    for (const declaration of declarations) {
      const filePath = declaration.position.filename;
      const issues = fileMap.get(filePath) ?? [];
      issues.push({ symbol: declaration.name, line: declaration.position.line });
      fileMap.set(filePath, issues);
    }

    const results: FileIssues[] = [];
    for (const [file, issues] of fileMap) {
      issues.sort((a, b) => a.line - b.line);
      results.push({ file, issues });
    }

    // Sort by file path for consistent output
    results.sort((a, b) => compareStrings(a.file, b.file));

    return results;
  }

  private formatEntry(declaration: Declaration): string {
    const span = String(declaration.lineCount).padEnd(5);
    return `${span} ${declaration.name} (${formatPosition(declaration.position)})`;
  }
}
