import fs from 'fs/promises';
import { ParsedDeclaration } from '../parsers/base';
import { GoParser } from '../parsers/go';
import { AnalysisError, AnalysisErrorKind } from '../utils/errors';
import { createComponentLogger } from '../utils/logger';
import { assertProjectPath } from '../utils/project-path';
import { FileDiscoveryService } from './file-discovery-service';
import { Declaration, PhaseStats, ScanPhase } from './types';

const logger = createComponentLogger('registry');

export interface RegistryDependencies {
  parser?: GoParser;
  discovery?: FileDiscoveryService;
}

/**
 * Declaration/usage registry for one analysis run.
 *
 * Usage is counted by bare name across the whole tree with no scoping, so this
 * is an approximation: an exported `Close` is considered used if anything
 * anywhere spells `Close`. Declarations are keyed by bare name as well; when
 * two files export the same name, the one visited last (lexical walk order)
 * wins.
 */
export class Registry {
  readonly path: string;
  readonly declarations = new Map<string, Declaration>();
  readonly usageCount = new Map<string, number>();
  ignore: ReadonlySet<string> = new Set();
  result: Declaration[] = [];
  totalUnusedLoc = 0;
  phaseStats: PhaseStats[] = [];

  private ignoreAttached = false;
  private readonly parser: GoParser;
  private readonly discovery: FileDiscoveryService;

  constructor(projectPath: string, dependencies: RegistryDependencies = {}) {
    assertProjectPath(projectPath);
    this.path = projectPath;
    this.parser = dependencies.parser ?? new GoParser();
    this.discovery = dependencies.discovery ?? new FileDiscoveryService();
  }

  /**
   * Attach the names to leave out of classification. May be called once.
   */
  withIgnoreList(ignore?: Iterable<string>): this {
    if (this.ignoreAttached) {
      throw new AnalysisError(AnalysisErrorKind.INVALID_INPUT, 'ignore list is already set');
    }

    this.ignore = new Set(ignore ?? []);
    this.ignoreAttached = true;
    return this;
  }

  /**
   * Collect declarations and usage, then classify
   */
  async run(): Promise<void> {
    await this.parseFiles();
    this.accumulateResult();
  }

  /**
   * Scan the tree in two phases: production files (declarations and usage),
   * then `_test.go` files (usage only). Only the first phase prunes
   * directories. A parse failure in either phase aborts the scan.
   */
  async parseFiles(): Promise<void> {
    this.declarations.clear();
    this.usageCount.clear();
    this.phaseStats = [];

    logger.info('Scanning project', { path: this.path });

    const sourceFiles = await this.discovery.discoverFiles(
      this.path,
      filePath => this.parser.canParseFile(filePath) && !this.parser.isTestFile(filePath)
    );
    this.phaseStats.push(await this.scanFiles(sourceFiles, 'source'));

    // Test usage counts from everywhere, including vendor, testdata and hidden directories
    const testFiles = await this.discovery.discoverFiles(
      this.path,
      filePath => this.parser.isTestFile(filePath),
      { pruneDirectories: false }
    );
    this.phaseStats.push(await this.scanFiles(testFiles, 'test'));

    logger.info('Scan completed', {
      declarations: this.declarations.size,
      identifiers: this.usageCount.size,
    });
  }

  /**
   * Classify declarations: anything not ignored whose usage count is at most
   * one (the declaring occurrence itself) is unused.
   */
  accumulateResult(): void {
    this.result = [];
    this.totalUnusedLoc = 0;

    for (const [name, declaration] of this.declarations) {
      if (this.ignore.has(name)) {
        continue;
      }

      if (this.getUsageCount(name) <= 1) {
        this.result.push(declaration);
        this.totalUnusedLoc += declaration.lineCount;
      }
    }

    logger.info('Classification completed', {
      unused: this.result.length,
      unusedLines: this.totalUnusedLoc,
      ignored: this.ignore.size,
    });
  }

  getUsageCount(name: string): number {
    return this.usageCount.get(name) ?? 0;
  }

  private async scanFiles(files: string[], phase: ScanPhase): Promise<PhaseStats> {
    const stats: PhaseStats = { phase, filesParsed: 0, identifiersCounted: 0 };

    for (const filePath of files) {
      const content = await fs.readFile(filePath, 'utf-8');
      const parsed = this.parser.parseFile(filePath, content, { identifiersOnly: phase === 'test' });

      if (parsed.errors.length > 0) {
        const [first] = parsed.errors;
        const label = phase === 'test' ? 'test file' : 'file';
        throw new AnalysisError(
          AnalysisErrorKind.PARSE_FAILURE,
          `error parsing ${label} ${filePath}: ${first.line}:${first.column}: ${first.message}`,
          { filePath }
        );
      }

      for (const declaration of parsed.declarations) {
        this.declarations.set(declaration.name, toDeclaration(declaration));
      }

      for (const name of parsed.identifiers) {
        this.usageCount.set(name, this.getUsageCount(name) + 1);
      }

      stats.filesParsed++;
      stats.identifiersCounted += parsed.identifiers.length;
    }

    logger.info('Phase completed', { ...stats });
    return stats;
  }
}

function toDeclaration(parsed: ParsedDeclaration): Declaration {
  return {
    name: parsed.name,
    kind: parsed.kind,
    position: parsed.start,
    end: parsed.end,
    lineCount: parsed.end.line - parsed.start.line + 1,
  };
}
