import Parser from 'tree-sitter';
import Go from 'tree-sitter-go';
import { BaseParser, LineIndex, ParseOptions, ParseResult } from './base';
import {
  GO_EXTENSION,
  GO_TEST_FILE_SUFFIX,
  collectIdentifiers,
  extractExportedDeclarations,
  validateFileStructure,
} from './go/index';

/**
 * Go parser: exported top-level declarations plus every identifier
 * occurrence, via tree-sitter-go.
 */
export class GoParser extends BaseParser {
  constructor() {
    const parser = new Parser();
    parser.setLanguage(Go);
    super(parser, 'go');
  }

  getSupportedExtensions(): string[] {
    return [GO_EXTENSION];
  }

  isTestFile(filePath: string): boolean {
    return filePath.endsWith(GO_TEST_FILE_SUFFIX);
  }

  parseFile(filePath: string, content: string, options: ParseOptions = {}): ParseResult {
    const tree = this.parseContent(content);
    if (!tree) {
      return {
        declarations: [],
        identifiers: [],
        errors: [{ message: 'content is not valid source text', line: 1, column: 1 }],
      };
    }

    const lines = new LineIndex(content);

    if (tree.rootNode.hasError) {
      const errors = this.collectTreeErrors(tree.rootNode, lines);
      this.logger.debug('Syntax errors found', { filePath, count: errors.length });
      return {
        declarations: [],
        identifiers: [],
        errors: errors.length > 0 ? errors : [{ message: 'syntax error', line: 1, column: 1 }],
      };
    }

    const structureErrors = validateFileStructure(tree.rootNode, lines);
    if (structureErrors.length > 0) {
      this.logger.debug('File structure errors found', { filePath, count: structureErrors.length });
      return { declarations: [], identifiers: [], errors: structureErrors };
    }

    const declarations = options.identifiersOnly
      ? []
      : extractExportedDeclarations(tree.rootNode, filePath, lines);
    const identifiers = collectIdentifiers(tree.rootNode, content);

    this.logger.debug('Parsed file', {
      filePath,
      declarations: declarations.length,
      identifiers: identifiers.length,
    });

    return { declarations, identifiers, errors: [] };
  }
}
