import Parser from 'tree-sitter';
import type winston from 'winston';
import { createComponentLogger } from '../utils/logger';

/**
 * 1-based source position. `column` counts UTF-8 bytes, the unit rename tools
 * are addressed in.
 */
export interface SourcePosition {
  filename: string;
  line: number;
  column: number;
}

export type DeclarationKind = 'function' | 'method' | 'type' | 'const' | 'var';

export interface ParsedDeclaration {
  name: string;
  kind: DeclarationKind;
  start: SourcePosition;
  end: SourcePosition;
}

export interface ParseError {
  message: string;
  line: number;
  column: number;
}

export interface ParseResult {
  /** Exported top-level declarations, in source order */
  declarations: ParsedDeclaration[];
  /** Every identifier occurrence in the file, in source order */
  identifiers: string[];
  errors: ParseError[];
}

export interface ParseOptions {
  /** Skip declaration extraction and only collect identifiers */
  identifiersOnly?: boolean;
}

export function formatPosition(position: SourcePosition): string {
  return `${position.filename}:${position.line}:${position.column}`;
}

/**
 * Abstract base class for language parsers
 */
export abstract class BaseParser {
  protected parser: Parser;
  protected language: string;
  protected logger: winston.Logger;

  constructor(parser: Parser, language: string) {
    this.parser = parser;
    this.language = language;
    this.logger = createComponentLogger(`parser-${language}`);
  }

  /**
   * Parse a file and extract exported declarations and identifier occurrences
   */
  abstract parseFile(filePath: string, content: string, options?: ParseOptions): ParseResult;

  /**
   * Get file extensions that this parser supports
   */
  abstract getSupportedExtensions(): string[];

  /**
   * Check if this parser can handle the given file
   */
  canParseFile(filePath: string): boolean {
    const extension = this.getFileExtension(filePath);
    return this.getSupportedExtensions().includes(extension);
  }

  /**
   * Parse content and return the syntax tree, or null for content tree-sitter
   * cannot take (binary data)
   */
  protected parseContent(content: string): Parser.Tree | null {
    if (this.isBinaryContent(content)) {
      this.logger.warn('Content appears to be binary, skipping parse');
      return null;
    }

    // The default input buffer rejects large strings; size it to the content
    const bufferSize = Math.max(32 * 1024, content.length * 2 + 1);
    return this.parser.parse(content, undefined, { bufferSize });
  }

  /**
   * Collect ERROR and MISSING nodes, in source order. Only called for trees
   * that report an error, so the whole tree is walked.
   */
  protected collectTreeErrors(node: Parser.SyntaxNode, content: LineIndex): ParseError[] {
    const errors: ParseError[] = [];

    const visit = (current: Parser.SyntaxNode): void => {
      if (current.type === 'ERROR' || current.isMissing) {
        const { line, column } = content.positionAt(current.startIndex, current.startPosition.row);
        errors.push({
          message: current.isMissing ? `missing ${current.type}` : 'syntax error',
          line,
          column,
        });
        return;
      }

      // A MISSING token can sit under a node that does not report hasError
      for (const child of current.children) {
        visit(child);
      }
    };

    visit(node);
    return errors;
  }

  /**
   * Get file extension
   */
  protected getFileExtension(filePath: string): string {
    const parts = filePath.split('.');
    return parts.length > 1 ? `.${parts[parts.length - 1]}` : '';
  }

  /**
   * Simple heuristic to detect binary content
   */
  private isBinaryContent(content: string): boolean {
    return content.indexOf('\0') !== -1;
  }
}

/**
 * Maps string offsets to 1-based line and UTF-8 byte columns
 */
export class LineIndex {
  private readonly lineStarts: number[] = [0];

  constructor(readonly content: string) {
    for (let i = 0; i < content.length; i++) {
      if (content.charCodeAt(i) === 10) {
        this.lineStarts.push(i + 1);
      }
    }
  }

  positionAt(offset: number, row: number): { line: number; column: number } {
    const lineStart = this.lineStarts[Math.min(row, this.lineStarts.length - 1)];
    const column = Buffer.byteLength(this.content.slice(lineStart, offset), 'utf8') + 1;
    return { line: row + 1, column };
  }
}
