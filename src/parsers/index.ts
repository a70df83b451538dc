export { BaseParser, LineIndex, formatPosition } from './base';
export type {
  SourcePosition,
  DeclarationKind,
  ParsedDeclaration,
  ParseError,
  ParseResult,
  ParseOptions,
} from './base';
export { GoParser } from './go';
export { isExported } from './go/symbol-extractors';
