import Parser from 'tree-sitter';
import { LineIndex, ParseError } from '../base';
import {
  COMMENT,
  IMPORT_DECLARATION,
  PACKAGE_CLAUSE,
  TOP_LEVEL_DECLARATION_TYPES,
} from './types';

/**
 * Check the file-level shape the grammar does not enforce: a package clause
 * first, then imports, then declarations only. The grammar accepts an empty
 * file, a missing package clause and statements at the top level.
 */
export function validateFileStructure(root: Parser.SyntaxNode, lines: LineIndex): ParseError[] {
  const [first, ...rest] = root.namedChildren.filter(node => node.type !== COMMENT);

  if (!first) {
    return [{ message: "expected 'package', found EOF", line: 1, column: 1 }];
  }

  if (first.type !== PACKAGE_CLAUSE) {
    return [errorAt(first, `expected 'package', found ${first.type}`, lines)];
  }

  const errors: ParseError[] = [];
  let declarationSeen = false;

  for (const node of rest) {
    if (node.type === IMPORT_DECLARATION) {
      if (declarationSeen) {
        errors.push(errorAt(node, 'imports must appear before other declarations', lines));
      }
      continue;
    }

    if (TOP_LEVEL_DECLARATION_TYPES.has(node.type)) {
      declarationSeen = true;
      continue;
    }

    const message =
      node.type === PACKAGE_CLAUSE
        ? 'expected declaration, found package'
        : 'non-declaration statement outside function body';
    errors.push(errorAt(node, message, lines));
  }

  return errors;
}

function errorAt(node: Parser.SyntaxNode, message: string, lines: LineIndex): ParseError {
  return { message, ...lines.positionAt(node.startIndex, node.startPosition.row) };
}
