import Parser from 'tree-sitter';
import { DeclarationKind, LineIndex, ParsedDeclaration, SourcePosition } from '../base';
import { findSpecNodes, getNodeText, getSpecNameNodes } from './traversal-utils';
import {
  FUNCTION_DECLARATION_KINDS,
  TYPE_DECLARATION,
  TYPE_SPEC_TYPES,
  VALUE_DECLARATION_SPECS,
} from './types';

/**
 * A name is exported when its first character is an uppercase letter
 */
export function isExported(name: string): boolean {
  return /^\p{Lu}/u.test(name);
}

interface ExtractionContext {
  filePath: string;
  lines: LineIndex;
}

/**
 * Extract exported top-level declarations from a source file tree.
 *
 * Only direct children of the root are considered, so declarations inside
 * function bodies never show up here.
 */
export function extractExportedDeclarations(
  root: Parser.SyntaxNode,
  filePath: string,
  lines: LineIndex
): ParsedDeclaration[] {
  const context: ExtractionContext = { filePath, lines };
  const declarations: ParsedDeclaration[] = [];

  for (const node of root.namedChildren) {
    const functionKind = FUNCTION_DECLARATION_KINDS[node.type];
    if (functionKind) {
      processFunction(node, functionKind, context, declarations);
      continue;
    }

    if (node.type === TYPE_DECLARATION) {
      processTypeDeclaration(node, context, declarations);
      continue;
    }

    const valueSpec = VALUE_DECLARATION_SPECS[node.type];
    if (valueSpec) {
      processValueDeclaration(node, valueSpec.spec, valueSpec.kind, context, declarations);
    }
  }

  return declarations;
}

function processFunction(
  node: Parser.SyntaxNode,
  kind: DeclarationKind,
  context: ExtractionContext,
  declarations: ParsedDeclaration[]
): void {
  const nameNode = node.childForFieldName('name');
  if (nameNode) {
    addIfExported(nameNode, node, kind, context, declarations);
  }
}

function processTypeDeclaration(
  node: Parser.SyntaxNode,
  context: ExtractionContext,
  declarations: ParsedDeclaration[]
): void {
  for (const spec of node.namedChildren) {
    if (!TYPE_SPEC_TYPES.has(spec.type)) continue;

    const nameNode = spec.childForFieldName('name');
    if (nameNode) {
      addIfExported(nameNode, spec, 'type', context, declarations);
    }
  }
}

function processValueDeclaration(
  node: Parser.SyntaxNode,
  specType: string,
  kind: DeclarationKind,
  context: ExtractionContext,
  declarations: ParsedDeclaration[]
): void {
  for (const spec of findSpecNodes(node, specType)) {
    // One spec can declare several names; each ends where the spec ends
    for (const nameNode of getSpecNameNodes(spec)) {
      addIfExported(nameNode, spec, kind, context, declarations);
    }
  }
}

function addIfExported(
  nameNode: Parser.SyntaxNode,
  construct: Parser.SyntaxNode,
  kind: DeclarationKind,
  context: ExtractionContext,
  declarations: ParsedDeclaration[]
): void {
  const name = getNodeText(nameNode, context.lines.content);
  if (!isExported(name)) return;

  declarations.push({
    name,
    kind,
    start: toSourcePosition(nameNode.startIndex, nameNode.startPosition.row, context),
    end: toSourcePosition(construct.endIndex, construct.endPosition.row, context),
  });
}

function toSourcePosition(offset: number, row: number, context: ExtractionContext): SourcePosition {
  return {
    filename: context.filePath,
    ...context.lines.positionAt(offset, row),
  };
}
