import Parser from 'tree-sitter';
import { IDENTIFIER_NODE_TYPES } from './types';

/**
 * Get text content for a node
 */
export function getNodeText(node: Parser.SyntaxNode, content: string): string {
  return content.slice(node.startIndex, node.endIndex);
}

/**
 * Collect the text of every identifier node under `root`, in source order.
 *
 * No scoping is applied: a field name, a package qualifier and a local
 * variable that share a spelling all count as the same name.
 */
export function collectIdentifiers(root: Parser.SyntaxNode, content: string): string[] {
  const identifiers: string[] = [];
  const stack: Parser.SyntaxNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    if (IDENTIFIER_NODE_TYPES.has(node.type)) {
      identifiers.push(getNodeText(node, content));
      continue;
    }

    // Push in reverse so children are visited left to right
    for (let i = node.namedChildCount - 1; i >= 0; i--) {
      const child = node.namedChild(i);
      if (child) stack.push(child);
    }
  }

  return identifiers;
}

/**
 * Find spec nodes of the given type directly under a declaration, looking
 * through list wrappers of grouped declarations but never into a spec itself
 * (a spec's value may hold function literals with their own declarations).
 */
export function findSpecNodes(declaration: Parser.SyntaxNode, specType: string): Parser.SyntaxNode[] {
  const specs: Parser.SyntaxNode[] = [];

  for (const child of declaration.namedChildren) {
    if (child.type === specType) {
      specs.push(child);
    } else if (child.type.endsWith('_list')) {
      specs.push(...findSpecNodes(child, specType));
    }
  }

  return specs;
}

/**
 * Name nodes declared by a const or var spec
 */
export function getSpecNameNodes(spec: Parser.SyntaxNode): Parser.SyntaxNode[] {
  return spec.namedChildren.filter(child => child.type === 'identifier');
}
