import { DeclarationKind } from '../base';

export const GO_EXTENSION = '.go';
export const GO_TEST_FILE_SUFFIX = '_test.go';

/**
 * Node types that correspond to an identifier token. Predeclared `iota`,
 * `nil`, `true` and `false` have their own node types in the grammar but are
 * ordinary identifiers to the language.
 */
export const IDENTIFIER_NODE_TYPES: ReadonlySet<string> = new Set([
  'identifier',
  'type_identifier',
  'field_identifier',
  'package_identifier',
  'label_name',
  'blank_identifier',
  'iota',
  'nil',
  'true',
  'false',
]);

/** Function-like top-level declarations and the kind they produce */
export const FUNCTION_DECLARATION_KINDS: Readonly<Record<string, DeclarationKind>> = {
  function_declaration: 'function',
  method_declaration: 'method',
};

export const TYPE_DECLARATION = 'type_declaration';
export const TYPE_SPEC_TYPES: ReadonlySet<string> = new Set(['type_spec', 'type_alias']);

/** Value declarations and the spec node type each one groups */
export const VALUE_DECLARATION_SPECS: Readonly<Record<string, { spec: string; kind: DeclarationKind }>> = {
  const_declaration: { spec: 'const_spec', kind: 'const' },
  var_declaration: { spec: 'var_spec', kind: 'var' },
};

export const PACKAGE_CLAUSE = 'package_clause';
export const IMPORT_DECLARATION = 'import_declaration';
export const COMMENT = 'comment';

/** Root children allowed after the package clause and imports */
export const TOP_LEVEL_DECLARATION_TYPES: ReadonlySet<string> = new Set([
  'function_declaration',
  'method_declaration',
  'type_declaration',
  'const_declaration',
  'var_declaration',
]);
