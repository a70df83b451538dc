import { DeclarationKind, SourcePosition } from '../parsers/base';

/**
 * One exported top-level name found in the tree
 */
export interface Declaration {
  name: string;
  kind: DeclarationKind;
  /** Position of the declaring identifier */
  position: SourcePosition;
  /** End of the declaring construct */
  end: SourcePosition;
  /** Inclusive line span of the declaration */
  lineCount: number;
}

export type ScanPhase = 'source' | 'test';

export interface PhaseStats {
  phase: ScanPhase;
  filesParsed: number;
  identifiersCounted: number;
}
