import { Declaration } from '../registry/types';

export interface Issue {
  symbol: string;
  line: number;
}

export interface FileIssues {
  file: string;
  issues: Issue[];
}

/** What a report needs from a classified registry */
export interface ReportInput {
  result: readonly Declaration[];
  totalUnusedLoc: number;
}
