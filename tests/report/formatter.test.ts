import { REPORT_DIVIDER, ReportFormatter } from '../../src/report/formatter';
import { sortByLineCount, sortByLocation } from '../../src/report/sorting';
import { Declaration } from '../../src/registry/types';

function declaration(name: string, filename: string, line: number, column: number, lineCount: number): Declaration {
  const position = { filename, line, column };
  return { name, kind: 'type', position, end: { filename, line: line + lineCount - 1, column: 2 }, lineCount };
}

describe('ReportFormatter', () => {
  let formatter: ReportFormatter;

  const result = [
    declaration('Big', '/p/a.go', 10, 6, 12),
    declaration('Small', '/p/b.go', 2, 7, 1),
    declaration('Mid', '/p/a.go', 3, 6, 4),
    declaration('Tie', '/p/a.go', 30, 6, 1),
  ];

  beforeEach(() => {
    formatter = new ReportFormatter();
  });

  describe('formatText', () => {
    it('should list findings smallest first with a summary', () => {
      expect(formatter.formatText({ result, totalUnusedLoc: 18 })).toEqual([
        'Unused Exported Symbols (ignoring test-only usage):',
        REPORT_DIVIDER,
        '1     Small (/p/b.go:2:7)',
        '1     Tie (/p/a.go:30:6)',
        '4     Mid (/p/a.go:3:6)',
        '12    Big (/p/a.go:10:6)',
        REPORT_DIVIDER,
        'Total Unused Lines: 18, Declarations: 4',
      ]);
    });

    it('should not pad spans of five digits or more', () => {
      const lines = formatter.formatText({
        result: [declaration('Huge', '/p/a.go', 1, 6, 123456)],
        totalUnusedLoc: 123456,
      });

      expect(lines[2]).toBe('123456 Huge (/p/a.go:1:6)');
    });

    it('should print a single message when nothing is unused', () => {
      expect(formatter.formatText({ result: [], totalUnusedLoc: 0 })).toEqual([
        'No unused exported identifiers found!',
      ]);
    });
  });

  describe('formatJson', () => {
    it('should group findings by file in ascending order', () => {
      const parsed: unknown = JSON.parse(formatter.formatJson({ result, totalUnusedLoc: 18 }));

      expect(parsed).toEqual([
        {
          file: '/p/a.go',
          issues: [
            { symbol: 'Mid', line: 3 },
            { symbol: 'Big', line: 10 },
            { symbol: 'Tie', line: 30 },
          ],
        },
        { file: '/p/b.go', issues: [{ symbol: 'Small', line: 2 }] },
      ]);
    });

    it('should indent with two spaces', () => {
      const json = formatter.formatJson({ result: [declaration('Only', '/p/c.go', 5, 6, 1)], totalUnusedLoc: 1 });

      expect(json.split('\n')).toEqual([
        '[',
        '  {',
        '    "file": "/p/c.go",',
        '    "issues": [',
        '      {',
        '        "symbol": "Only",',
        '        "line": 5',
        '      }',
        '    ]',
        '  }',
        ']',
      ]);
    });

    it('should serialize no findings as an empty array', () => {
      expect(formatter.formatJson({ result: [], totalUnusedLoc: 0 })).toBe('[]');
    });
  });
});

describe('sorting', () => {
  const items = [
    declaration('C', '/p/b.go', 1, 6, 2),
    declaration('A', '/p/a.go', 9, 6, 2),
    declaration('B', '/p/a.go', 2, 6, 1),
  ];

  it('should sort by line count keeping input order for ties', () => {
    expect(sortByLineCount(items).map(d => d.name)).toEqual(['B', 'C', 'A']);
  });

  it('should sort by file then line', () => {
    expect(sortByLocation(items).map(d => d.name)).toEqual(['B', 'A', 'C']);
  });

  it('should not reorder the input', () => {
    sortByLineCount(items);
    sortByLocation(items);

    expect(items.map(d => d.name)).toEqual(['C', 'A', 'B']);
  });
});
