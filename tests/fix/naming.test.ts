import { toUnexported } from '../../src/fix/naming';
import { isExported } from '../../src/parsers/go/symbol-extractors';

describe('toUnexported', () => {
  it.each([
    ['MyFunc', 'myFunc'],
    ['HTTPServer', 'httpServer'],
    ['ID', 'id'],
    ['HTTPs', 'https'],
    ['APIURLPath', 'apiurlPath'],
    ['X', 'x'],
    ['XMLHttpRequest', 'xmlHttpRequest'],
    ['MY_CONS', 'mY_CONS'],
    ['Über', 'über'],
    ['HTTP', 'http'],
    ['UserID', 'userID'],
    ['IDGenerator', 'idGenerator'],
    ['AStruct', 'aStruct'],
    ['XMLHTTPRequest', 'xmlhttpRequest'],
    ['Url', 'url'],
    ['İx', 'ix'],
    ['İ', 'i'],
  ])('%s -> %s', (name, expected) => {
    expect(toUnexported(name)).toBe(expected);
  });

  it('should leave names that are already unexported unchanged', () => {
    expect(toUnexported('myFunc')).toBe('myFunc');
    expect(toUnexported('_Private')).toBe('_Private');
    expect(toUnexported('x')).toBe('x');
  });

  it('should leave an empty name unchanged', () => {
    expect(toUnexported('')).toBe('');
  });

  it('should always produce an unexported name of the same length', () => {
    const names = ['A', 'AB', 'ABc', 'AbC', 'ABCdEF', 'IOReader', 'URLs', 'V2Client', 'ÄÖÜ', 'İSTANBUL', 'İx'];

    for (const name of names) {
      const renamed = toUnexported(name);
      expect(isExported(renamed)).toBe(false);
      expect(Array.from(renamed)).toHaveLength(Array.from(name).length);
    }
  });

  it('should lowercase a leading acronym run as a whole', () => {
    const names = ['HTTPServer', 'APIURLPath', 'XMLHTTPRequest', 'XMLHttpRequest', 'IDGenerator', 'APIKey', 'ID'];

    for (const name of names) {
      const renamed = toUnexported(name);
      expect(renamed).not.toMatch(/^\p{Ll}\p{Lu}/u);
      for (const mixedPrefix of ['hTTP', 'aPI', 'xML', 'iD']) {
        expect(renamed.startsWith(mixedPrefix)).toBe(false);
      }
    }
  });
});
