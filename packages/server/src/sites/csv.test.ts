import { describe, it, expect } from 'vitest';
import { parseCsv } from './csv.js';

describe('parseCsv', () => {
  it('splits plain rows', () => {
    expect(parseCsv('a,b,c\n1,2,3\n')).toEqual([['a', 'b', 'c'], ['1', '2', '3']]);
  });

  it('keeps the last row without a trailing newline', () => {
    expect(parseCsv('a,b')).toEqual([['a', 'b']]);
  });

  it('handles quotes, escaped quotes and CRLF', () => {
    expect(parseCsv('a,"b,c",d\r\n"x ""y""",\n')).toEqual([['a', 'b,c', 'd'], ['x "y"', '']]);
  });

  it('keeps newlines inside quoted fields', () => {
    expect(parseCsv('"line1\nline2",z')).toEqual([['line1\nline2', 'z']]);
  });

  it('returns no rows for empty input', () => {
    expect(parseCsv('')).toEqual([]);
  });
});
