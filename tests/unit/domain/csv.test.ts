import { describe, it, expect } from 'vitest';
import { escapeCsvField, toCsv } from '../../../src/domain/csv.js';

describe('escapeCsvField', () => {
  it('leaves plain values untouched', () => {
    expect(escapeCsvField('Daman')).toBe('Daman');
    expect(escapeCsvField('')).toBe('');
  });

  it('quotes values with commas, quotes or line breaks', () => {
    expect(escapeCsvField('Smith, John')).toBe('"Smith, John"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('line1\nline2')).toBe('"line1\nline2"');
  });

  it('neutralizes values a spreadsheet would evaluate', () => {
    expect(escapeCsvField('=SUM(A1:A2)')).toBe("'=SUM(A1:A2)");
    expect(escapeCsvField('+971')).toBe("'+971");
    expect(escapeCsvField('-5')).toBe("'-5");
    expect(escapeCsvField('@cmd')).toBe("'@cmd");
    expect(escapeCsvField('=1,2')).toBe(`"'=1,2"`);
  });
});

describe('toCsv', () => {
  it('writes a header row and CRLF-terminated lines', () => {
    const csv = toCsv(['A', 'B'], [
      ['1', 'x,y'],
      ['2', ''],
    ]);
    expect(csv).toBe('A,B\r\n1,"x,y"\r\n2,\r\n');
  });

  it('writes only the header when there are no rows', () => {
    expect(toCsv(['A', 'B'], [])).toBe('A,B\r\n');
  });
});
