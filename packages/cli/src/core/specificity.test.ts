import {
  addSpecificity,
  calculateSelectorSpecificity,
  compareSpecificity,
  exceedsThreshold,
  formatSpecificity,
  maxSpecificity,
  parseThreshold,
  specificityToTuple,
} from './specificity.js';
import { parseSelectorList } from './parser.js';
import { InvalidThresholdError } from './errors.js';
import type { Specificity } from './types.js';

const spec = (inline: number, ids: number, classes: number, elements: number): Specificity => ({
  inline,
  ids,
  classes,
  elements,
});

const of = (selector: string): string => formatSpecificity(calculateSelectorSpecificity(selector));

describe('calculateSelectorSpecificity', () => {
  it('counts type selectors as elements', () => {
    expect(of('div')).toBe('0,0,0,1');
    expect(of('html body div ul li')).toBe('0,0,0,5');
  });

  it('counts classes, attributes and pseudo-classes as classes', () => {
    expect(of('.a.b.c')).toBe('0,0,3,0');
    expect(of('[type="text" i]')).toBe('0,0,1,0');
    expect(of('.a[href]:hover')).toBe('0,0,3,0');
  });

  it('counts ids', () => {
    expect(of('#a')).toBe('0,1,0,0');
    expect(of('#a#b')).toBe('0,2,0,0');
  });

  it('counts pseudo-elements as elements', () => {
    expect(of('p::before')).toBe('0,0,0,2');
    expect(of('p:before')).toBe('0,0,0,2');
    expect(of('::selection')).toBe('0,0,0,1');
  });

  it('ignores the universal selector', () => {
    expect(of('*')).toBe('0,0,0,0');
    expect(of('*.a')).toBe('0,0,1,0');
    expect(of('*|*')).toBe('0,0,0,0');
  });

  it('ignores combinators', () => {
    expect(of('a > b')).toBe('0,0,0,2');
    expect(of('a b')).toBe('0,0,0,2');
    expect(of('a + b')).toBe('0,0,0,2');
    expect(of('a ~ b')).toBe('0,0,0,2');
    expect(of('a || b')).toBe('0,0,0,2');
  });

  it('gives :where() zero specificity', () => {
    expect(of(':where(#a.b.c)')).toBe('0,0,0,0');
    expect(of('.a:where(#x, #y #z)')).toBe('0,0,1,0');
  });

  it('takes the most specific argument of :not()', () => {
    expect(of(':not(.a, #b)')).toBe('0,1,0,0');
  });

  it('takes the most specific argument of :is()', () => {
    expect(of(':is(.a.b, .c)')).toBe('0,0,2,0');
  });

  it('takes the most specific argument of :has()', () => {
    expect(of('a:has(> img.icon)')).toBe('0,0,1,2');
  });

  it('forwards through nested pseudo-classes', () => {
    expect(of(':not(:is(.a, #b.c))')).toBe('0,1,1,0');
    expect(of(':is(:where(#a), .b)')).toBe('0,0,1,0');
  });

  it('counts an empty forwarding argument as a pseudo-class', () => {
    expect(of(':is()')).toBe('0,0,1,0');
  });

  it('uses only the "of S" list of :nth-child()', () => {
    expect(of('li:nth-child(2n+1 of .a.b)')).toBe('0,0,2,1');
    expect(of('li:nth-last-child(odd of #x)')).toBe('0,1,0,1');
  });

  it('counts :nth-child() without "of" as a pseudo-class', () => {
    expect(of('li:nth-child(2n+1)')).toBe('0,0,1,1');
  });

  it('counts other functional pseudo-classes once, ignoring the argument', () => {
    expect(of(':lang(en)')).toBe('0,0,1,0');
    expect(of(':host(#x.y)')).toBe('0,0,1,0');
  });

  it('matches pseudo-class names case-insensitively', () => {
    expect(of(':NOT(#a)')).toBe('0,1,0,0');
    expect(of(':Where(#a)')).toBe('0,0,0,0');
  });

  it('never sets the inline field', () => {
    expect(calculateSelectorSpecificity('#a .b c').inline).toBe(0);
  });
});

describe('specificity properties', () => {
  it('counts n classes as (0,0,n,0)', () => {
    for (let n = 1; n <= 6; n++) {
      const selector = Array.from({ length: n }, (_, i) => (i % 2 === 0 ? `.c${i}` : `:hover`)).join('');
      expect(calculateSelectorSpecificity(selector)).toEqual(spec(0, 0, n, 0));
    }
  });

  it('counts n ids as (0,n,0,0)', () => {
    for (let n = 1; n <= 6; n++) {
      const selector = Array.from({ length: n }, (_, i) => `#id${i}`).join(' ');
      expect(calculateSelectorSpecificity(selector)).toEqual(spec(0, n, 0, 0));
    }
  });

  it('counts n types and pseudo-elements as (0,0,0,n)', () => {
    for (let n = 1; n <= 6; n++) {
      const selector = Array.from({ length: n }, () => 'div').join(' > ') + '::after';
      expect(calculateSelectorSpecificity(selector)).toEqual(spec(0, 0, 0, n + 1));
    }
  });
});

describe('compareSpecificity', () => {
  it('orders ids above any number of classes and types', () => {
    expect(compareSpecificity(spec(0, 1, 0, 0), spec(0, 0, 99, 99))).toBeGreaterThan(0);
  });

  it('orders classes above types', () => {
    expect(compareSpecificity(spec(0, 0, 1, 0), spec(0, 0, 0, 99))).toBeGreaterThan(0);
  });

  it('orders inline above everything', () => {
    expect(compareSpecificity(spec(1, 0, 0, 0), spec(0, 99, 99, 99))).toBeGreaterThan(0);
  });

  it('returns 0 for equal values and negative for smaller', () => {
    expect(compareSpecificity(spec(0, 1, 2, 3), spec(0, 1, 2, 3))).toBe(0);
    expect(compareSpecificity(spec(0, 0, 2, 3), spec(0, 1, 0, 0))).toBeLessThan(0);
  });
});

describe('exceedsThreshold', () => {
  const threshold = spec(0, 1, 3, 3);

  it('is strict', () => {
    expect(exceedsThreshold(spec(0, 1, 3, 3), threshold)).toBe(false);
  });

  it('compares lexicographically, not by sum', () => {
    expect(exceedsThreshold(spec(0, 1, 2, 9), threshold)).toBe(false);
    expect(exceedsThreshold(spec(0, 1, 4, 0), threshold)).toBe(true);
    expect(exceedsThreshold(spec(0, 2, 0, 0), threshold)).toBe(true);
  });
});

describe('maxSpecificity', () => {
  it('returns the most specific selector of a list', () => {
    expect(maxSpecificity(parseSelectorList('.a, #b, div div'))).toEqual(spec(0, 1, 0, 0));
  });

  it('returns zero for an empty list', () => {
    expect(maxSpecificity([])).toEqual(spec(0, 0, 0, 0));
  });
});

describe('addSpecificity', () => {
  it('adds field by field', () => {
    expect(addSpecificity(spec(0, 1, 2, 3), spec(1, 1, 1, 1))).toEqual(spec(1, 2, 3, 4));
  });
});

describe('formatSpecificity and specificityToTuple', () => {
  it('formats as a,b,c,d', () => {
    expect(formatSpecificity(spec(0, 1, 2, 3))).toBe('0,1,2,3');
    expect(specificityToTuple(spec(0, 1, 2, 3))).toEqual([0, 1, 2, 3]);
  });
});

describe('parseThreshold', () => {
  it('parses a comma-separated string', () => {
    expect(parseThreshold('0,1,3,3')).toEqual(spec(0, 1, 3, 3));
    expect(parseThreshold(' 0 , 2 , 4 , 4 ')).toEqual(spec(0, 2, 4, 4));
  });

  it('parses an array', () => {
    expect(parseThreshold([0, 0, 2, 2])).toEqual(spec(0, 0, 2, 2));
  });

  it('rejects the wrong number of values', () => {
    expect(() => parseThreshold('0,1,3')).toThrow(InvalidThresholdError);
    expect(() => parseThreshold('0,1,3')).toThrow(
      'Threshold must have 4 comma-separated values (inline,id,class,type), got 3'
    );
    expect(() => parseThreshold([0, 1, 3, 3, 3])).toThrow(InvalidThresholdError);
  });

  it('rejects negative values instead of clamping', () => {
    expect(() => parseThreshold('0,-1,3,3')).toThrow('Threshold value -1 must not be negative');
  });

  it('rejects non-integers', () => {
    expect(() => parseThreshold('0,1.5,3,3')).toThrow('Threshold value "1.5" is not an integer');
    expect(() => parseThreshold('0,a,3,3')).toThrow('Threshold value "a" is not an integer');
    expect(() => parseThreshold('')).toThrow(InvalidThresholdError);
  });
});
