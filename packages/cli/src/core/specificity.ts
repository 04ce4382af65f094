import type { Selector, SelectorList, SimpleSelector, Specificity, SpecificityTuple } from './types.js';
import { InvalidThresholdError } from './errors.js';
import { NTH_OF_PSEUDO_CLASSES, parseSelector } from './parser.js';

/**
 * Pseudo-classes that take the specificity of their most specific argument
 */
export const FORWARDING_PSEUDO_CLASSES = new Set(['not', 'is', 'has', ...NTH_OF_PSEUDO_CLASSES]);

/**
 * Pseudo-classes that never add specificity
 */
export const ZERO_SPECIFICITY_PSEUDO_CLASSES = new Set(['where']);

export const ZERO_SPECIFICITY: Specificity = { inline: 0, ids: 0, classes: 0, elements: 0 };

export function addSpecificity(a: Specificity, b: Specificity): Specificity {
  return {
    inline: a.inline + b.inline,
    ids: a.ids + b.ids,
    classes: a.classes + b.classes,
    elements: a.elements + b.elements,
  };
}

/**
 * Compare two specificities field by field
 * Returns positive if a > b, negative if a < b, 0 if equal
 */
export function compareSpecificity(a: Specificity, b: Specificity): number {
  if (a.inline !== b.inline) return a.inline - b.inline;
  if (a.ids !== b.ids) return a.ids - b.ids;
  if (a.classes !== b.classes) return a.classes - b.classes;
  return a.elements - b.elements;
}

/**
 * True when `specificity` is strictly greater than `threshold`
 */
export function exceedsThreshold(specificity: Specificity, threshold: Specificity): boolean {
  return compareSpecificity(specificity, threshold) > 0;
}

/**
 * Most specific selector of a list, (0,0,0,0) for an empty list
 */
export function maxSpecificity(list: SelectorList): Specificity {
  let max = ZERO_SPECIFICITY;
  for (const selector of list) {
    const specificity = calculateSpecificity(selector);
    if (compareSpecificity(specificity, max) > 0) {
      max = specificity;
    }
  }
  return max;
}

function simpleSpecificity(simple: SimpleSelector): Specificity {
  switch (simple.type) {
    case 'universal':
      return ZERO_SPECIFICITY;
    case 'id':
      return { ...ZERO_SPECIFICITY, ids: 1 };
    case 'class':
    case 'attribute':
      return { ...ZERO_SPECIFICITY, classes: 1 };
    case 'type':
    case 'pseudo-element':
      return { ...ZERO_SPECIFICITY, elements: 1 };
    case 'pseudo-class': {
      const name = simple.name.toLowerCase();
      if (simple.argument !== undefined && ZERO_SPECIFICITY_PSEUDO_CLASSES.has(name)) {
        return ZERO_SPECIFICITY;
      }
      if (simple.args && simple.args.length > 0 && FORWARDING_PSEUDO_CLASSES.has(name)) {
        return maxSpecificity(simple.args);
      }
      return { ...ZERO_SPECIFICITY, classes: 1 };
    }
  }
}

/**
 * Calculate the specificity of a parsed selector.
 * Combinators add nothing; `inline` is always 0 for selector text.
 */
export function calculateSpecificity(selector: Selector): Specificity {
  let total = ZERO_SPECIFICITY;
  for (const segment of selector) {
    for (const simple of segment.compound) {
      total = addSpecificity(total, simpleSpecificity(simple));
    }
  }
  return total;
}

/**
 * Parse a single selector and calculate its specificity.
 * Throws SelectorParseError for malformed selectors.
 */
export function calculateSelectorSpecificity(selector: string): Specificity {
  return calculateSpecificity(parseSelector(selector));
}

/**
 * Format specificity as "a,b,c,d"
 */
export function formatSpecificity(specificity: Specificity): string {
  return specificityToTuple(specificity).join(',');
}

export function specificityToTuple(specificity: Specificity): SpecificityTuple {
  return [specificity.inline, specificity.ids, specificity.classes, specificity.elements];
}

/**
 * Parse a threshold written as "a,b,c,d" or given as a 4-number array.
 * Wrong arity, non-integers and negative values are rejected.
 */
export function parseThreshold(input: string | readonly number[]): Specificity {
  const parts =
    typeof input === 'string'
      ? input.split(',').map((part) => part.trim())
      : input.map((value) => String(value));

  if (parts.length !== 4) {
    throw new InvalidThresholdError(
      `Threshold must have 4 comma-separated values (inline,id,class,type), got ${parts.length}`
    );
  }

  const values = parts.map((part) => {
    if (!/^-?\d+$/.test(part)) {
      throw new InvalidThresholdError(`Threshold value "${part}" is not an integer`);
    }
    const value = parseInt(part, 10);
    if (value < 0) {
      throw new InvalidThresholdError(`Threshold value ${value} must not be negative`);
    }
    return value;
  });

  const [inline = 0, ids = 0, classes = 0, elements = 0] = values;
  return { inline, ids, classes, elements };
}
