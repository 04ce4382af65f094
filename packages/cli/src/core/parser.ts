import type {
  AttributeMatcher,
  AttributeOperator,
  AttributeSelector,
  Combinator,
  CompoundSelector,
  PseudoClassSelector,
  PseudoElementSelector,
  Selector,
  SelectorList,
  SelectorPiece,
  SimpleSelector,
} from './types.js';
import { SelectorParseError } from './errors.js';

/**
 * Pseudo-elements that may still be written with a single colon
 */
export const LEGACY_PSEUDO_ELEMENTS = new Set(['before', 'after', 'first-line', 'first-letter']);

/**
 * Functional pseudo-classes whose argument is a selector list
 */
export const SELECTOR_LIST_PSEUDO_CLASSES = new Set(['not', 'is', 'where', 'has']);

/**
 * Functional pseudo-classes taking an An+B argument
 */
export const NTH_PSEUDO_CLASSES = new Set([
  'nth-child',
  'nth-last-child',
  'nth-of-type',
  'nth-last-of-type',
  'nth-col',
  'nth-last-col',
]);

/**
 * An+B pseudo-classes that accept an `of S` selector list
 */
export const NTH_OF_PSEUDO_CLASSES = new Set(['nth-child', 'nth-last-child']);

/**
 * Deepest allowed nesting of selector lists inside functional pseudo-classes
 */
export const MAX_NESTING_DEPTH = 32;

const AN_PLUS_B = /^(?:odd|even|[+-]?\d+|[+-]?\d*n(?:\s*[+-]\s*\d+)?)$/i;

const COMBINATOR_TEXT: Record<Combinator, string> = {
  descendant: ' ',
  child: ' > ',
  'next-sibling': ' + ',
  'subsequent-sibling': ' ~ ',
  column: ' || ',
};

const ATTRIBUTE_OPERATORS: Record<string, AttributeOperator> = {
  '~=': '~=',
  '|=': '|=',
  '^=': '^=',
  '$=': '$=',
  '*=': '*=',
};

const FRAGMENT_LENGTH = 20;

function isNameStart(ch: string): boolean {
  return /^[a-zA-Z_]$/.test(ch) || (ch !== '' && ch.charCodeAt(0) >= 0x80);
}

function isNameChar(ch: string): boolean {
  return isNameStart(ch) || /^[0-9-]$/.test(ch);
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f';
}

/**
 * Split a selector list on top-level commas. Commas inside parentheses,
 * attribute brackets, strings or escapes do not split.
 */
export function splitSelectorList(raw: string): SelectorPiece[] {
  const pieces: SelectorPiece[] = [];
  let parenDepth = 0;
  let bracketDepth = 0;
  let quote: string | null = null;
  let start = 0;

  const pushPiece = (end: number) => {
    const slice = raw.slice(start, end);
    const leading = slice.length - slice.trimStart().length;
    pieces.push({ text: slice.trim(), offset: start + leading });
  };

  for (let i = 0; i < raw.length; i++) {
    const ch = raw.charAt(i);

    if (ch === '\\') {
      i++;
      continue;
    }

    if (quote) {
      if (ch === quote) quote = null;
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '(') {
      parenDepth++;
    } else if (ch === ')' && parenDepth > 0) {
      parenDepth--;
    } else if (ch === '[') {
      bracketDepth++;
    } else if (ch === ']' && bracketDepth > 0) {
      bracketDepth--;
    } else if (ch === ',' && parenDepth === 0 && bracketDepth === 0) {
      pushPiece(i);
      start = i + 1;
    }
  }

  pushPiece(raw.length);
  return pieces;
}

/**
 * Recursive descent parser for one complex selector
 */
class SelectorParser {
  private pos = 0;
  private readonly input: string;
  /** Offset of `input` inside the text the caller handed in */
  private readonly base: number;
  /** Allow a leading combinator, as in `:has(> img)` */
  private readonly relative: boolean;
  /** Number of functional pseudo-classes enclosing `input` */
  private readonly depth: number;

  constructor(input: string, base: number, relative: boolean, depth: number = 0) {
    this.input = input;
    this.base = base;
    this.relative = relative;
    this.depth = depth;
  }

  parse(): Selector {
    const segments: Selector = [];
    let combinator: Combinator | null = null;
    let combinatorStart = 0;

    this.skipWhitespace();
    if (this.atEnd()) {
      throw this.error('Empty selector');
    }

    const leading = this.readCombinator();
    if (leading) {
      if (!this.relative) {
        throw this.error('Unexpected combinator at start of selector', 0);
      }
      combinator = leading;
      this.skipWhitespace();
    }

    for (;;) {
      const compound = this.parseCompound();

      if (compound.length === 0) {
        if (this.atEnd()) {
          throw this.error('Expected selector after combinator', combinatorStart);
        }
        if (this.peekCombinator()) {
          throw this.error('Unexpected combinator');
        }
        throw this.error(`Unexpected character "${this.peek()}"`);
      }

      segments.push({ combinator, compound });

      const hadWhitespace = this.skipWhitespace();
      if (this.atEnd()) {
        break;
      }

      combinatorStart = this.pos;
      const explicit = this.readCombinator();
      if (explicit) {
        combinator = explicit;
        this.skipWhitespace();
      } else if (hadWhitespace) {
        combinator = 'descendant';
      } else {
        throw this.error(`Unexpected character "${this.peek()}"`);
      }
    }

    return segments;
  }

  private parseCompound(): CompoundSelector {
    const compound: CompoundSelector = [];

    while (!this.atEnd()) {
      const ch = this.peek();

      if (ch === '*' || (ch === '|' && this.peek(1) !== '|') || this.isIdentStart(this.pos)) {
        if (compound.length > 0) {
          throw this.error('Type selector must come first in a compound selector');
        }
        compound.push(this.parseTypeOrUniversal());
      } else if (ch === '.') {
        this.pos++;
        if (!this.isIdentStart(this.pos)) {
          throw this.error('Expected class name', this.pos - 1);
        }
        compound.push({ type: 'class', name: this.readIdentifier() });
      } else if (ch === '#') {
        this.pos++;
        if (!this.isIdentStart(this.pos)) {
          throw this.error('Expected id name', this.pos - 1);
        }
        compound.push({ type: 'id', name: this.readIdentifier() });
      } else if (ch === '[') {
        compound.push(this.parseAttribute());
      } else if (ch === ':') {
        compound.push(this.parsePseudo());
      } else {
        break;
      }
    }

    return compound;
  }

  private parseTypeOrUniversal(): SimpleSelector {
    const start = this.pos;
    let prefix = '';

    if (this.peek() === '*') {
      prefix = '*';
      this.pos++;
    } else if (this.peek() !== '|') {
      prefix = this.readIdentifier();
    }

    let namespace: string | undefined;
    let name = prefix;

    if (this.peek() === '|' && this.peek(1) !== '|') {
      namespace = prefix;
      this.pos++;
      if (this.peek() === '*') {
        name = '*';
        this.pos++;
      } else if (this.isIdentStart(this.pos)) {
        name = this.readIdentifier();
      } else {
        throw this.error('Expected name after namespace prefix', start);
      }
    }

    if (name === '*') {
      return namespace === undefined ? { type: 'universal' } : { type: 'universal', namespace };
    }
    return namespace === undefined ? { type: 'type', name } : { type: 'type', name, namespace };
  }

  private parseAttribute(): AttributeSelector {
    const start = this.pos;
    this.pos++;
    this.skipWhitespace();

    let prefix = '';
    if (this.peek() === '*' && this.peek(1) === '|') {
      prefix = '*';
      this.pos++;
    } else if (this.isIdentStart(this.pos)) {
      prefix = this.readIdentifier();
    }

    let namespace: string | undefined;
    let name = prefix;
    if (this.peek() === '|' && this.peek(1) !== '=') {
      namespace = prefix;
      this.pos++;
      name = this.isIdentStart(this.pos) ? this.readIdentifier() : '';
    }

    if (!name) {
      throw this.error(this.atEnd() ? 'Unclosed attribute selector' : 'Expected attribute name', start);
    }

    const selector: AttributeSelector =
      namespace === undefined ? { type: 'attribute', name } : { type: 'attribute', name, namespace };

    this.skipWhitespace();
    if (this.peek() === ']') {
      this.pos++;
      return selector;
    }
    if (this.atEnd()) {
      throw this.error('Unclosed attribute selector', start);
    }

    const operator = this.readAttributeOperator();
    this.skipWhitespace();

    const matcher: AttributeMatcher = { operator, value: '' };
    const ch = this.peek();
    if (ch === '"' || ch === "'") {
      matcher.value = this.readString();
      matcher.quote = ch === '"' ? '"' : "'";
    } else if (isNameChar(ch) || ch === '\\') {
      matcher.value = this.readName();
    } else {
      throw this.error(this.atEnd() ? 'Unclosed attribute selector' : 'Expected attribute value', this.atEnd() ? start : this.pos);
    }

    this.skipWhitespace();
    const modifier = this.peek().toLowerCase();
    if ((modifier === 'i' || modifier === 's') && (this.peek(1) === ']' || isWhitespace(this.peek(1)))) {
      matcher.modifier = modifier === 'i' ? 'i' : 's';
      this.pos++;
      this.skipWhitespace();
    }

    if (this.peek() !== ']') {
      throw this.error(this.atEnd() ? 'Unclosed attribute selector' : 'Expected "]"', this.atEnd() ? start : this.pos);
    }
    this.pos++;

    selector.matcher = matcher;
    return selector;
  }

  private readAttributeOperator(): AttributeOperator {
    const single = this.peek() === '=' ? '=' : undefined;
    const operator = single ?? ATTRIBUTE_OPERATORS[this.input.slice(this.pos, this.pos + 2)];
    if (!operator) {
      throw this.error('Expected "]" or attribute operator');
    }
    this.pos += operator.length;
    return operator;
  }

  private parsePseudo(): PseudoClassSelector | PseudoElementSelector {
    const start = this.pos;
    this.pos++;
    const isElement = this.peek() === ':';
    if (isElement) {
      this.pos++;
    }

    if (!this.isIdentStart(this.pos)) {
      throw this.error(isElement ? 'Expected pseudo-element name' : 'Expected pseudo-class name', start);
    }
    const name = this.readIdentifier();
    const lower = name.toLowerCase();

    let argument: string | undefined;
    let argumentStart = 0;
    if (this.peek() === '(') {
      const close = this.findClosingParen(this.pos);
      argumentStart = this.pos + 1;
      argument = this.input.slice(argumentStart, close);
      this.pos = close + 1;
    }

    if (isElement || (LEGACY_PSEUDO_ELEMENTS.has(lower) && argument === undefined)) {
      const element: PseudoElementSelector = { type: 'pseudo-element', name };
      if (argument !== undefined) element.argument = argument;
      if (!isElement) element.legacy = true;
      return element;
    }

    const pseudo: PseudoClassSelector = { type: 'pseudo-class', name };
    if (argument === undefined) {
      return pseudo;
    }
    pseudo.argument = argument;

    if (SELECTOR_LIST_PSEUDO_CLASSES.has(lower)) {
      pseudo.args = argument.trim() === '' ? [] : this.parseNestedList(argument, argumentStart, lower === 'has');
    } else if (NTH_PSEUDO_CLASSES.has(lower)) {
      const of = NTH_OF_PSEUDO_CLASSES.has(lower) ? /\s+of(?=\s)/i.exec(argument) : null;
      const anPlusB = of ? argument.slice(0, of.index) : argument;

      if (!AN_PLUS_B.test(anPlusB.trim())) {
        throw this.error(`Invalid An+B expression "${anPlusB.trim()}"`, argumentStart);
      }

      if (of) {
        const listStart = of.index + of[0].length;
        const list = argument.slice(listStart);
        if (list.trim() === '') {
          throw this.error('Expected selector list after "of"', argumentStart + of.index);
        }
        pseudo.args = this.parseNestedList(list, argumentStart + listStart, false);
      }
    }

    return pseudo;
  }

  private parseNestedList(text: string, offset: number, relative: boolean): SelectorList {
    if (this.depth >= MAX_NESTING_DEPTH) {
      throw this.error('Selector nesting too deep', offset);
    }
    return splitSelectorList(text).map((piece) =>
      new SelectorParser(piece.text, this.base + offset + piece.offset, relative, this.depth + 1).parse()
    );
  }

  /**
   * Index of the `)` matching the `(` at `open`, skipping strings and escapes
   */
  private findClosingParen(open: number): number {
    let depth = 0;
    let quote: string | null = null;
    let quoteStart = 0;

    for (let i = open; i < this.input.length; i++) {
      const ch = this.input.charAt(i);

      if (ch === '\\') {
        i++;
        continue;
      }

      if (quote) {
        if (ch === quote) quote = null;
        continue;
      }

      if (ch === '"' || ch === "'") {
        quote = ch;
        quoteStart = i;
      } else if (ch === '(') {
        depth++;
      } else if (ch === ')') {
        depth--;
        if (depth === 0) {
          return i;
        }
      }
    }

    if (quote) {
      throw this.error('Unterminated string', quoteStart);
    }
    throw this.error('Unbalanced parentheses', open);
  }

  private readCombinator(): Combinator | null {
    const ch = this.peek();
    switch (ch) {
      case '>':
        this.pos++;
        return 'child';
      case '+':
        this.pos++;
        return 'next-sibling';
      case '~':
        this.pos++;
        return 'subsequent-sibling';
      case '|':
        if (this.peek(1) === '|') {
          this.pos += 2;
          return 'column';
        }
        return null;
      default:
        return null;
    }
  }

  private peekCombinator(): boolean {
    const ch = this.peek();
    return ch === '>' || ch === '+' || ch === '~' || (ch === '|' && this.peek(1) === '|');
  }

  private readString(): string {
    const start = this.pos;
    const quote = this.peek();
    this.pos++;

    while (!this.atEnd()) {
      const ch = this.peek();
      if (ch === '\\') {
        this.pos += 2;
        continue;
      }
      if (ch === quote) {
        this.pos++;
        return this.input.slice(start + 1, this.pos - 1);
      }
      if (ch === '\n') {
        break;
      }
      this.pos++;
    }

    throw this.error('Unterminated string', start);
  }

  private readIdentifier(): string {
    const start = this.pos;
    while (this.peek() === '-' && this.pos - start < 2) {
      this.pos++;
    }
    this.consumeNameChars();
    return this.input.slice(start, this.pos);
  }

  private readName(): string {
    const start = this.pos;
    this.consumeNameChars();
    return this.input.slice(start, this.pos);
  }

  private consumeNameChars(): void {
    while (!this.atEnd()) {
      const ch = this.peek();
      if (isNameChar(ch)) {
        this.pos++;
      } else if (this.isEscape(this.pos)) {
        this.consumeEscape();
      } else {
        break;
      }
    }
  }

  private consumeEscape(): void {
    this.pos++;
    let hexDigits = 0;
    while (hexDigits < 6 && /^[0-9a-fA-F]$/.test(this.peek())) {
      this.pos++;
      hexDigits++;
    }
    if (hexDigits === 0) {
      this.pos++;
    } else if (isWhitespace(this.peek())) {
      this.pos++;
    }
  }

  private isEscape(at: number): boolean {
    const next = this.input.charAt(at + 1);
    return this.input.charAt(at) === '\\' && next !== '' && next !== '\n';
  }

  private isIdentStart(at: number): boolean {
    const ch = this.input.charAt(at);
    if (isNameStart(ch)) return true;
    if (ch === '\\') return this.isEscape(at);
    if (ch === '-') {
      const next = this.input.charAt(at + 1);
      return isNameStart(next) || next === '-' || this.isEscape(at + 1);
    }
    return false;
  }

  private skipWhitespace(): boolean {
    const start = this.pos;
    while (isWhitespace(this.peek())) {
      this.pos++;
    }
    return this.pos > start;
  }

  private peek(ahead: number = 0): string {
    return this.input.charAt(this.pos + ahead);
  }

  private atEnd(): boolean {
    return this.pos >= this.input.length;
  }

  private error(reason: string, at: number = this.pos): SelectorParseError {
    const fragment =
      at < this.input.length
        ? this.input.slice(at, at + FRAGMENT_LENGTH)
        : this.input.slice(-FRAGMENT_LENGTH);
    return new SelectorParseError(reason, this.base + at, fragment);
  }
}

/**
 * Parse a single complex selector (no top-level commas).
 * `offset` is added to error offsets, for selectors cut out of a larger list.
 * Throws SelectorParseError.
 */
export function parseSelector(text: string, offset: number = 0): Selector {
  return new SelectorParser(text, offset, false).parse();
}

/**
 * Parse a comma-separated selector list, throwing on the first bad selector
 */
export function parseSelectorList(raw: string): SelectorList {
  return splitSelectorList(raw).map((piece) => parseSelector(piece.text, piece.offset));
}

/**
 * Serialize a simple selector back to selector text
 */
export function serializeSimpleSelector(simple: SimpleSelector): string {
  switch (simple.type) {
    case 'type':
      return simple.namespace === undefined ? simple.name : `${simple.namespace}|${simple.name}`;
    case 'universal':
      return simple.namespace === undefined ? '*' : `${simple.namespace}|*`;
    case 'id':
      return `#${simple.name}`;
    case 'class':
      return `.${simple.name}`;
    case 'attribute': {
      const name = simple.namespace === undefined ? simple.name : `${simple.namespace}|${simple.name}`;
      if (!simple.matcher) {
        return `[${name}]`;
      }
      const { operator, value, quote, modifier } = simple.matcher;
      const quoted = quote ? `${quote}${value}${quote}` : value;
      return `[${name}${operator}${quoted}${modifier ? ` ${modifier}` : ''}]`;
    }
    case 'pseudo-class':
      if (simple.args && SELECTOR_LIST_PSEUDO_CLASSES.has(simple.name.toLowerCase())) {
        return `:${simple.name}(${serializeSelectorList(simple.args)})`;
      }
      return simple.argument === undefined
        ? `:${simple.name}`
        : `:${simple.name}(${simple.argument.trim()})`;
    case 'pseudo-element': {
      const colons = simple.legacy ? ':' : '::';
      return simple.argument === undefined
        ? `${colons}${simple.name}`
        : `${colons}${simple.name}(${simple.argument.trim()})`;
    }
  }
}

/**
 * Serialize a complex selector with single spaces around combinators
 */
export function serializeSelector(selector: Selector): string {
  return selector
    .map((segment, index) => {
      const compound = segment.compound.map(serializeSimpleSelector).join('');
      if (segment.combinator === null) {
        return compound;
      }
      const combinator = COMBINATOR_TEXT[segment.combinator];
      return index === 0 ? `${combinator.trimStart()}${compound}` : `${combinator}${compound}`;
    })
    .join('');
}

export function serializeSelectorList(list: SelectorList): string {
  return list.map(serializeSelector).join(', ');
}
