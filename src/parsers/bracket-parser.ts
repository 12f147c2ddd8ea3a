import type { Atom, AtomSymbol, Chirality } from 'types';
import { ChiralClass, ParseErrorCode } from 'types';
import {
  AROMATIC_BRACKET_SYMBOLS,
  CHIRAL_CLASS_RANGES,
  MAX_ATOM_CLASS,
  MAX_CHARGE,
  MAX_HYDROGEN_COUNT,
  MAX_ISOTOPE,
} from 'src/constants';
import { capitalizeSymbol, createAtom, isElementSymbol } from 'src/utils/atom-utils';
import { nextToken } from './smiles-tokenizer';
import type { BracketToken } from './smiles-tokenizer';
import { semanticError, syntaxError } from './parse-error';
import type { SmilesParseError } from './parse-error';

export interface BracketAtomResult {
  atom: Atom;
  end: number; // index just past ']'
}

const CHIRAL_CLASSES: ReadonlyMap<string, ChiralClass> = new Map<string, ChiralClass>(
  Object.values(ChiralClass).map(c => [c, c]),
);

/**
 * Walks the tokens between '[' and ']'. Tokens are recomputed from the input
 * on demand, so lookahead is just another nextToken call.
 */
class BracketCursor {
  current: BracketToken | null;

  constructor(
    readonly input: string,
    readonly open: number,
  ) {
    this.current = nextToken(input, open + 1, 'bracket');
  }

  advance(): void {
    if (this.current) this.current = nextToken(this.input, this.current.end, 'bracket');
  }

  peek(): BracketToken | null {
    return this.current ? nextToken(this.input, this.current.end, 'bracket') : null;
  }

  text(token: BracketToken): string {
    return this.input.slice(token.start, token.end);
  }

  /**
   * Describe whatever sits where `expected` should have been
   */
  unexpected(token: BracketToken | null, expected: string): SmilesParseError {
    if (!token) {
      return syntaxError(ParseErrorCode.UNCLOSED_BRACKET, "Unclosed '[': no matching ']'", this.open, this.input.length);
    }
    if (token.type === 'misplaced') {
      return syntaxError(ParseErrorCode.MISPLACED_IN_BRACKET, `'${token.char}' is not allowed inside a bracket atom`, token.start);
    }
    return syntaxError(
      ParseErrorCode.BRACKET_FIELD_ORDER,
      `Unexpected '${this.text(token)}' in bracket atom, expected ${expected}`,
      token.start,
      token.end,
    );
  }
}

/**
 * Parse bracket atom notation like [C], [NH4+], [13CH3@TH1:2].
 * `open` is the index of the '['; fields must appear in the order
 * isotope, symbol, chirality, hydrogens, charge, class.
 */
export function parseBracketAtom(input: string, open: number, id: number): BracketAtomResult {
  if (input.indexOf(']', open + 1) === -1) {
    throw syntaxError(ParseErrorCode.UNCLOSED_BRACKET, "Unclosed '[': no matching ']'", open, input.length);
  }
  const cursor = new BracketCursor(input, open);

  // isotope
  let isotope: number | null = null;
  if (cursor.current?.type === 'number') {
    isotope = boundedValue(cursor.current, MAX_ISOTOPE, 'Isotope');
    cursor.advance();
  }

  const { symbol, aromatic } = parseSymbol(cursor);
  const atom = createAtom(symbol, id, open, aromatic, true);
  atom.isotope = isotope;
  atom.chiral = parseChirality(cursor);
  atom.hydrogens = parseHydrogenCount(cursor);
  atom.charge = parseCharge(cursor);
  atom.atomClass = parseAtomClass(cursor);

  const close = cursor.current;
  if (close?.type !== 'bracket-close') {
    throw cursor.unexpected(close, "']'");
  }
  return { atom, end: close.end };
}

function boundedValue(token: Extract<BracketToken, { type: 'number' }>, max: number, field: string): number {
  if (token.value > max) {
    throw semanticError(ParseErrorCode.NUMBER_OUT_OF_RANGE, `${field} ${token.text} is larger than ${max}`, token.start, token.end);
  }
  return token.value;
}

function parseSymbol(cursor: BracketCursor): { symbol: AtomSymbol; aromatic: boolean } {
  const token = cursor.current;
  if (token?.type === 'wildcard') {
    cursor.advance();
    return { symbol: '*', aromatic: false };
  }
  if (token?.type !== 'letter') {
    if (!token || token.type === 'misplaced') throw cursor.unexpected(token, 'an element symbol');
    throw syntaxError(ParseErrorCode.MISSING_BRACKET_ELEMENT, 'Missing element symbol inside brackets', token.start, token.end);
  }

  const next = cursor.peek();
  const second = next?.type === 'letter' && next.char >= 'a' && next.char <= 'z' ? next.char : '';
  const first = token.char;
  const pair = first + second;

  if (isUpperLetter(first)) {
    // longest case-sensitive match: 'Sn' before 'S'
    if (second && isElementSymbol(pair)) {
      cursor.advance();
      cursor.advance();
      return { symbol: pair, aromatic: false };
    }
    if (isElementSymbol(first)) {
      cursor.advance();
      return { symbol: first, aromatic: false };
    }
    throw semanticError(ParseErrorCode.INVALID_ELEMENT, `Unrecognized element symbol '${pair}'`, token.start, token.start + pair.length);
  }

  // lowercase: aromatic
  if (second && AROMATIC_BRACKET_SYMBOLS.has(pair)) {
    const symbol = capitalizeSymbol(pair);
    if (isElementSymbol(symbol)) {
      cursor.advance();
      cursor.advance();
      return { symbol, aromatic: true };
    }
  }
  const candidate = second && isElementSymbol(capitalizeSymbol(pair)) ? pair : first;
  const symbol = capitalizeSymbol(candidate);
  if (AROMATIC_BRACKET_SYMBOLS.has(candidate) && isElementSymbol(symbol)) {
    cursor.advance();
    return { symbol, aromatic: true };
  }
  if (isElementSymbol(symbol)) {
    throw semanticError(
      ParseErrorCode.INVALID_AROMATIC_ELEMENT,
      `Element '${symbol}' cannot be aromatic`,
      token.start,
      token.start + candidate.length,
    );
  }
  throw semanticError(ParseErrorCode.INVALID_ELEMENT, `Unrecognized element symbol '${candidate}'`, token.start, token.start + candidate.length);
}

function parseChirality(cursor: BracketCursor): Chirality | null {
  const token = cursor.current;
  if (token?.type !== 'chirality') return null;
  cursor.advance();
  if (token.text === '@@') return { type: 'clockwise' };

  // extended form: @TH1, @SP3, @OH27
  const first = cursor.current;
  const second = cursor.peek();
  if (first?.type !== 'letter' || second?.type !== 'letter' || !isUpperLetter(first.char) || !isUpperLetter(second.char)) {
    return { type: 'anticlockwise' };
  }

  const tag = first.char + second.char;
  const chiralClass = CHIRAL_CLASSES.get(tag);
  if (!chiralClass) {
    throw semanticError(ParseErrorCode.INVALID_CHIRALITY, `Unrecognized chirality class '@${tag}'`, token.start, second.end);
  }
  cursor.advance();
  cursor.advance();

  const index = cursor.current;
  const [min, max] = CHIRAL_CLASS_RANGES[chiralClass];
  if (index?.type !== 'number') {
    throw semanticError(ParseErrorCode.INVALID_CHIRALITY, `Chirality '@${tag}' needs an index from ${min} to ${max}`, token.start, second.end);
  }
  if (index.value < min || index.value > max) {
    throw semanticError(
      ParseErrorCode.INVALID_CHIRALITY,
      `Chirality index @${tag}${index.text} is out of range ${min}-${max}`,
      token.start,
      index.end,
    );
  }
  cursor.advance();
  return { type: 'extended', chiralClass, index: index.value };
}

function isUpperLetter(ch: string): boolean {
  return ch >= 'A' && ch <= 'Z';
}

function parseHydrogenCount(cursor: BracketCursor): number | null {
  const token = cursor.current;
  if (token?.type !== 'letter' || token.char !== 'H') return null;
  cursor.advance();
  const count = cursor.current;
  if (count?.type === 'number') {
    const value = boundedValue(count, MAX_HYDROGEN_COUNT, 'Hydrogen count');
    cursor.advance();
    return value;
  }
  return 1;
}

function parseCharge(cursor: BracketCursor): number {
  const token = cursor.current;
  if (token?.type !== 'charge') return 0;

  if (token.repeat > 1 && token.magnitude !== null) {
    throw semanticError(
      ParseErrorCode.DUPLICATE_CHARGE,
      `Charge '${cursor.text(token)}' mixes repeated signs with a number`,
      token.start,
      token.end,
    );
  }
  const magnitude = token.magnitude ?? token.repeat;
  const charge = magnitude === 0 ? 0 : token.sign * magnitude;
  if (Math.abs(charge) > MAX_CHARGE) {
    throw semanticError(
      ParseErrorCode.CHARGE_OUT_OF_RANGE,
      `Charge ${charge} is outside the range -${MAX_CHARGE}..+${MAX_CHARGE}`,
      token.start,
      token.end,
    );
  }
  cursor.advance();

  const extra = cursor.current;
  if (extra?.type === 'charge') {
    throw semanticError(ParseErrorCode.DUPLICATE_CHARGE, `Charge specified twice: '${cursor.text(extra)}'`, extra.start, extra.end);
  }
  return charge;
}

function parseAtomClass(cursor: BracketCursor): number | null {
  const token = cursor.current;
  if (token?.type !== 'class-separator') return null;
  cursor.advance();
  const value = cursor.current;
  if (value?.type !== 'number') {
    throw syntaxError(ParseErrorCode.INVALID_CLASS, "Atom class ':' must be followed by digits", token.start, token.end);
  }
  const atomClass = boundedValue(value, MAX_ATOM_CLASS, 'Atom class');
  cursor.advance();
  return atomClass;
}
