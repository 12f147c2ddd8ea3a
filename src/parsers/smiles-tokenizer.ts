import type { AtomSymbol, ElementSymbol } from 'types';
import { BondType, ParseErrorCode, StereoType } from 'types';
import { AROMATIC_BRACKET_SYMBOLS, AROMATIC_ORGANIC_SUBSET } from 'src/constants';
import { capitalizeSymbol, isElementSymbol, isOrganicAtom } from 'src/utils/atom-utils';
import { lexError, semanticError } from './parse-error';

/**
 * 'chain' is everything outside square brackets, 'bracket' is the inside of
 * a bracket atom. The same character can mean different things in each:
 * '-' is a bond in a chain and a charge in a bracket, '12' is two ring
 * numbers in a chain and one number in a bracket.
 */
export type TokenMode = 'chain' | 'bracket';

interface Span {
  start: number;
  end: number; // exclusive
}

export type ChainToken = Span &
  (
    | { type: 'atom'; symbol: AtomSymbol; aromatic: boolean }
    | { type: 'bond'; symbol: string; bondType: BondType; stereo: StereoType }
    | { type: 'ring'; ringNumber: number }
    | { type: 'dot' }
    | { type: 'branch-open' }
    | { type: 'branch-close' }
    | { type: 'bracket-open' }
    | { type: 'bracket-close' }
  );

export type BracketToken = Span &
  (
    | { type: 'number'; value: number; text: string }
    | { type: 'letter'; char: string }
    | { type: 'chirality'; text: '@' | '@@' }
    | { type: 'charge'; sign: 1 | -1; repeat: number; magnitude: number | null }
    | { type: 'class-separator' }
    | { type: 'wildcard' }
    | { type: 'bracket-close' }
    | { type: 'misplaced'; char: string }
  );

export type Token = ChainToken | BracketToken;

const BOND_SYMBOLS: Readonly<Record<string, { bondType: BondType; stereo: StereoType }>> = {
  '-': { bondType: BondType.SINGLE, stereo: StereoType.NONE },
  '=': { bondType: BondType.DOUBLE, stereo: StereoType.NONE },
  '#': { bondType: BondType.TRIPLE, stereo: StereoType.NONE },
  '$': { bondType: BondType.QUADRUPLE, stereo: StereoType.NONE },
  ':': { bondType: BondType.AROMATIC, stereo: StereoType.NONE },
  '/': { bondType: BondType.SINGLE, stereo: StereoType.UP },
  '\\': { bondType: BondType.SINGLE, stereo: StereoType.DOWN },
};

// SMILES characters with no meaning between '[' and ']'
const MISPLACED_IN_BRACKET = new Set(['[', '(', ')', '.', '=', '#', '$', '/', '\\', '%']);

const isDigit = (ch: string) => ch >= '0' && ch <= '9';
const isUpper = (ch: string) => ch >= 'A' && ch <= 'Z';
const isLower = (ch: string) => ch >= 'a' && ch <= 'z';

function describeChar(ch: string): string {
  const code = ch.charCodeAt(0);
  return code >= 0x21 && code <= 0x7e ? `'${ch}'` : `U+${code.toString(16).toUpperCase().padStart(4, '0')}`;
}

function unexpectedCharacter(ch: string, position: number, context: string): never {
  throw lexError(ParseErrorCode.UNEXPECTED_CHARACTER, `Unexpected character ${describeChar(ch)} ${context}`, position);
}

/**
 * Produce the token starting at `position`, or null at end of input.
 * Pure: the result depends only on the three arguments.
 */
export function nextToken(input: string, position: number, mode: 'chain'): ChainToken | null;
export function nextToken(input: string, position: number, mode: 'bracket'): BracketToken | null;
export function nextToken(input: string, position: number, mode: TokenMode): Token | null;
export function nextToken(input: string, position: number, mode: TokenMode): Token | null {
  if (position >= input.length) return null;
  return mode === 'chain' ? nextChainToken(input, position) : nextBracketToken(input, position);
}

function nextChainToken(input: string, i: number): ChainToken {
  const ch = input.charAt(i);

  switch (ch) {
    case '(':
      return { type: 'branch-open', start: i, end: i + 1 };
    case ')':
      return { type: 'branch-close', start: i, end: i + 1 };
    case '.':
      return { type: 'dot', start: i, end: i + 1 };
    case '[':
      return { type: 'bracket-open', start: i, end: i + 1 };
    case ']':
      return { type: 'bracket-close', start: i, end: i + 1 };
    case '*':
      return { type: 'atom', symbol: '*', aromatic: false, start: i, end: i + 1 };
    case '%':
      return lexPercentRingNumber(input, i);
  }

  const bond = BOND_SYMBOLS[ch];
  if (bond) {
    return { type: 'bond', symbol: ch, ...bond, start: i, end: i + 1 };
  }

  if (isDigit(ch)) {
    return { type: 'ring', ringNumber: Number(ch), start: i, end: i + 1 };
  }

  if (isUpper(ch) || isLower(ch)) {
    return lexUnbracketedAtom(input, i);
  }

  if (ch === '+' || ch === '@') {
    unexpectedCharacter(ch, i, 'outside brackets');
  }
  unexpectedCharacter(ch, i, 'in SMILES');
}

function lexPercentRingNumber(input: string, i: number): ChainToken {
  let digits = 0;
  while (digits < 2 && isDigit(input.charAt(i + 1 + digits))) digits++;
  if (digits < 2) {
    throw lexError(
      ParseErrorCode.INCOMPLETE_RING_NUMBER,
      'Incomplete percent-escaped ring number: % must be followed by two digits',
      i,
      i + 1 + digits,
    );
  }
  return { type: 'ring', ringNumber: Number(input.slice(i + 1, i + 3)), start: i, end: i + 3 };
}

function toElementSymbol(text: string, position: number): ElementSymbol {
  if (!isElementSymbol(text)) {
    throw semanticError(ParseErrorCode.INVALID_ELEMENT, `Unrecognized element symbol '${text}'`, position, position + text.length);
  }
  return text;
}

function requiresBrackets(text: string, position: number): never {
  throw semanticError(
    ParseErrorCode.ELEMENT_REQUIRES_BRACKETS,
    `Element '${text}' must be written in brackets, e.g. [${text}]`,
    position,
    position + text.length,
  );
}

/**
 * Outside brackets only the organic subset is allowed, and only Cl and Br are
 * two letters long: 'Sc' is sulfur followed by aromatic carbon.
 */
function lexUnbracketedAtom(input: string, i: number): ChainToken {
  const ch = input.charAt(i);
  const next = input.charAt(i + 1);
  const pair = ch + next;

  if (pair === 'Cl' || pair === 'Br') {
    return { type: 'atom', symbol: toElementSymbol(pair, i), aromatic: false, start: i, end: i + 2 };
  }

  if (isUpper(ch)) {
    const pairIsElement = isLower(next) && isElementSymbol(pair);
    if (isOrganicAtom(ch)) {
      // 'Na', 'Cu', 'Si': a real element the author forgot to bracket
      if (pairIsElement && !AROMATIC_ORGANIC_SUBSET.has(next)) requiresBrackets(pair, i);
      return { type: 'atom', symbol: toElementSymbol(ch, i), aromatic: false, start: i, end: i + 1 };
    }
    if (pairIsElement) requiresBrackets(pair, i);
    if (isElementSymbol(ch)) requiresBrackets(ch, i);
    throw semanticError(ParseErrorCode.INVALID_ELEMENT, `Unrecognized element symbol '${ch}'`, i);
  }

  if (isLower(next) && AROMATIC_BRACKET_SYMBOLS.has(pair)) requiresBrackets(pair, i);
  if (AROMATIC_ORGANIC_SUBSET.has(ch)) {
    return { type: 'atom', symbol: toElementSymbol(capitalizeSymbol(ch), i), aromatic: true, start: i, end: i + 1 };
  }
  throw semanticError(ParseErrorCode.INVALID_ELEMENT, `Unrecognized element symbol '${ch}'`, i);
}

function nextBracketToken(input: string, i: number): BracketToken {
  const ch = input.charAt(i);

  if (ch === ']') return { type: 'bracket-close', start: i, end: i + 1 };
  if (ch === ':') return { type: 'class-separator', start: i, end: i + 1 };
  if (ch === '*') return { type: 'wildcard', start: i, end: i + 1 };
  if (isUpper(ch) || isLower(ch)) return { type: 'letter', char: ch, start: i, end: i + 1 };

  if (ch === '@') {
    return input.charAt(i + 1) === '@'
      ? { type: 'chirality', text: '@@', start: i, end: i + 2 }
      : { type: 'chirality', text: '@', start: i, end: i + 1 };
  }

  if (isDigit(ch)) {
    let j = i;
    while (isDigit(input.charAt(j))) j++;
    const text = input.slice(i, j);
    return { type: 'number', value: Number(text), text, start: i, end: j };
  }

  if (ch === '+' || ch === '-') {
    let j = i;
    while (input.charAt(j) === ch) j++;
    const repeat = j - i;
    const digitsStart = j;
    while (isDigit(input.charAt(j))) j++;
    const magnitude = j > digitsStart ? Number(input.slice(digitsStart, j)) : null;
    return { type: 'charge', sign: ch === '+' ? 1 : -1, repeat, magnitude, start: i, end: j };
  }

  if (MISPLACED_IN_BRACKET.has(ch)) return { type: 'misplaced', char: ch, start: i, end: i + 1 };

  unexpectedCharacter(ch, i, 'in bracket atom');
}

/**
 * Split a whole SMILES string into tokens, switching mode at '[' and ']'.
 * The parser drives nextToken itself; this is for inspection and tests.
 */
export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let mode: TokenMode = 'chain';
  let position = 0;
  let token: Token | null = nextToken(input, position, mode);
  while (token) {
    tokens.push(token);
    if (token.type === 'bracket-open') mode = 'bracket';
    else if (token.type === 'bracket-close') mode = 'chain';
    position = token.end;
    token = nextToken(input, position, mode);
  }
  return tokens;
}
