import { describe, it, expect, vi, afterEach } from 'vitest';
import { parseSMILES, isValidSMILES, formatParseError } from '../index';
import type { ParseError } from '../index';
import { ParseErrorCode, ParseErrorKind } from '../types';

function parseErr(smiles: string): ParseError {
  const result = parseSMILES(smiles);
  if (result.error === null) throw new Error(`expected "${smiles}" to be rejected`);
  return result.error;
}

describe('SMILES Errors', () => {
  describe('Lex errors', () => {
    it('rejects whitespace', () => {
      expect(parseErr('C C')).toEqual({
        kind: ParseErrorKind.LEX,
        code: ParseErrorCode.UNEXPECTED_CHARACTER,
        message: 'Unexpected character U+0020 in SMILES',
        position: 1,
        end: 2,
      });
    });

    it('rejects charge and chirality symbols outside brackets', () => {
      expect(parseErr('C+')).toMatchObject({
        kind: ParseErrorKind.LEX,
        message: "Unexpected character '+' outside brackets",
        position: 1,
      });
      expect(parseErr('C@C')).toMatchObject({ kind: ParseErrorKind.LEX, position: 1 });
    });

    it('rejects a percent sign without two digits', () => {
      expect(parseErr('C%1')).toMatchObject({
        kind: ParseErrorKind.LEX,
        code: ParseErrorCode.INCOMPLETE_RING_NUMBER,
        position: 1,
        end: 3,
      });
      expect(parseErr('C%')).toMatchObject({ code: ParseErrorCode.INCOMPLETE_RING_NUMBER, position: 1, end: 2 });
    });
  });

  describe('Syntax errors', () => {
    it('reports an unclosed branch at end of input', () => {
      expect(parseErr('C(C')).toEqual({
        kind: ParseErrorKind.SYNTAX,
        code: ParseErrorCode.UNCLOSED_BRANCH,
        message: "Unclosed branch: '(' at column 1 has no matching ')'",
        position: 3,
        end: 4,
      });
    });

    it('reports an unmatched close paren', () => {
      expect(parseErr('CC)')).toMatchObject({ code: ParseErrorCode.UNMATCHED_BRANCH_CLOSE, position: 2 });
    });

    it('rejects empty branches', () => {
      expect(parseErr('C()C')).toMatchObject({ code: ParseErrorCode.EMPTY_BRANCH, position: 1, end: 3 });
    });

    it('rejects a branch that does not follow an atom', () => {
      expect(parseErr('(C)')).toMatchObject({ code: ParseErrorCode.BRANCH_WITHOUT_ATOM, position: 0 });
      expect(parseErr('C((C))')).toMatchObject({ code: ParseErrorCode.BRANCH_WITHOUT_ATOM, position: 2 });
    });

    it('rejects dangling bonds', () => {
      expect(parseErr('=C')).toMatchObject({ code: ParseErrorCode.DANGLING_BOND, position: 0 });
      expect(parseErr('C=')).toMatchObject({ code: ParseErrorCode.DANGLING_BOND, position: 1 });
      expect(parseErr('C==C')).toMatchObject({ code: ParseErrorCode.DANGLING_BOND, position: 1 });
      expect(parseErr('C(=)C')).toMatchObject({ code: ParseErrorCode.DANGLING_BOND, position: 2 });
      expect(parseErr('C=.C')).toMatchObject({ code: ParseErrorCode.DANGLING_BOND, position: 1 });
    });

    it('rejects dangling dots', () => {
      expect(parseErr('.C')).toMatchObject({ code: ParseErrorCode.DANGLING_DOT, position: 0 });
      expect(parseErr('C..C')).toMatchObject({ code: ParseErrorCode.DANGLING_DOT, position: 2 });
      expect(parseErr('C.')).toMatchObject({ code: ParseErrorCode.DANGLING_DOT, position: 1 });
      expect(parseErr('C(C.)C')).toMatchObject({ code: ParseErrorCode.DANGLING_DOT, position: 3 });
    });

    it('rejects ring numbers that do not follow an atom', () => {
      expect(parseErr('1CC')).toMatchObject({ code: ParseErrorCode.RING_WITHOUT_ATOM, position: 0, end: 1 });
      expect(parseErr('C(1)')).toMatchObject({ code: ParseErrorCode.RING_WITHOUT_ATOM, position: 2 });
    });

    it('rejects a stray right bracket', () => {
      expect(parseErr('C]')).toMatchObject({
        kind: ParseErrorKind.SYNTAX,
        code: ParseErrorCode.UNEXPECTED_RIGHT_BRACKET,
        position: 1,
      });
    });

    it('reports an unclosed bracket from its opening column', () => {
      expect(parseErr('C[C')).toEqual({
        kind: ParseErrorKind.SYNTAX,
        code: ParseErrorCode.UNCLOSED_BRACKET,
        message: "Unclosed '[': no matching ']'",
        position: 1,
        end: 3,
      });
    });

    it('reports an unclosed bracket even when more atoms follow', () => {
      expect(parseErr('[CC')).toEqual({
        kind: ParseErrorKind.SYNTAX,
        code: ParseErrorCode.UNCLOSED_BRACKET,
        message: "Unclosed '[': no matching ']'",
        position: 0,
        end: 3,
      });
      expect(parseErr('[C(C')).toMatchObject({ code: ParseErrorCode.UNCLOSED_BRACKET, position: 0, end: 4 });
      expect(parseErr('C[NH4+CC')).toMatchObject({ code: ParseErrorCode.UNCLOSED_BRACKET, position: 1, end: 8 });
    });

    it('rejects chain symbols inside brackets', () => {
      expect(parseErr('[C(C)]')).toMatchObject({ code: ParseErrorCode.MISPLACED_IN_BRACKET, position: 2 });
      expect(parseErr('[C=]')).toMatchObject({ code: ParseErrorCode.MISPLACED_IN_BRACKET, position: 2 });
    });

    it('rejects a bracket without an element', () => {
      expect(parseErr('[+]')).toMatchObject({ code: ParseErrorCode.MISSING_BRACKET_ELEMENT, position: 1, end: 2 });
      expect(parseErr('[13]')).toMatchObject({ code: ParseErrorCode.MISSING_BRACKET_ELEMENT, position: 3 });
    });

    it('rejects bracket fields out of order', () => {
      expect(parseErr('[CH3+H]')).toEqual({
        kind: ParseErrorKind.SYNTAX,
        code: ParseErrorCode.BRACKET_FIELD_ORDER,
        message: "Unexpected 'H' in bracket atom, expected ']'",
        position: 5,
        end: 6,
      });
      expect(parseErr('[C+H]')).toMatchObject({ code: ParseErrorCode.BRACKET_FIELD_ORDER, position: 3 });
    });

    it('rejects an atom class without digits', () => {
      expect(parseErr('[C:]')).toMatchObject({
        kind: ParseErrorKind.SYNTAX,
        code: ParseErrorCode.INVALID_CLASS,
        position: 2,
        end: 3,
      });
    });
  });

  describe('Semantic errors', () => {
    it('rejects unknown elements', () => {
      expect(parseErr('[Xx]')).toEqual({
        kind: ParseErrorKind.SEMANTIC,
        code: ParseErrorCode.INVALID_ELEMENT,
        message: "Unrecognized element symbol 'Xx'",
        position: 1,
        end: 3,
      });
      expect(parseErr('CX')).toMatchObject({ code: ParseErrorCode.INVALID_ELEMENT, position: 1 });
      expect(parseErr('Cx')).toMatchObject({ code: ParseErrorCode.INVALID_ELEMENT, position: 1 });
    });

    it('rejects elements that cannot be aromatic', () => {
      expect(parseErr('[f]')).toMatchObject({
        kind: ParseErrorKind.SEMANTIC,
        code: ParseErrorCode.INVALID_AROMATIC_ELEMENT,
        message: "Element 'F' cannot be aromatic",
        position: 1,
        end: 2,
      });
    });

    it('requires brackets around elements outside the organic subset', () => {
      expect(parseErr('Na')).toMatchObject({
        kind: ParseErrorKind.SEMANTIC,
        code: ParseErrorCode.ELEMENT_REQUIRES_BRACKETS,
        message: "Element 'Na' must be written in brackets, e.g. [Na]",
        position: 0,
        end: 2,
      });
      expect(parseErr('CXe')).toMatchObject({ code: ParseErrorCode.ELEMENT_REQUIRES_BRACKETS, position: 1, end: 3 });
      expect(parseErr('U')).toMatchObject({ code: ParseErrorCode.ELEMENT_REQUIRES_BRACKETS, position: 0, end: 1 });
      expect(parseErr('c1cc[se]c1.se')).toMatchObject({ code: ParseErrorCode.ELEMENT_REQUIRES_BRACKETS, position: 11 });
    });

    it('rejects invalid chirality', () => {
      expect(parseErr('[C@TH3](F)(Cl)Br')).toEqual({
        kind: ParseErrorKind.SEMANTIC,
        code: ParseErrorCode.INVALID_CHIRALITY,
        message: 'Chirality index @TH3 is out of range 1-2',
        position: 2,
        end: 6,
      });
      expect(parseErr('[C@XY1]')).toMatchObject({ code: ParseErrorCode.INVALID_CHIRALITY, position: 2, end: 5 });
      expect(parseErr('[C@SP]')).toMatchObject({ code: ParseErrorCode.INVALID_CHIRALITY, position: 2 });
    });

    it('rejects charges given twice', () => {
      expect(parseErr('[C+-]')).toMatchObject({
        code: ParseErrorCode.DUPLICATE_CHARGE,
        message: "Charge specified twice: '-'",
        position: 3,
        end: 4,
      });
      expect(parseErr('[C++2]')).toMatchObject({ code: ParseErrorCode.DUPLICATE_CHARGE, position: 2, end: 5 });
    });

    it('rejects charges beyond fifteen', () => {
      expect(parseErr('[C+16]')).toMatchObject({
        kind: ParseErrorKind.SEMANTIC,
        code: ParseErrorCode.CHARGE_OUT_OF_RANGE,
        message: 'Charge 16 is outside the range -15..+15',
        position: 2,
        end: 5,
      });
      expect(isValidSMILES('[Fe-15]')).toBe(true);
    });

    it('reads a zero charge as neutral', () => {
      const result = parseSMILES('[C-0]');
      expect(result.error).toBeNull();
      expect(Object.is(result.molecule?.atoms[0]?.charge, 0)).toBe(true);
    });

    it('rejects bracket numbers beyond their range', () => {
      expect(parseErr('[123456789012345678901C]')).toEqual({
        kind: ParseErrorKind.SEMANTIC,
        code: ParseErrorCode.NUMBER_OUT_OF_RANGE,
        message: 'Isotope 123456789012345678901 is larger than 65535',
        position: 1,
        end: 22,
      });
      expect(parseErr('[CH256]')).toMatchObject({ code: ParseErrorCode.NUMBER_OUT_OF_RANGE, position: 3, end: 6 });
      expect(parseErr('[C:65536]')).toMatchObject({ code: ParseErrorCode.NUMBER_OUT_OF_RANGE, position: 3, end: 8 });
      expect(isValidSMILES('[65535C:65535]')).toBe(true);
    });

    it('rejects mismatched ring-closure bonds', () => {
      expect(parseErr('C=1CCCCC#1')).toEqual({
        kind: ParseErrorKind.SEMANTIC,
        code: ParseErrorCode.RING_BOND_MISMATCH,
        message: "Ring closure 1 bond mismatch: double ('=') vs triple ('#')",
        position: 8,
        end: 10,
      });
    });

    it('rejects a ring bond from an atom to itself', () => {
      expect(parseErr('C11')).toMatchObject({ code: ParseErrorCode.RING_SELF_BOND, position: 2, end: 3 });
    });

    it('rejects a second bond between the same atoms', () => {
      expect(parseErr('C1C1')).toMatchObject({
        kind: ParseErrorKind.SEMANTIC,
        code: ParseErrorCode.DUPLICATE_BOND,
        message: 'Atoms 0 and 1 are already bonded',
        position: 3,
      });
      expect(parseErr('C12CCCC12')).toMatchObject({ code: ParseErrorCode.DUPLICATE_BOND, position: 8 });
    });

    it('reports an unclosed ring at end of input', () => {
      expect(parseErr('C1CCCCC')).toEqual({
        kind: ParseErrorKind.SEMANTIC,
        code: ParseErrorCode.UNCLOSED_RING,
        message: 'Ring-closure number 1 opened at column 1 is never closed',
        position: 7,
        end: 8,
      });
    });

    it('names the earliest-opened ring when several are open', () => {
      expect(parseErr('C2CC1CC').message).toBe('Ring-closure number 2 opened at column 1 is never closed');
    });

    it('reports exceeded valence at the atom', () => {
      expect(parseErr('CC(C)(C)(C)C')).toEqual({
        kind: ParseErrorKind.SEMANTIC,
        code: ParseErrorCode.VALENCE_EXCEEDED,
        message: 'Valence exceeded: atom C (id: 1) has bond order 5, maximum allowed is 4',
        position: 1,
        end: 2,
      });
      expect(parseErr('O=O=O')).toMatchObject({ code: ParseErrorCode.VALENCE_EXCEEDED, position: 2 });
    });

    it('rejects aromatic carbons with too many bonds', () => {
      expect(parseErr('Cc12ccccc1cccc2')).toEqual({
        kind: ParseErrorKind.SEMANTIC,
        code: ParseErrorCode.VALENCE_EXCEEDED,
        message: 'Valence exceeded: atom C (id: 1) has bond order 5, maximum allowed is 4',
        position: 1,
        end: 2,
      });
      expect(parseErr('Cc1(C)ccccc1')).toMatchObject({ code: ParseErrorCode.VALENCE_EXCEEDED, position: 1 });
    });

    it('skips the valence check when asked to', () => {
      const result = parseSMILES('CC(C)(C)(C)C', { validateValences: false });
      expect(result.error).toBeNull();
      expect(result.molecule?.atoms.map(a => a.implicitHydrogens)).toEqual([3, 0, 3, 3, 3, 3]);
    });
  });

  describe('Error ordering', () => {
    it('reports the first violation in scan order', () => {
      // the lex error at column 4 comes before the unclosed ring
      expect(parseErr('C1CC C').code).toBe(ParseErrorCode.UNEXPECTED_CHARACTER);
      // the structural error comes before any valence problem
      expect(parseErr('C(C)(C)(C)(C)C)').code).toBe(ParseErrorCode.UNMATCHED_BRANCH_CLOSE);
    });
  });

  describe('formatParseError', () => {
    it('underlines the error span', () => {
      const error = parseErr('C=1CCCCC#1');
      expect(formatParseError('C=1CCCCC#1', error)).toBe(
        "C=1CCCCC#1\n        ^^\nsemantic error: Ring closure 1 bond mismatch: double ('=') vs triple ('#')",
      );
    });

    it('puts one caret past the input for end-of-input errors', () => {
      const error = parseErr('C1CCCCC');
      expect(formatParseError('C1CCCCC', error)).toBe(
        'C1CCCCC\n       ^\nsemantic error: Ring-closure number 1 opened at column 1 is never closed',
      );
    });
  });

  describe('Logging', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('traces ring closures and the result when verbose', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      parseSMILES('C1CC1', { verbose: true });
      expect(log).toHaveBeenCalledWith('[smiles-parser] ring 1 closed: 0-2 (single)');
      expect(log).toHaveBeenLastCalledWith('[smiles-parser] "C1CC1": 3 atoms, 3 bonds');
    });

    it('traces rejections when verbose', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      parseSMILES('C(', { verbose: true });
      expect(log).toHaveBeenCalledWith(
        "[smiles-parser] \"C(\" rejected: Unclosed branch: '(' at column 1 has no matching ')' at column 2",
      );
    });

    it('stays quiet otherwise', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      parseSMILES('C1CC1', { verbose: false });
      expect(log).not.toHaveBeenCalled();
    });
  });
});
