// Core types for SMILES parsing

export enum BondType {
  SINGLE = 'single',
  DOUBLE = 'double',
  TRIPLE = 'triple',
  QUADRUPLE = 'quadruple',
  AROMATIC = 'aromatic',
}

export enum StereoType {
  NONE = 'none',
  UP = 'up', // /
  DOWN = 'down', // \
}

export enum ChiralClass {
  TH = 'TH', // tetrahedral
  AL = 'AL', // allene-like
  SP = 'SP', // square planar
  TB = 'TB', // trigonal bipyramidal
  OH = 'OH', // octahedral
}

/**
 * Element symbol validated against the periodic table.
 * Only `isElementSymbol` produces one.
 */
export type ElementSymbol = string & { readonly __brand: 'ElementSymbol' };

export type AtomSymbol = ElementSymbol | '*';

export type Chirality =
  | { type: 'anticlockwise' } // @
  | { type: 'clockwise' } // @@
  | { type: 'extended'; chiralClass: ChiralClass; index: number }; // @TH1, @OH12, ...

/**
 * Atom in a molecule.
 * Everything except `implicitHydrogens` is fixed by the scan; the valence
 * validator fills that one in afterwards.
 */
export interface Atom {
  id: number; // index into Molecule.atoms
  symbol: AtomSymbol; // e.g. 'C', 'Cl', 'Se', '*'
  atomicNumber: number; // 0 for '*'
  aromatic: boolean; // written lowercase
  isotope: number | null; // mass number, null if unspecified
  chiral: Chirality | null;
  hydrogens: number | null; // explicit count from brackets, null if unspecified
  charge: number; // formal charge
  atomClass: number | null; // [C:7] -> 7
  isBracket: boolean; // true if parsed from bracket
  position: number; // column of the atom's first character
  implicitHydrogens: number;
}

/**
 * Bond between two atoms, in scan order (atom1 was seen first).
 */
export interface Bond {
  atom1: number; // atom id
  atom2: number; // atom id
  type: BondType;
  stereo: StereoType; // directional single bonds around double bonds
  ringNumber: number | null; // ring-closure number that produced this bond
}

/**
 * Molecule representation. Components may be disjoint when the input has '.'.
 */
export interface Molecule {
  atoms: Atom[];
  bonds: Bond[];
}

export enum ParseErrorKind {
  LEX = 'lex',
  SYNTAX = 'syntax',
  SEMANTIC = 'semantic',
}

export enum ParseErrorCode {
  // lex
  UNEXPECTED_CHARACTER = 'unexpected-character',
  INCOMPLETE_RING_NUMBER = 'incomplete-ring-number',
  // syntax
  UNCLOSED_BRACKET = 'unclosed-bracket',
  UNEXPECTED_RIGHT_BRACKET = 'unexpected-right-bracket',
  MISPLACED_IN_BRACKET = 'misplaced-in-bracket',
  MISSING_BRACKET_ELEMENT = 'missing-bracket-element',
  BRACKET_FIELD_ORDER = 'bracket-field-order',
  INVALID_CLASS = 'invalid-class',
  UNCLOSED_BRANCH = 'unclosed-branch',
  UNMATCHED_BRANCH_CLOSE = 'unmatched-branch-close',
  EMPTY_BRANCH = 'empty-branch',
  BRANCH_WITHOUT_ATOM = 'branch-without-atom',
  DANGLING_BOND = 'dangling-bond',
  DANGLING_DOT = 'dangling-dot',
  RING_WITHOUT_ATOM = 'ring-without-atom',
  // semantic
  INVALID_ELEMENT = 'invalid-element',
  INVALID_AROMATIC_ELEMENT = 'invalid-aromatic-element',
  ELEMENT_REQUIRES_BRACKETS = 'element-requires-brackets',
  INVALID_CHIRALITY = 'invalid-chirality',
  DUPLICATE_CHARGE = 'duplicate-charge',
  CHARGE_OUT_OF_RANGE = 'charge-out-of-range',
  NUMBER_OUT_OF_RANGE = 'number-out-of-range',
  RING_BOND_MISMATCH = 'ring-bond-mismatch',
  RING_SELF_BOND = 'ring-self-bond',
  DUPLICATE_BOND = 'duplicate-bond',
  UNCLOSED_RING = 'unclosed-ring',
  VALENCE_EXCEEDED = 'valence-exceeded',
}

export interface ParseError {
  kind: ParseErrorKind;
  code: ParseErrorCode;
  message: string;
  position: number; // character position in SMILES string (0-based)
  end: number; // exclusive end of the offending span
}

export type ParseResult =
  | { molecule: Molecule; error: null }
  | { molecule: null; error: ParseError };

export interface ParseOptions {
  /** Raise "valence exceeded" errors (default true). Hydrogens are inferred either way. */
  validateValences?: boolean;
  /** Trace the scan to the console (default: the VERBOSE environment variable). */
  verbose?: boolean;
}
