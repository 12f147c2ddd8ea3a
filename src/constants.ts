import { ChiralClass } from 'types';
import { invert } from 'es-toolkit';
import elements from 'src/data/elements.json';

// Element symbol -> atomic number, H through Og
export const ATOMIC_NUMBERS: Readonly<Record<string, number>> = elements;

export const ELEMENT_SYMBOLS: Readonly<Record<number, string>> = invert(ATOMIC_NUMBERS);

// Elements that may be written outside brackets
export const ORGANIC_SUBSET: ReadonlySet<string> = new Set(['B', 'C', 'N', 'O', 'P', 'S', 'F', 'Cl', 'Br', 'I']);

// Lowercase (aromatic) forms allowed outside brackets
export const AROMATIC_ORGANIC_SUBSET: ReadonlySet<string> = new Set(['b', 'c', 'n', 'o', 'p', 's']);

// Lowercase forms allowed inside brackets
export const AROMATIC_BRACKET_SYMBOLS: ReadonlySet<string> = new Set(['b', 'c', 'n', 'o', 'p', 's', 'se', 'as']);

/**
 * Default valences of the organic subset (OpenSMILES). Elements missing here
 * get no implicit hydrogens.
 */
export const DEFAULT_VALENCES: Readonly<Record<string, readonly number[]>> = {
  B: [3],
  C: [4],
  N: [3, 5],
  O: [2],
  P: [3, 5],
  S: [2, 4, 6],
  F: [1],
  Cl: [1],
  Br: [1],
  I: [1],
};

// Valences used when the atom is written lowercase
export const AROMATIC_VALENCES: Readonly<Record<string, readonly number[]>> = {
  B: [3],
  C: [4],
  N: [3],
  O: [2],
  P: [3],
  S: [2],
};

export const MAX_CHARGE = 15;

// Largest isotope, hydrogen count and atom class a bracket atom may carry
export const MAX_ISOTOPE = 65535;
export const MAX_HYDROGEN_COUNT = 255;
export const MAX_ATOM_CLASS = 65535;

// Allowed permutation indices per extended chirality class
export const CHIRAL_CLASS_RANGES: Readonly<Record<ChiralClass, readonly [number, number]>> = {
  [ChiralClass.TH]: [1, 2],
  [ChiralClass.AL]: [1, 2],
  [ChiralClass.SP]: [1, 3],
  [ChiralClass.TB]: [1, 20],
  [ChiralClass.OH]: [1, 30],
};
