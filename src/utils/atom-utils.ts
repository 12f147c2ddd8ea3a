import type { Atom, AtomSymbol, ElementSymbol } from 'types';
import { ATOMIC_NUMBERS, ORGANIC_SUBSET } from 'src/constants';

/**
 * Check that a string is a case-correct element symbol ('Si', not 'SI' or 'si')
 */
export function isElementSymbol(symbol: string): symbol is ElementSymbol {
  return Object.hasOwn(ATOMIC_NUMBERS, symbol);
}

/**
 * Check if a symbol may be written outside brackets
 */
export function isOrganicAtom(symbol: string): boolean {
  return ORGANIC_SUBSET.has(symbol);
}

/**
 * Uppercase the first letter: 'se' -> 'Se', 'c' -> 'C'
 */
export function capitalizeSymbol(symbol: string): string {
  return symbol.charAt(0).toUpperCase() + symbol.slice(1);
}

export function getAtomicNumber(symbol: AtomSymbol): number {
  return symbol === '*' ? 0 : (ATOMIC_NUMBERS[symbol] ?? 0);
}

/**
 * Create a new atom with the given properties; everything a bracket can
 * specify starts out unset.
 */
export function createAtom(symbol: AtomSymbol, id: number, position: number, aromatic = false, isBracket = false): Atom {
  return {
    id,
    symbol,
    atomicNumber: getAtomicNumber(symbol),
    aromatic,
    isotope: null,
    chiral: null,
    hydrogens: null,
    charge: 0,
    atomClass: null,
    isBracket,
    position,
    implicitHydrogens: 0,
  };
}
