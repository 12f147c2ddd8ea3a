import type { Atom, Bond } from 'types';
import { BondType } from 'types';

/**
 * Order-independent key for the atom pair of a bond
 */
export function bondKey(a1: number, a2: number): string {
  const [min, max] = a1 < a2 ? [a1, a2] : [a2, a1];
  return `${min}-${max}`;
}

export function getBondsForAtom(bonds: readonly Bond[], atomId: number): Bond[] {
  return bonds.filter(b => b.atom1 === atomId || b.atom2 === atomId);
}

/**
 * Bond order used for valence accounting; aromatic bonds count 1.5
 */
export function bondOrder(type: BondType): number {
  switch (type) {
    case BondType.SINGLE:
      return 1;
    case BondType.DOUBLE:
      return 2;
    case BondType.TRIPLE:
      return 3;
    case BondType.QUADRUPLE:
      return 4;
    case BondType.AROMATIC:
      return 1.5;
  }
}

/**
 * Bond type when no symbol is written between two atoms
 */
export function defaultBondType(a: Atom, b: Atom): BondType {
  return a.aromatic && b.aromatic ? BondType.AROMATIC : BondType.SINGLE;
}
