import type { Atom, Bond } from 'types';
import { BondType } from 'types';
import { bondOrder, getBondsForAtom } from 'src/utils/bond-utils';

export interface BondOrderSum {
  aromaticBonds: number; // count of aromatic bonds
  localized: number; // summed order of every other bond
  doubleBonds: number;
}

export function sumBondOrders(atomId: number, bonds: readonly Bond[]): BondOrderSum {
  let aromaticBonds = 0;
  let localized = 0;
  let doubleBonds = 0;
  for (const bond of getBondsForAtom(bonds, atomId)) {
    if (bond.type === BondType.AROMATIC) {
      aromaticBonds++;
    } else {
      localized += bondOrder(bond.type);
      if (bond.type === BondType.DOUBLE) doubleBonds++;
    }
  }
  return { aromaticBonds, localized, doubleBonds };
}

/**
 * Integer bond-order sum with aromatic bonds at 1.5, rounded down:
 * two aromatic bonds give 3, three give 4.
 */
export function flooredBondOrderSum({ aromaticBonds, localized }: Pick<BondOrderSum, 'aromaticBonds' | 'localized'>): number {
  return localized + Math.floor(aromaticBonds * bondOrder(BondType.AROMATIC));
}

/**
 * Calculate the valence of an atom based on its bonds and hydrogens
 * (explicit when bracketed, otherwise the inferred count)
 */
export function calculateValence(atom: Atom, bonds: readonly Bond[]): number {
  return flooredBondOrderSum(sumBondOrders(atom.id, bonds)) + (atom.hydrogens ?? atom.implicitHydrogens);
}
