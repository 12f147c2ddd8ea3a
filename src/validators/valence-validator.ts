import type { Atom, Bond, Molecule } from 'types';
import { ParseErrorCode } from 'types';
import { AROMATIC_VALENCES, DEFAULT_VALENCES, ELEMENT_SYMBOLS } from 'src/constants';
import { flooredBondOrderSum, sumBondOrders } from 'src/utils/valence-calculator';
import type { BondOrderSum } from 'src/utils/valence-calculator';
import { semanticError } from 'src/parsers/parse-error';
import { maxBy, minBy } from 'es-toolkit';

// Aromatic elements with a lone pair to give to the ring
const LONE_PAIR_DONORS: ReadonlySet<string> = new Set(['N', 'O', 'P', 'S']);

export interface ValenceValidationOptions {
  /** Throw on an atom whose bonds exceed every allowed valence (default true) */
  strict?: boolean;
}

/**
 * Allowed valences for an atom, or null when the element is outside the
 * valence model. A charged atom uses the list of its isoelectronic element
 * ([N+] like C, [O-] like F) when that element is in the model, otherwise
 * every valence shrinks by |charge|.
 */
export function getAllowedValences(atom: Atom): readonly number[] | null {
  if (atom.symbol === '*') return null;
  const base = (atom.aromatic ? AROMATIC_VALENCES[atom.symbol] : undefined) ?? DEFAULT_VALENCES[atom.symbol];
  if (!base) return null;
  if (atom.charge === 0) return base;

  const isoelectronic = ELEMENT_SYMBOLS[atom.atomicNumber - atom.charge];
  const shifted = isoelectronic ? DEFAULT_VALENCES[isoelectronic] : undefined;
  if (shifted) return shifted;
  return base.map(v => v - Math.abs(atom.charge)).filter(v => v >= 0);
}

/**
 * Implicit hydrogen count for one atom: the smallest allowed valence that
 * fits the bond-order sum, minus that sum. Explicit bracket counts and '*'
 * get none.
 */
export function computeImplicitHydrogens(atom: Atom, bonds: readonly Bond[], strict = true): number {
  if (atom.hydrogens !== null) return 0;
  const valences = getAllowedValences(atom);
  if (!valences || valences.length === 0) return 0;

  const orders = sumBondOrders(atom.id, bonds);
  const maxAllowed = maxBy([...valences], v => v) ?? 0;
  let sum = flooredBondOrderSum(orders);
  if (sum > maxAllowed && countsRingBondsAsSingle(atom, orders)) {
    sum = orders.localized + orders.aromaticBonds;
  }

  if (sum > maxAllowed) {
    if (!strict) return 0;
    throw semanticError(
      ParseErrorCode.VALENCE_EXCEEDED,
      `Valence exceeded: atom ${atom.symbol} (id: ${atom.id}) has bond order ${sum}, maximum allowed is ${maxAllowed}`,
      atom.position,
    );
  }

  const target = minBy(valences.filter(v => v >= sum), v => v) ?? maxAllowed;
  return target - sum;
}

/**
 * A ring atom with exactly two aromatic bonds may count them as single when
 * it donates a lone pair (pyrrole n, furan o, thiophene s) or spends its
 * pi electron on an exocyclic double bond (the c of a pyridone c=O).
 * Fused atoms with three ring bonds never qualify.
 */
function countsRingBondsAsSingle(atom: Atom, orders: BondOrderSum): boolean {
  if (orders.aromaticBonds !== 2) return false;
  return LONE_PAIR_DONORS.has(atom.symbol) || orders.doubleBonds > 0;
}

/**
 * Annotate every atom with its implicit hydrogen count. Runs once, after the
 * whole string has been scanned; the structure itself is not touched.
 */
export function validateValences(molecule: Molecule, options: ValenceValidationOptions = {}): void {
  const strict = options.strict ?? true;
  for (const atom of molecule.atoms) {
    atom.implicitHydrogens = computeImplicitHydrogens(atom, molecule.bonds, strict);
  }
}
