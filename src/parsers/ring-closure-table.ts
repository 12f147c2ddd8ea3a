import type { Atom } from 'types';
import { BondType, ParseErrorCode, StereoType } from 'types';
import { defaultBondType } from 'src/utils/bond-utils';
import { semanticError } from './parse-error';

/**
 * A bond symbol that has been read but not yet attached to an atom
 */
export interface PendingBond {
  symbol: string; // as written: '-', '=', '/', ...
  bondType: BondType;
  stereo: StereoType;
  position: number;
}

export interface RingOpening {
  ringNumber: number;
  atomId: number;
  bond: PendingBond | null; // symbol written before the opening digit
  position: number; // column of the opening digit (or '%')
}

/**
 * Ring numbers that are open at the current point of the scan. A number is
 * open at most once and can be reused after it closes. One table per parse.
 */
export class RingClosureTable {
  private readonly open = new Map<number, RingOpening>();

  get size(): number {
    return this.open.size;
  }

  openRingNumbers(): number[] {
    return [...this.open.keys()];
  }

  /**
   * Record ring number `ringNumber` on `atomId`.
   * @returns null when this opens the ring, the opening record when it closes it
   */
  visit(ringNumber: number, atomId: number, bond: PendingBond | null, position: number): RingOpening | null {
    const opening = this.open.get(ringNumber);
    if (opening) {
      this.open.delete(ringNumber);
      return opening;
    }
    this.open.set(ringNumber, { ringNumber, atomId, bond, position });
    return null;
  }

  /**
   * Fails on the earliest-opened ring that never closed
   */
  assertAllClosed(endOfInput: number): void {
    const [opening] = this.open.values();
    if (!opening) return;
    throw semanticError(
      ParseErrorCode.UNCLOSED_RING,
      `Ring-closure number ${opening.ringNumber} opened at column ${opening.position} is never closed`,
      endOfInput,
    );
  }
}

export interface RingBond {
  bondType: BondType;
  stereo: StereoType;
}

/**
 * Decide the bond that closes a ring. Symbols written at both ends must
 * agree; one written symbol wins over none; with none, the usual
 * aromatic/single default applies.
 */
export function resolveRingBond(
  opening: RingOpening,
  closingBond: PendingBond | null,
  openingAtom: Atom,
  closingAtom: Atom,
  span: { start: number; end: number },
): RingBond {
  if (openingAtom.id === closingAtom.id) {
    throw semanticError(
      ParseErrorCode.RING_SELF_BOND,
      `Ring-closure number ${opening.ringNumber} would bond atom ${closingAtom.id} to itself`,
      span.start,
      span.end,
    );
  }

  const open = opening.bond;
  if (open && closingBond && open.bondType !== closingBond.bondType) {
    throw semanticError(
      ParseErrorCode.RING_BOND_MISMATCH,
      `Ring closure ${opening.ringNumber} bond mismatch: ${open.bondType} ('${open.symbol}') vs ${closingBond.bondType} ('${closingBond.symbol}')`,
      closingBond.position,
      span.end,
    );
  }

  const written = open ?? closingBond;
  if (!written) {
    return { bondType: defaultBondType(openingAtom, closingAtom), stereo: StereoType.NONE };
  }
  const stereo = open && open.stereo !== StereoType.NONE ? open.stereo : (closingBond?.stereo ?? StereoType.NONE);
  return { bondType: written.bondType, stereo };
}
