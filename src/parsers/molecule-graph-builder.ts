import type { Atom, Bond, BondType, Molecule } from 'types';
import { ParseErrorCode, StereoType } from 'types';
import { bondKey } from 'src/utils/bond-utils';
import { semanticError } from './parse-error';

/**
 * Append-only molecule builder fed by the SMILES scan.
 * Atom ids are their index in scan order; nothing is ever removed.
 */
export class MoleculeGraphBuilder {
  private atoms: Atom[] = [];
  private bonds: Bond[] = [];
  private bondKeys = new Set<string>();

  /**
   * Id the next added atom must carry
   */
  get nextAtomId(): number {
    return this.atoms.length;
  }

  get bondCount(): number {
    return this.bonds.length;
  }

  /**
   * Add an atom created for `nextAtomId`
   * @returns atom index
   */
  addAtom(atom: Atom): number {
    if (atom.id !== this.atoms.length) {
      throw new Error(`Atom id ${atom.id} is out of sequence, expected ${this.atoms.length}`);
    }
    this.atoms.push(atom);
    return atom.id;
  }

  getAtom(id: number): Atom {
    const atom = this.atoms[id];
    if (!atom) {
      throw new Error(`No atom with id ${id}`);
    }
    return atom;
  }

  hasBond(atom1: number, atom2: number): boolean {
    return this.bondKeys.has(bondKey(atom1, atom2));
  }

  /**
   * Add a bond between two existing atoms. A second bond between the same
   * pair is a semantic error reported at `position`.
   * @returns bond index
   */
  addBond(
    atom1: number,
    atom2: number,
    type: BondType,
    position: number,
    stereo: StereoType = StereoType.NONE,
    ringNumber: number | null = null,
  ): number {
    this.getAtom(atom1);
    this.getAtom(atom2);
    if (this.hasBond(atom1, atom2)) {
      throw semanticError(
        ParseErrorCode.DUPLICATE_BOND,
        `Atoms ${atom1} and ${atom2} are already bonded`,
        position,
      );
    }
    this.bondKeys.add(bondKey(atom1, atom2));
    this.bonds.push({ atom1, atom2, type, stereo, ringNumber });
    return this.bonds.length - 1;
  }

  build(): Molecule {
    return { atoms: this.atoms, bonds: this.bonds };
  }
}
