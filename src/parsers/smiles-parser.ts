import type { Atom, Molecule, ParseOptions, ParseResult } from 'types';
import { ParseErrorCode, StereoType } from 'types';
import { createAtom } from 'src/utils/atom-utils';
import { defaultBondType } from 'src/utils/bond-utils';
import { validateValences } from 'src/validators/valence-validator';
import { parseBracketAtom } from './bracket-parser';
import { BranchStack } from './branch-stack';
import { MoleculeGraphBuilder } from './molecule-graph-builder';
import { SmilesParseError, syntaxError } from './parse-error';
import { RingClosureTable, resolveRingBond } from './ring-closure-table';
import type { PendingBond } from './ring-closure-table';
import { nextToken } from './smiles-tokenizer';
import type { ChainToken } from './smiles-tokenizer';

/**
 * Parse a SMILES string into a molecule graph, or the first error found.
 * Nothing is shared between calls; every parse gets its own ring table,
 * branch stack and builder.
 */
export function parseSMILES(smiles: string, options: ParseOptions = {}): ParseResult {
  const verbose = options.verbose ?? Boolean(process.env.VERBOSE);
  try {
    const molecule = new SmilesScan(smiles, verbose).run();
    validateValences(molecule, { strict: options.validateValences ?? true });
    if (verbose) {
      console.log(`[smiles-parser] "${smiles}": ${molecule.atoms.length} atoms, ${molecule.bonds.length} bonds`);
    }
    return { molecule, error: null };
  } catch (e) {
    if (e instanceof SmilesParseError) {
      if (verbose) {
        console.log(`[smiles-parser] "${smiles}" rejected: ${e.message}`);
      }
      return { molecule: null, error: e.detail };
    }
    throw e;
  }
}

export function isValidSMILES(smiles: string, options: ParseOptions = {}): boolean {
  return parseSMILES(smiles, options).error === null;
}

function danglingBond(bond: PendingBond, context: string): SmilesParseError {
  return syntaxError(ParseErrorCode.DANGLING_BOND, `Bond '${bond.symbol}' ${context}`, bond.position);
}

/**
 * Single forward pass over the chain tokens of one SMILES string.
 */
class SmilesScan {
  private readonly builder = new MoleculeGraphBuilder();
  private readonly branches = new BranchStack();
  private readonly rings = new RingClosureTable();

  // atom the next atom bonds to, null at the start of a component
  private current: number | null = null;
  // atom ring numbers attach to; only set directly after an atom
  private ringAnchor: number | null = null;
  private pendingBond: PendingBond | null = null;
  private previous: ChainToken | null = null;

  constructor(
    private readonly smiles: string,
    private readonly verbose: boolean,
  ) {}

  run(): Molecule {
    let token = nextToken(this.smiles, 0, 'chain');
    while (token) {
      const end = this.consume(token);
      this.previous = token;
      token = nextToken(this.smiles, end, 'chain');
    }
    this.finish();
    return this.builder.build();
  }

  /**
   * Handle one token
   * @returns index where the next token starts
   */
  private consume(token: ChainToken): number {
    switch (token.type) {
      case 'atom':
        this.attach(createAtom(token.symbol, this.builder.nextAtomId, token.start, token.aromatic));
        return token.end;

      case 'bracket-open': {
        const bracket = parseBracketAtom(this.smiles, token.start, this.builder.nextAtomId);
        this.attach(bracket.atom);
        return bracket.end;
      }

      case 'bracket-close':
        throw syntaxError(ParseErrorCode.UNEXPECTED_RIGHT_BRACKET, "Unexpected ']' without a matching '['", token.start);

      case 'bond': {
        const bond: PendingBond = { symbol: token.symbol, bondType: token.bondType, stereo: token.stereo, position: token.start };
        if (this.pendingBond) throw danglingBond(this.pendingBond, `is followed by another bond '${bond.symbol}'`);
        if (this.current === null) throw danglingBond(bond, 'has no preceding atom');
        this.pendingBond = bond;
        return token.end;
      }

      case 'ring':
        this.ringBond(token.ringNumber, token);
        return token.end;

      case 'branch-open':
        if (this.pendingBond) throw danglingBond(this.pendingBond, "must be followed by an atom, not '('");
        if (this.current === null || this.previous?.type === 'branch-open') {
          throw syntaxError(ParseErrorCode.BRANCH_WITHOUT_ATOM, "Branch '(' does not follow an atom", token.start);
        }
        this.branches.push(this.current, token.start);
        this.ringAnchor = null;
        return token.end;

      case 'branch-close': {
        if (this.pendingBond) throw danglingBond(this.pendingBond, "must be followed by an atom, not ')'");
        const previous = this.previous;
        if (previous?.type === 'branch-open') {
          throw syntaxError(ParseErrorCode.EMPTY_BRANCH, "Empty branch '()'", previous.start, token.end);
        }
        if (previous?.type === 'dot') {
          throw syntaxError(ParseErrorCode.DANGLING_DOT, "'.' must be followed by an atom", previous.start);
        }
        this.current = this.branches.pop(token.start);
        this.ringAnchor = null;
        return token.end;
      }

      case 'dot':
        if (this.pendingBond) throw danglingBond(this.pendingBond, "must be followed by an atom, not '.'");
        if (this.current === null) {
          throw syntaxError(ParseErrorCode.DANGLING_DOT, "'.' does not follow an atom", token.start);
        }
        this.current = null;
        this.ringAnchor = null;
        return token.end;
    }
  }

  /**
   * Add an atom and bond it to the current atom with the pending bond,
   * or the default one
   */
  private attach(atom: Atom): void {
    this.builder.addAtom(atom);
    if (this.current !== null) {
      const type = this.pendingBond?.bondType ?? defaultBondType(this.builder.getAtom(this.current), atom);
      this.builder.addBond(this.current, atom.id, type, atom.position, this.pendingBond?.stereo ?? StereoType.NONE);
    }
    this.current = atom.id;
    this.ringAnchor = atom.id;
    this.pendingBond = null;
  }

  private ringBond(ringNumber: number, span: { start: number; end: number }): void {
    const anchor = this.ringAnchor;
    if (anchor === null) {
      throw syntaxError(
        ParseErrorCode.RING_WITHOUT_ATOM,
        `Ring-closure number ${ringNumber} does not follow an atom`,
        span.start,
        span.end,
      );
    }

    const opening = this.rings.visit(ringNumber, anchor, this.pendingBond, span.start);
    if (opening) {
      const openingAtom = this.builder.getAtom(opening.atomId);
      const closingAtom = this.builder.getAtom(anchor);
      const { bondType, stereo } = resolveRingBond(opening, this.pendingBond, openingAtom, closingAtom, span);
      this.builder.addBond(opening.atomId, anchor, bondType, span.start, stereo, ringNumber);
      if (this.verbose) {
        console.log(`[smiles-parser] ring ${ringNumber} closed: ${opening.atomId}-${anchor} (${bondType})`);
      }
    }
    this.pendingBond = null;
  }

  private finish(): void {
    if (this.pendingBond) throw danglingBond(this.pendingBond, 'at end of input has no atom to bond to');
    if (this.previous?.type === 'dot') {
      throw syntaxError(ParseErrorCode.DANGLING_DOT, "'.' at end of input must be followed by an atom", this.previous.start);
    }
    this.branches.assertClosed(this.smiles.length);
    this.rings.assertAllClosed(this.smiles.length);
  }
}
