import { describe, it, expect } from 'vitest';
import { buildAdjacency, getConnectedComponents } from 'src/utils/connected-components';
import { parseSMILES } from 'src/parsers/smiles-parser';
import type { Molecule } from 'types';

function parseOk(smiles: string): Molecule {
  const result = parseSMILES(smiles);
  if (result.error !== null) throw new Error(result.error.message);
  return result.molecule;
}

describe('Connected components', () => {
  it('builds adjacency from bonds', () => {
    expect(buildAdjacency(parseOk('CC(C)O'))).toEqual([[1], [0, 2, 3], [1], [1]]);
  });

  it('splits on dots', () => {
    expect(getConnectedComponents(parseOk('CC.O.[Na+]'))).toEqual([[0, 1], [2], [3]]);
  });

  it('joins components bonded through a ring closure', () => {
    expect(getConnectedComponents(parseOk('C1CC.C1'))).toEqual([[0, 1, 2, 3]]);
  });

  it('orders components by their lowest atom', () => {
    expect(getConnectedComponents(parseOk('C2.O.C2'))).toEqual([[0, 2], [1]]);
  });

  it('has no components for the empty molecule', () => {
    expect(getConnectedComponents(parseOk(''))).toEqual([]);
  });
});
