import { parseSMILES, formatParseError, getConnectedComponents } from '../../index';

console.log('SMILES Parsing Examples');
console.log('=======================\n');

const inputs = ['CC(=O)Oc1ccccc1C(=O)O', '[Na+].[Cl-]', 'C=1CCCCC#1', 'C1CCCCC'];

for (const smiles of inputs) {
  const result = parseSMILES(smiles);

  if (result.error !== null) {
    console.log(formatParseError(smiles, result.error));
    console.log();
    continue;
  }

  const mol = result.molecule;
  const hydrogens = mol.atoms.reduce((sum, atom) => sum + (atom.hydrogens ?? atom.implicitHydrogens), 0);
  console.log('Input SMILES:', smiles);
  console.log('  atoms      =', mol.atoms.length);
  console.log('  bonds      =', mol.bonds.length);
  console.log('  hydrogens  =', hydrogens);
  console.log('  components =', getConnectedComponents(mol).length);
  console.log();
}
