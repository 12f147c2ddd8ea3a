import type { Molecule } from 'types';

/**
 * Build the adjacency list of a molecule, indexed by atom id
 */
export function buildAdjacency(molecule: Molecule): number[][] {
  const adjacency: number[][] = molecule.atoms.map(() => []);
  for (const bond of molecule.bonds) {
    adjacency[bond.atom1]?.push(bond.atom2);
    adjacency[bond.atom2]?.push(bond.atom1);
  }
  return adjacency;
}

/**
 * Find all connected components of a molecule.
 * @returns one array of atom ids per component, each sorted, components
 * ordered by their lowest atom id
 */
export function getConnectedComponents(molecule: Molecule): number[][] {
  const adjacency = buildAdjacency(molecule);
  const visited = new Set<number>();
  const components: number[][] = [];

  for (const atom of molecule.atoms) {
    if (visited.has(atom.id)) continue;
    const component: number[] = [];
    const stack = [atom.id];
    visited.add(atom.id);
    let nodeId = stack.pop();
    while (nodeId !== undefined) {
      component.push(nodeId);
      for (const neighbor of adjacency[nodeId] ?? []) {
        if (!visited.has(neighbor)) {
          visited.add(neighbor);
          stack.push(neighbor);
        }
      }
      nodeId = stack.pop();
    }
    components.push(component.sort((a, b) => a - b));
  }

  return components;
}
