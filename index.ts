export { parseSMILES, isValidSMILES } from 'src/parsers/smiles-parser';
export { formatParseError, SmilesParseError } from 'src/parsers/parse-error';
export { nextToken, tokenize } from 'src/parsers/smiles-tokenizer';
export type { Token, ChainToken, BracketToken, TokenMode } from 'src/parsers/smiles-tokenizer';
export { getConnectedComponents } from 'src/utils/connected-components';
export { getBondsForAtom, bondOrder } from 'src/utils/bond-utils';
export { calculateValence } from 'src/utils/valence-calculator';
export { computeImplicitHydrogens, getAllowedValences, validateValences } from 'src/validators/valence-validator';
export type { ValenceValidationOptions } from 'src/validators/valence-validator';
export { BondType, StereoType, ChiralClass, ParseErrorKind, ParseErrorCode } from 'types';
export type {
  Atom,
  AtomSymbol,
  Bond,
  Chirality,
  ElementSymbol,
  Molecule,
  ParseError,
  ParseOptions,
  ParseResult,
} from 'types';
