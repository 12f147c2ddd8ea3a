import type { ParseError } from 'types';
import { ParseErrorCode, ParseErrorKind } from 'types';

/**
 * Thrown by the scan components on the first violation; parseSMILES turns it
 * into the error half of a ParseResult.
 */
export class SmilesParseError extends Error {
  readonly detail: ParseError;

  constructor(kind: ParseErrorKind, code: ParseErrorCode, message: string, position: number, end = position + 1) {
    super(`${message} at column ${position}`);
    this.name = 'SmilesParseError';
    this.detail = { kind, code, message, position, end };
  }
}

export function lexError(code: ParseErrorCode, message: string, position: number, end?: number): SmilesParseError {
  return new SmilesParseError(ParseErrorKind.LEX, code, message, position, end);
}

export function syntaxError(code: ParseErrorCode, message: string, position: number, end?: number): SmilesParseError {
  return new SmilesParseError(ParseErrorKind.SYNTAX, code, message, position, end);
}

export function semanticError(code: ParseErrorCode, message: string, position: number, end?: number): SmilesParseError {
  return new SmilesParseError(ParseErrorKind.SEMANTIC, code, message, position, end);
}

/**
 * Render an error under the input it came from:
 *
 *   C=1CCCCC#1
 *           ^^
 *   semantic error: Ring closure 1 bond mismatch: double ('=') vs triple ('#')
 */
export function formatParseError(smiles: string, error: ParseError): string {
  const start = Math.min(error.position, smiles.length);
  const end = Math.max(Math.min(error.end, smiles.length), start + 1);
  const underline = ' '.repeat(start) + '^'.repeat(end - start);
  return `${smiles}\n${underline}\n${error.kind} error: ${error.message}`;
}
