import { ParseErrorCode } from 'types';
import { syntaxError } from './parse-error';

interface BranchPoint {
  atomId: number; // atom the branch hangs off
  position: number; // column of its '('
}

/**
 * Attachment points of the currently open branches, innermost last.
 * Holds atom indices only; the atoms themselves live in the graph builder.
 */
export class BranchStack {
  private readonly points: BranchPoint[] = [];

  get depth(): number {
    return this.points.length;
  }

  push(atomId: number, position: number): void {
    this.points.push({ atomId, position });
  }

  /**
   * Close the innermost branch
   * @returns the atom the branch was attached to, which becomes current again
   */
  pop(position: number): number {
    const point = this.points.pop();
    if (!point) {
      throw syntaxError(ParseErrorCode.UNMATCHED_BRANCH_CLOSE, "Unmatched ')': no branch is open", position);
    }
    return point.atomId;
  }

  assertClosed(endOfInput: number): void {
    const innermost = this.points.at(-1);
    if (innermost) {
      throw syntaxError(
        ParseErrorCode.UNCLOSED_BRANCH,
        `Unclosed branch: '(' at column ${innermost.position} has no matching ')'`,
        endOfInput,
      );
    }
  }
}
