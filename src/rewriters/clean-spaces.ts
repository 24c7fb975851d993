import type { Rewriter, State } from "../rewrite/types.ts";
import { isWhiteSpace } from "../unicode/white-space.ts";

const SPACE = 0x20;

/**
 * Collapses runs of white space into a single space and drops white space at the
 * start and end of the input. Handles one code point per segment.
 */
export class CleanSpacesRewriter implements Rewriter {
  private notFirst = false;
  private foundSpace = false;

  rewrite(state: State): void {
    const { codePoint } = state.readRune();
    if (isWhiteSpace(codePoint)) {
      this.foundSpace = true;
      return;
    }
    if (this.foundSpace && this.notFirst && !state.writeRune(SPACE)) return;
    // Flags only change once the whole segment has been written.
    if (!state.writeRune(codePoint)) return;
    this.foundSpace = false;
    this.notFirst = true;
  }

  reset(): void {
    this.notFirst = false;
    this.foundSpace = false;
  }
}
