/**
 * Error types raised by the tree builder, the selector parser and the
 * navigation primitives.
 *
 * None of these is recovered from inside the library; callers decide how to
 * present them.
 */

/**
 * Location in HTML input, as reported by the tokenizer.
 * `line` is 1-based, `offset` is the 0-based column within that line.
 */
export interface SourcePosition {
  line: number;
  offset: number;
}

/**
 * Raised when the tree builder meets a bad state: a mismatched or extra end
 * tag, no root element, or a root element that was never closed.
 */
export class TreeBuilderError extends Error {
  constructor(
    public readonly position: SourcePosition,
    public readonly reason: string,
  ) {
    super(`tree builder aborted at ${position.line}:${position.offset}: ${reason}`);
    this.name = 'TreeBuilderError';
  }
}

/**
 * Raised when selector text cannot be parsed.
 */
export class SelectorSyntaxError extends Error {
  constructor(
    public readonly selector: string,
    public readonly cursor: number,
    public readonly reason: string,
  ) {
    super(`selector parser aborted at character ${cursor} of ${JSON.stringify(selector)}: ${reason}`);
    this.name = 'SelectorSyntaxError';
  }
}

/**
 * Raised when a navigation primitive is used against its contract, e.g.
 * `ancestors(root)` with a `root` that is not an ancestor.
 */
export class NavigationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NavigationError';
  }
}
