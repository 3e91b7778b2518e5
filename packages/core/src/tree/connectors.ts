const CONTINUE = '  |';
const BLANK = '   ';
const INDENT = '  ';

/**
 * One entry per ancestor level: does that ancestor have a later sibling?
 */
export class ConnectorTracker {
  readonly #stack: boolean[] = [];

  push(hasMoreSiblings: boolean): void {
    this.#stack.push(hasMoreSiblings);
  }

  pop(): void {
    if (this.#stack.length === 0) {
      throw new Error('ConnectorTracker.pop() on an empty stack');
    }
    this.#stack.pop();
  }

  /** Copy of the stack, oldest ancestor first */
  snapshot(): readonly boolean[] {
    return [...this.#stack];
  }
}

/**
 * Leading glyphs of a line: a vertical bar for every ancestor that still has
 * siblings to come, blanks for the others, then the node's own indent.
 */
export function renderConnectors(snapshot: readonly boolean[]): string {
  return snapshot.map((more) => (more ? CONTINUE : BLANK)).join('') + INDENT;
}
