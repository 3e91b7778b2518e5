import type { CLIErrorView } from '@yangtree/core';

const TITLE_STYLE = '\u001B[1m\u001B[31m';
const RESET = '\u001B[0m';
const DEFAULT_WIDTH = 80;

/** Greedy word wrap; a word longer than the width gets a line of its own */
function wrap(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = '';
  for (const word of text.split(/\s+/)) {
    if (word === '') continue;
    if (current !== '' && current.length + 1 + word.length > width) {
      lines.push(current);
      current = word;
    } else {
      current = current === '' ? word : `${current} ${word}`;
    }
  }
  if (current !== '') lines.push(current);
  return lines;
}

/**
 * Title first (bold red when colors are on), then location, hint and cause,
 * each wrapped to the terminal width.
 */
export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth > 0 ? view.terminalWidth : DEFAULT_WIDTH;
  const sections: string[] = [];
  if (view.location !== undefined) sections.push(view.location);
  if (view.workaround !== undefined) sections.push(`Hint: ${view.workaround}`);
  if (view.cause !== undefined) sections.push(`Caused by: ${view.cause}`);

  const title = view.colors ? `${TITLE_STYLE}${view.title}${RESET}` : view.title;
  return [title, ...sections.flatMap((section) => wrap(section, width))].join(
    '\n'
  );
}
