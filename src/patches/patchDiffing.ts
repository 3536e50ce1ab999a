import { diffWordsWithSpace } from 'diff';
import chalk from 'chalk';

import { isVerbose, verbose } from '../utils';

const NUM_CONTEXT_CHARS = 40;

// Minified bundles are one enormous line; newlines in a diff hunk would
// otherwise be invisible.
const showNewlines = (text: string, style: (s: string) => string): string =>
  text
    .split('\n')
    .map(line => (line ? style(line) : ''))
    .join(style('\\n') + '\n');

/**
 * Prints a word-level diff of one replacement, with a little context either
 * side. Only outputs under --verbose.
 *
 * @param label - Shown in the header, usually the patched file
 * @param injectedText - Text written at `startIndex` (sizes the new snippet)
 * @param startIndex - Start of the replaced range in the old content
 * @param endIndex - End of the replaced range in the old content
 */
export const showDiff = (
  label: string,
  oldContent: string,
  newContent: string,
  injectedText: string,
  startIndex: number,
  endIndex: number
): void => {
  if (!isVerbose()) {
    return;
  }

  const contextStart = Math.max(0, startIndex - NUM_CONTEXT_CHARS);
  const oldSnippet = oldContent.slice(
    contextStart,
    Math.min(oldContent.length, endIndex + NUM_CONTEXT_CHARS)
  );
  const newSnippet = newContent.slice(
    contextStart,
    Math.min(
      newContent.length,
      startIndex + injectedText.length + NUM_CONTEXT_CHARS
    )
  );

  if (oldSnippet === newSnippet) {
    return;
  }

  let oldOutput = '';
  let newOutput = '';
  for (const part of diffWordsWithSpace(oldSnippet, newSnippet)) {
    if (part.added) {
      newOutput += showNewlines(part.value, s => chalk.bgGreen.black(s));
    } else if (part.removed) {
      oldOutput += showNewlines(part.value, s => chalk.bgRed.white(s));
    } else {
      oldOutput += chalk.dim(part.value);
      newOutput += chalk.dim(part.value);
    }
  }

  verbose(`\n--- Diff (${label}) ---`);
  verbose(chalk.red('OLD: ') + oldOutput);
  verbose(chalk.green('NEW: ') + newOutput);
  verbose('--- End Diff ---\n');
};

/**
 * Replaces matches of `pattern`, last match first so earlier indices stay
 * valid, and shows a diff for each replacement. The replacer's return value
 * is inserted literally, so identifiers containing `$` are safe.
 *
 * @param limit - Replace at most this many matches, counting from the start
 */
export const globalReplace = (
  label: string,
  content: string,
  pattern: RegExp,
  replacer: (match: RegExpExecArray) => string,
  limit = Infinity
): { content: string; count: number } => {
  const globalPattern = new RegExp(
    pattern.source,
    pattern.flags.includes('g') ? pattern.flags : pattern.flags + 'g'
  );

  const matches: RegExpExecArray[] = [];
  let match: RegExpExecArray | null;
  while (
    matches.length < limit &&
    (match = globalPattern.exec(content)) !== null
  ) {
    matches.push(match);
  }

  let result = content;
  for (let i = matches.length - 1; i >= 0; i--) {
    const current = matches[i];
    const start = current.index;
    const end = start + current[0].length;
    const replaced = replacer(current);
    const before = result;
    result = result.slice(0, start) + replaced + result.slice(end);
    showDiff(label, before, result, replaced, start, end);
  }

  return { content: result, count: matches.length };
};
