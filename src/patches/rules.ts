// Identifier discovery and rewriting over minified bundles, driven by data.
//
// When the vendor's minifier renames things between releases, only the rule
// tables in the individual patch modules should need to change.
//
// Always match identifiers with [$\w]+, never \w+: `$` is a legal identifier
// character and the minifier uses it freely.

import { PatchAnchorError } from '../errors';
import { debug } from '../utils';
import { globalReplace } from './patchDiffing';

export type Identifiers = Readonly<Record<string, string>>;

export const escapeIdent = (ident: string): string => {
  return ident.replace(/\$/g, '\\$');
};

export const escapeRegExp = (text: string): string => {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
};

export interface IdentifierRule {
  /** Key the captured identifier is stored under. */
  key: string;
  /** What the pattern looks for, for error messages. */
  anchor: string;
  /** Built from the identifiers discovered by earlier rules. */
  pattern: (found: Identifiers) => RegExp;
  /** Capture group holding the identifier. Defaults to 1. */
  group?: number;
}

export interface RewriteRule {
  name: string;
  anchor: string;
  find: (ids: Identifiers) => RegExp;
  replace: (ids: Identifiers, match: RegExpExecArray) => string;
  /** Text (or pattern) that is present once this rewrite has been applied. */
  applied: (ids: Identifiers) => string | RegExp;
  /** Rewrite only the first match. */
  firstOnly?: boolean;
}

export interface RewriteOutcome {
  content: string;
  applied: string[];
  unchanged: string[];
}

/**
 * Runs identifier rules in order, each one seeing what the previous ones
 * found. The first rule that matches nothing aborts with PatchAnchorError.
 */
export function discoverIdentifiers(
  patchId: string,
  content: string,
  rules: IdentifierRule[],
  file?: string
): Identifiers {
  const found: Record<string, string> = {};

  for (const rule of rules) {
    const match = content.match(rule.pattern(found));
    const value = match?.[rule.group ?? 1];
    if (!value) {
      throw new PatchAnchorError(patchId, rule.anchor, file);
    }
    debug(`patch ${patchId}: found ${rule.key}=${value}`);
    found[rule.key] = value;
  }

  return found;
}

const isApplied = (content: string, marker: string | RegExp): boolean =>
  typeof marker === 'string' ? content.includes(marker) : marker.test(content);

/**
 * Applies rewrite rules in order. A rule whose marker is already present is
 * skipped; a rule whose anchor is absent aborts with PatchAnchorError.
 */
export function applyRewriteRules(
  patchId: string,
  label: string,
  content: string,
  rules: RewriteRule[],
  ids: Identifiers = {}
): RewriteOutcome {
  const outcome: RewriteOutcome = { content, applied: [], unchanged: [] };

  for (const rule of rules) {
    if (isApplied(outcome.content, rule.applied(ids))) {
      debug(`patch ${patchId}: ${rule.name} already applied`);
      outcome.unchanged.push(rule.name);
      continue;
    }

    const { content: next, count } = globalReplace(
      label,
      outcome.content,
      rule.find(ids),
      match => rule.replace(ids, match),
      rule.firstOnly ? 1 : Infinity
    );
    if (count === 0) {
      throw new PatchAnchorError(patchId, rule.anchor, label);
    }

    outcome.content = next;
    outcome.applied.push(rule.name);
  }

  return outcome;
}
