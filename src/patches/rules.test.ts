import { describe, it, expect } from 'vitest';

import { PatchAnchorError } from '../errors';
import { globalReplace } from './patchDiffing';
import {
  applyRewriteRules,
  discoverIdentifiers,
  escapeIdent,
  IdentifierRule,
  RewriteRule,
} from './rules';

describe('globalReplace', () => {
  it('replaces every match and counts them', () => {
    const result = globalReplace(
      'test',
      'a1 b2 c3',
      /[a-z](\d)/,
      m => `<${m[1]}>`
    );
    expect(result).toEqual({ content: '<1> <2> <3>', count: 3 });
  });

  it('stops after the limit', () => {
    const result = globalReplace('test', 'a1 b2 c3', /[a-z]\d/, () => 'x', 1);
    expect(result).toEqual({ content: 'x b2 c3', count: 1 });
  });

  it('inserts replacement text literally', () => {
    const result = globalReplace('test', 'foo()', /foo/, () => '$&$1');
    expect(result.content).toBe('$&$1()');
  });

  it('leaves content alone when nothing matches', () => {
    expect(globalReplace('test', 'abc', /\d/, () => 'x')).toEqual({
      content: 'abc',
      count: 0,
    });
  });
});

describe('escapeIdent', () => {
  it('escapes dollar signs for use in a RegExp', () => {
    expect(escapeIdent('$a$')).toBe('\\$a\\$');
    expect(new RegExp(`${escapeIdent('$a')}\\(`).test('x=$a()')).toBe(true);
  });
});

describe('discoverIdentifiers', () => {
  const rules: IdentifierRule[] = [
    {
      key: 'fn',
      anchor: 'the handler',
      pattern: () => /handler:([$\w]+)/,
    },
    {
      key: 'arg',
      anchor: 'the handler argument',
      pattern: ({ fn }) => new RegExp(`function ${escapeIdent(fn)}\\(([$\\w]+)\\)`),
    },
  ];

  it('lets later rules build on earlier ones', () => {
    const ids = discoverIdentifiers(
      'demo',
      'x={handler:$h};function $g(a){}function $h(b$){}',
      rules
    );
    expect(ids).toEqual({ fn: '$h', arg: 'b$' });
  });

  it('throws PatchAnchorError naming the first rule that misses', () => {
    expect(() =>
      discoverIdentifiers('demo', 'x={handler:h};', rules, 'main.js')
    ).toThrow(
      new PatchAnchorError('demo', 'the handler argument', 'main.js')
    );
  });
});

describe('applyRewriteRules', () => {
  const rules: RewriteRule[] = [
    {
      name: 'greet',
      anchor: 'hello',
      find: () => /hello/,
      replace: () => 'hello world',
      applied: () => 'hello world',
      firstOnly: true,
    },
    {
      name: 'shout',
      anchor: 'a bang',
      find: () => /!/g,
      replace: () => '!!',
      applied: () => /!!/,
    },
  ];

  it('applies each rule in order', () => {
    const outcome = applyRewriteRules('demo', 'file.js', 'hello! hello!', rules);
    expect(outcome).toEqual({
      content: 'hello world!! hello!!',
      applied: ['greet', 'shout'],
      unchanged: [],
    });
  });

  it('skips rules whose marker is already present', () => {
    const outcome = applyRewriteRules(
      'demo',
      'file.js',
      'hello world!! hello!!',
      rules
    );
    expect(outcome.content).toBe('hello world!! hello!!');
    expect(outcome.applied).toEqual([]);
    expect(outcome.unchanged).toEqual(['greet', 'shout']);
  });

  it('throws when a rule that is not yet applied finds nothing', () => {
    expect(() => applyRewriteRules('demo', 'file.js', 'hello', rules)).toThrow(
      'patch demo: could not find a bang in file.js'
    );
  });
});
