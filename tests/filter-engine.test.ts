import { describe, it, expect } from 'vitest';
import { evaluateFilters, matchesConditions, matchesValue, type FilterSubject } from '../src/core/filter-engine.js';
import { parseFilterConditions } from '../src/utils/filter-conditions.js';
import type { FilterConditions, FilterRule } from '../src/utils/db-types.js';

function rule(name: string, conditions: FilterConditions, options: { exclusive?: boolean; enabled?: boolean } = {}): FilterRule {
  return {
    id: 1,
    name,
    enabled: options.enabled ?? true,
    exclusive: options.exclusive ?? false,
    conditions,
    description: null,
    createdBy: null,
    createdAt: 0,
    updatedAt: 0,
  };
}

function subject(author: string, text: string, authorEmail: string | null = null): FilterSubject {
  return { author, authorEmail, subject: text };
}

describe('matchesValue', () => {
  it('matches substrings case-insensitively', () => {
    expect(matchesValue('Jane Doe', 'jane')).toBe(true);
    expect(matchesValue('Jane Doe', 'john')).toBe(false);
  });

  it('treats slash-wrapped values as regexes', () => {
    expect(matchesValue('Jane Doe', '/^jane/')).toBe(true);
    expect(matchesValue('Mary Jane', '/^jane/')).toBe(false);
  });

  it('never matches an invalid regex', () => {
    expect(matchesValue('[', '/[/')).toBe(false);
  });

  it('matches lists on any element and never matches a missing value', () => {
    expect(matchesValue('bob@example.org', ['alice@', 'bob@'])).toBe(true);
    expect(matchesValue(null, 'anything')).toBe(false);
  });
});

describe('matchesConditions', () => {
  it('requires every present condition', () => {
    const conditions: FilterConditions = { author: 'jane', subject_keywords: ['bpf'] };
    expect(matchesConditions(subject('Jane Doe', '[PATCH] bpf: fix'), conditions)).toBe(true);
    expect(matchesConditions(subject('Jane Doe', '[PATCH] mm: fix'), conditions)).toBe(false);
  });

  it('checks the author email and subject regex', () => {
    const conditions: FilterConditions = { author_email: '@kernel.org', subject_regex: '^\\[PATCH net' };
    expect(matchesConditions(subject('Jane', '[PATCH net-next] x', 'jane@kernel.org'), conditions)).toBe(true);
    expect(matchesConditions(subject('Jane', '[PATCH net-next] x', null), conditions)).toBe(false);
  });

  it('matches nothing without conditions', () => {
    expect(matchesConditions(subject('Jane', 'anything'), {})).toBe(false);
  });
});

describe('evaluateFilters', () => {
  const exclusiveAuthor = rule('maintainer', { author: 'Xavier' }, { exclusive: true });
  const bpfKeyword = rule('bpf', { subject_keywords: ['bpf'] });
  const rules = [exclusiveAuthor, bpfKeyword];

  it('allows everything without rules', () => {
    expect(evaluateFilters(subject('Anyone', 'anything'), [])).toEqual({ allow: true, matched: [] });
  });

  it('allows everything with only non-exclusive rules, reporting matches', () => {
    expect(evaluateFilters(subject('Anyone', '[PATCH] bpf: x'), [bpfKeyword])).toEqual({ allow: true, matched: ['bpf'] });
    expect(evaluateFilters(subject('Anyone', '[PATCH] mm: x'), [bpfKeyword])).toEqual({ allow: true, matched: [] });
  });

  it('allows a message from the exclusive author with an unrelated subject', () => {
    expect(evaluateFilters(subject('Xavier Example', '[PATCH] mm: tidy'), rules))
      .toEqual({ allow: true, matched: ['maintainer'] });
  });

  it('allows a message matching only the non-exclusive rule', () => {
    expect(evaluateFilters(subject('Someone Else', '[PATCH] bpf: verifier fix'), rules))
      .toEqual({ allow: true, matched: ['bpf'] });
  });

  it('rejects a message matching neither rule', () => {
    expect(evaluateFilters(subject('Someone Else', '[PATCH] mm: tidy'), rules))
      .toEqual({ allow: false, matched: [] });
  });

  it('reports every matching rule', () => {
    expect(evaluateFilters(subject('Xavier Example', '[PATCH] bpf: x'), rules))
      .toEqual({ allow: true, matched: ['maintainer', 'bpf'] });
  });

  it('ignores disabled rules', () => {
    const disabled = rule('maintainer', { author: 'Xavier' }, { exclusive: true, enabled: false });
    expect(evaluateFilters(subject('Someone Else', '[PATCH] mm: tidy'), [disabled]))
      .toEqual({ allow: true, matched: [] });
  });
});

describe('parseFilterConditions', () => {
  it('accepts objects and stored JSON text', () => {
    expect(parseFilterConditions({ author: ['a', 'b'] })).toEqual({ ok: true, value: { author: ['a', 'b'] } });
    expect(parseFilterConditions('{"subject_keywords":["bpf"]}')).toEqual({ ok: true, value: { subject_keywords: ['bpf'] } });
  });

  it('requires at least one condition', () => {
    expect(parseFilterConditions({})).toEqual({ ok: false, error: 'conditions: at least one condition is required' });
  });

  it('rejects unknown keys, bad regexes and malformed JSON', () => {
    expect(parseFilterConditions({ authr: 'x' }).ok).toBe(false);
    expect(parseFilterConditions({ subject_regex: '(' }).ok).toBe(false);
    expect(parseFilterConditions({ author: '/[/' }).ok).toBe(false);
    expect(parseFilterConditions('{not json').ok).toBe(false);
  });
});
