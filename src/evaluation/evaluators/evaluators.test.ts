/**
 * Unit tests for the built-in evaluators (pure scoring, no database)
 */

import { describe, it, expect } from 'vitest';
import { ContainsEvaluator } from './contains.js';
import { ExactMatchEvaluator } from './exact-match.js';
import { JsonStructureEvaluator } from './json-structure.js';
import { outputsMatch } from '../../datasets/run-item.js';
import { buildRunItemView, HALF_SCORE, PERFECT_SCORE, ZERO_SCORE } from '../../test-helpers/index.js';

describe('ExactMatchEvaluator', () => {
  const evaluator = ExactMatchEvaluator.create({});

  it('scores 1 on a match and 0 otherwise', () => {
    expect(evaluator.evaluate(buildRunItemView({ outputMatches: true }))).toBe(PERFECT_SCORE);
    expect(evaluator.evaluate(buildRunItemView({ actualOutput: 'other', outputMatches: false }))).toBe(ZERO_SCORE);
  });

  it('scores matches computed from the stored outputs', () => {
    const matching = buildRunItemView({ expectedOutput: 'Paris', actualOutput: ' Paris ', outputMatches: outputsMatch('Paris', ' Paris ') });
    const differing = buildRunItemView({ expectedOutput: 'Paris', actualOutput: 'Lyon', outputMatches: outputsMatch('Paris', 'Lyon') });

    expect(evaluator.evaluate(matching)).toBe(PERFECT_SCORE);
    expect(evaluator.evaluate(differing)).toBe(ZERO_SCORE);
  });

  it('scores 0 when the actual output is blank', () => {
    expect(evaluator.evaluate(buildRunItemView({ actualOutput: null, outputMatches: null }))).toBe(ZERO_SCORE);
  });

  it('has no opinion without an expected output', () => {
    expect(evaluator.evaluate(buildRunItemView({ expectedOutput: '', outputMatches: null }))).toBeNull();
  });

  it('writes boolean scores named after its type', () => {
    expect(evaluator.name).toBe('exact_match');
    expect(evaluator.dataType).toBe('boolean');
    expect(ExactMatchEvaluator.create({ name: 'strict' }).name).toBe('strict');
  });

  it('rejects a blank name option', () => {
    expect(() => ExactMatchEvaluator.create({ name: ' ' })).toThrow('exact_match: name must not be blank');
  });
});

describe('ContainsEvaluator', () => {
  it('uses the keywords option, case-insensitively', () => {
    const evaluator = ContainsEvaluator.create({ keywords: ['Paris', 'france'] });
    expect(evaluator.evaluate(buildRunItemView({ actualOutput: 'paris is in France' }))).toBe(PERFECT_SCORE);
    expect(evaluator.evaluate(buildRunItemView({ actualOutput: 'Paris' }))).toBe(HALF_SCORE);
  });

  it('takes keywords from an array expected output', () => {
    const evaluator = ContainsEvaluator.create({});
    const item = buildRunItemView({ expectedOutput: ['red', 'blue', 'green', 'gold'], actualOutput: 'red and gold' });
    expect(evaluator.evaluate(item)).toBe(HALF_SCORE);
  });

  it('takes keywords from an object with a keywords list', () => {
    const evaluator = ContainsEvaluator.create({});
    const item = buildRunItemView({ expectedOutput: { keywords: ['alpha'] }, actualOutput: { text: 'Alpha' } });
    expect(evaluator.evaluate(item)).toBe(PERFECT_SCORE);
  });

  it('treats a string expected output as one keyword', () => {
    const evaluator = ContainsEvaluator.create({});
    expect(evaluator.evaluate(buildRunItemView({ expectedOutput: 'answer', actualOutput: 'the answer' }))).toBe(PERFECT_SCORE);
  });

  it('scores 0 for a blank output and null without keywords', () => {
    const evaluator = ContainsEvaluator.create({});
    expect(evaluator.evaluate(buildRunItemView({ actualOutput: '  ' }))).toBe(ZERO_SCORE);
    expect(evaluator.evaluate(buildRunItemView({ expectedOutput: null }))).toBeNull();
    expect(evaluator.evaluate(buildRunItemView({ expectedOutput: 42 }))).toBeNull();
  });

  it('rejects keywords that are not strings', () => {
    expect(() => ContainsEvaluator.create({ keywords: [1] })).toThrow('contains: keywords.0');
  });
});

describe('JsonStructureEvaluator', () => {
  it('checks the requiredKeys option against an object output', () => {
    const evaluator = JsonStructureEvaluator.create({ requiredKeys: ['a', 'b'] });
    expect(evaluator.evaluate(buildRunItemView({ actualOutput: { a: 1, b: null } }))).toBe(PERFECT_SCORE);
    expect(evaluator.evaluate(buildRunItemView({ actualOutput: { a: 1 } }))).toBe(HALF_SCORE);
  });

  it('parses a JSON string output', () => {
    const evaluator = JsonStructureEvaluator.create({ requiredKeys: ['a'] });
    expect(evaluator.evaluate(buildRunItemView({ actualOutput: '{"a": 1}' }))).toBe(PERFECT_SCORE);
    expect(evaluator.evaluate(buildRunItemView({ actualOutput: 'not json' }))).toBe(ZERO_SCORE);
    expect(evaluator.evaluate(buildRunItemView({ actualOutput: '[1]' }))).toBe(ZERO_SCORE);
  });

  it('defaults to the keys of an object expected output', () => {
    const evaluator = JsonStructureEvaluator.create({});
    const item = buildRunItemView({ expectedOutput: { a: 1, b: 2, c: 3, d: 4 }, actualOutput: { a: 0, d: 0 } });
    expect(evaluator.evaluate(item)).toBe(HALF_SCORE);
  });

  it('has no opinion without required keys', () => {
    const evaluator = JsonStructureEvaluator.create({});
    expect(evaluator.evaluate(buildRunItemView({ expectedOutput: 'answer' }))).toBeNull();
  });
});
