import { describe, it, expect } from 'vitest';
import { validatePromptConfig } from './config-validator.js';

function errorsOf(config: unknown, strict = false): string[] {
  const result = validatePromptConfig(config, { strict });
  return result.valid ? [] : result.errors;
}

describe('validatePromptConfig', () => {
  it('treats a missing config as empty', () => {
    expect(validatePromptConfig(undefined)).toEqual({ valid: true, config: {} });
    expect(validatePromptConfig(null)).toEqual({ valid: true, config: {} });
  });

  it('accepts a fully valid config', () => {
    const config = {
      temperature: 0.7,
      max_tokens: 2000,
      top_p: 0.9,
      frequency_penalty: -1,
      presence_penalty: 2,
      stop_sequences: ['END'],
      model: 'gpt-test',
      response_format: { type: 'json_object' },
      seed: 42,
      stream: false,
    };
    expect(validatePromptConfig(config)).toEqual({ valid: true, config });
  });

  it('rejects a non-object config', () => {
    expect(errorsOf('temperature=1')).toEqual(['Config must be an object']);
    expect(errorsOf([1, 2])).toEqual(['Config must be an object']);
  });

  it('rejects temperature out of range', () => {
    expect(errorsOf({ temperature: 2.5 })).toEqual(['temperature must be between 0 and 2']);
    expect(errorsOf({ temperature: -0.1 })).toEqual(['temperature must be between 0 and 2']);
  });

  it('rejects a non-integer max_tokens', () => {
    expect(errorsOf({ max_tokens: 10.5 })).toEqual(['max_tokens must be an integer']);
  });

  it('rejects max_tokens outside 1..100000', () => {
    expect(errorsOf({ max_tokens: 0 })).toEqual(['max_tokens must be between 1 and 100000']);
    expect(errorsOf({ max_tokens: 100_001 })).toEqual(['max_tokens must be between 1 and 100000']);
  });

  it('rejects stop_sequences that are not an array of strings', () => {
    expect(errorsOf({ stop_sequences: 'END' })).toEqual(['stop_sequences must be an array']);
    expect(errorsOf({ stop_sequences: ['END', 3] })).toEqual(['stop_sequences[1] must be a string']);
  });

  it('rejects wrongly typed scalar fields', () => {
    expect(errorsOf({ model: 4, stream: 'yes', seed: 'abc' })).toEqual([
      'model must be a string',
      'seed must be an integer',
      'stream must be a boolean',
    ]);
  });

  it('leaves known keys set to null unchecked', () => {
    expect(validatePromptConfig({ temperature: null, stop_sequences: null, model: 'gpt-test' })).toEqual({
      valid: true,
      config: { temperature: null, stop_sequences: null, model: 'gpt-test' },
    });
  });

  it('coerces numeric strings', () => {
    const result = validatePromptConfig({ temperature: '0.5', max_tokens: '12345', seed: '7' });
    expect(result).toEqual({ valid: true, config: { temperature: 0.5, max_tokens: 12345, seed: 7 } });
  });

  it('still range-checks coerced values', () => {
    expect(errorsOf({ top_p: '1.5' })).toEqual(['top_p must be between 0 and 1']);
  });

  it('passes unknown keys through by default', () => {
    expect(validatePromptConfig({ custom_flag: 'on' })).toEqual({ valid: true, config: { custom_flag: 'on' } });
  });

  it('rejects unknown keys in strict mode', () => {
    expect(errorsOf({ custom_flag: 'on', other: 1, temperature: 1 }, true)).toEqual([
      'Unknown configuration keys: custom_flag, other',
    ]);
  });
});
