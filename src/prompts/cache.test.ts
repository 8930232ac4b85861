import { describe, it, expect, beforeEach } from 'vitest';
import { PromptCache } from './cache.js';
import { buildPromptVersion } from '../test-helpers/index.js';

describe('PromptCache', () => {
  let clock: number;
  let cache: PromptCache;

  beforeEach(() => {
    clock = 1_000_000;
    cache = new PromptCache({ ttlSeconds: 300, namespace: 'test', monitoring: true, now: () => clock });
  });

  it('builds namespaced keys for versions and states', () => {
    expect(cache.buildKey({ name: 'greeting', version: 3 })).toBe('test:greeting:version:3');
    expect(cache.buildKey({ name: 'greeting', state: 'production' })).toBe('test:greeting:state:production');
  });

  it('returns a stored prompt until the TTL expires', () => {
    const prompt = buildPromptVersion({ name: 'greeting' });
    cache.set({ name: 'greeting', state: 'production' }, prompt);

    clock += 299_000;
    expect(cache.get({ name: 'greeting', state: 'production' })).toEqual(prompt);

    clock += 1_000;
    expect(cache.get({ name: 'greeting', state: 'production' })).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('hands out copies so callers cannot change a cached prompt', () => {
    const prompt = buildPromptVersion({ name: 'greeting', text: 'Hello', config: { temperature: 0.5 } });
    cache.set({ name: 'greeting', version: 1 }, prompt);
    prompt.text = 'edited before read';

    const first = cache.get({ name: 'greeting', version: 1 });
    expect(first).toBeDefined();
    if (!first) return;
    first.text = 'tampered';
    first.config.temperature = 99;

    expect(cache.get({ name: 'greeting', version: 1 })).toMatchObject({ text: 'Hello', config: { temperature: 0.5 } });
  });

  it('invalidates every key of a name and nothing else', () => {
    cache.set({ name: 'a', version: 1 }, buildPromptVersion({ name: 'a' }));
    cache.set({ name: 'a', state: 'production' }, buildPromptVersion({ name: 'a' }));
    cache.set({ name: 'b', version: 1 }, buildPromptVersion({ name: 'b' }));

    expect(cache.invalidate('a')).toBe(2);
    expect(cache.get({ name: 'a', version: 1 })).toBeUndefined();
    expect(cache.get({ name: 'b', version: 1 })).toBeDefined();
  });

  it('returns 0 when invalidating an unknown name', () => {
    expect(cache.invalidate('missing')).toBe(0);
  });

  it('tracks hits and misses per name', () => {
    cache.set({ name: 'a', version: 1 }, buildPromptVersion({ name: 'a' }));
    cache.get({ name: 'a', version: 1 });
    cache.get({ name: 'a', version: 1 });
    cache.get({ name: 'a', version: 2 });

    expect(cache.getStats('a')).toEqual({ name: 'a', hits: 2, misses: 1, total: 3, hitRate: 66.67 });
    expect(cache.getStats('b')).toEqual({ name: 'b', hits: 0, misses: 0, total: 0, hitRate: 0 });
  });

  it('clears statistics', () => {
    cache.get({ name: 'a', version: 1 });
    cache.clearStats();
    expect(cache.getStats('a').total).toBe(0);
  });

  it('does not track statistics when monitoring is off', () => {
    const quiet = new PromptCache({ ttlSeconds: 300, namespace: 'test', monitoring: false });
    quiet.get({ name: 'a', version: 1 });
    expect(quiet.getStats('a').total).toBe(0);
  });

  it('stores nothing when the TTL is zero', () => {
    const disabled = new PromptCache({ ttlSeconds: 0, namespace: 'test', monitoring: true });
    disabled.set({ name: 'a', version: 1 }, buildPromptVersion({ name: 'a' }));
    expect(disabled.enabled).toBe(false);
    expect(disabled.get({ name: 'a', version: 1 })).toBeUndefined();
    expect(disabled.size).toBe(0);
  });
});
