import { describe, it, expect, beforeEach } from 'vitest';
import { AgentRegistry, getAgentRegistry } from './registry.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { buildAgentContext } from '../test-helpers/index.js';

describe('AgentRegistry', () => {
  let registry: AgentRegistry;

  beforeEach(() => {
    registry = new AgentRegistry();
  });

  it('registers the echo agent by default', async () => {
    const echo = registry.get('echo');
    await expect(echo.run({ q: 1 }, buildAgentContext())).resolves.toEqual({ output: { q: 1 } });
  });

  it('can start empty', () => {
    const empty = new AgentRegistry({ builtins: false });
    expect(empty.has('echo')).toBe(false);
    expect(empty.list()).toEqual([]);
  });

  it('registers and looks up custom agents', () => {
    registry.register({ name: 'upper', async run(input) { return { output: String(input).toUpperCase() }; } });
    expect(registry.has('upper')).toBe(true);
    expect(registry.list().map(a => a.name)).toEqual(['echo', 'upper']);
  });

  it('rejects duplicate and blank names', () => {
    expect(() => registry.register({ name: 'echo', async run() { return { output: null }; } })).toThrow(ValidationError);
    expect(() => registry.register({ name: '  ', async run() { return { output: null }; } })).toThrow('Agent name is required');
  });

  it('throws NotFoundError for unknown agents', () => {
    expect(() => registry.get('missing')).toThrow(NotFoundError);
    expect(() => registry.get('missing')).toThrow("Agent 'missing' not found");
  });

  it('unregisters agents', () => {
    expect(registry.unregister('echo')).toBe(true);
    expect(registry.has('echo')).toBe(false);
  });

  it('returns the same shared instance', () => {
    expect(getAgentRegistry()).toBe(getAgentRegistry());
  });
});
