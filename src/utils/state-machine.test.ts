import { describe, it, expect } from 'vitest';
import { StateMachine } from './state-machine.js';
import { InvalidStateTransitionError } from '../errors.js';

type Light = 'red' | 'green' | 'yellow';
type LightEvent = 'go' | 'slow' | 'stop';

const light = new StateMachine<Light, LightEvent>('light', {
  go: { from: ['red'], to: 'green' },
  slow: { from: ['green'], to: 'yellow' },
  stop: { from: ['green', 'yellow'], to: 'red' },
});

describe('StateMachine', () => {
  it('reports which events can fire from a state', () => {
    expect(light.canFire('red', 'go')).toBe(true);
    expect(light.canFire('red', 'stop')).toBe(false);
    expect(light.canFire('yellow', 'stop')).toBe(true);
  });

  it('next returns the target state or null', () => {
    expect(light.next('green', 'slow')).toBe('yellow');
    expect(light.next('red', 'slow')).toBeNull();
  });

  it('fire returns the target state for an allowed event', () => {
    expect(light.fire('yellow', 'stop')).toBe('red');
  });

  it('fire throws InvalidStateTransitionError for a disallowed event', () => {
    expect(() => light.fire('red', 'slow')).toThrow(InvalidStateTransitionError);
    expect(() => light.fire('red', 'slow')).toThrow("Cannot slow light in state 'red'");
  });
});
