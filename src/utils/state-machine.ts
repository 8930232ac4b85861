/**
 * Table-driven finite state machine.
 *
 * Each event lists the states it may fire from and the state it leads to.
 * Prompt versions and dataset runs both describe their lifecycle with one
 * of these tables; anything not in the table is an invalid transition.
 */

import { InvalidStateTransitionError } from '../errors.js';

export type TransitionTable<S extends string, E extends string> = Record<E, {
  from: readonly S[];
  to: S;
}>;

export class StateMachine<S extends string, E extends string> {
  constructor(
    private readonly entity: string,
    private readonly table: TransitionTable<S, E>,
  ) {}

  canFire(from: S, event: E): boolean {
    return this.table[event].from.includes(from);
  }

  /** Target state for `event`, or null when it cannot fire from `from`. */
  next(from: S, event: E): S | null {
    return this.canFire(from, event) ? this.table[event].to : null;
  }

  /** Target state for `event`; throws InvalidStateTransitionError when disallowed. */
  fire(from: S, event: E): S {
    const to = this.next(from, event);
    if (to === null) {
      throw new InvalidStateTransitionError(this.entity, from, event);
    }
    return to;
  }
}
