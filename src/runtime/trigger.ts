import type { GraphContext } from '../graph/types';
import { SharedCell } from './shared-cell';

export interface ManualTriggerOptions {
  /** Reset the cell to `false` whenever a read opens the gate. */
  oneShot?: boolean;
}

/**
 * Host-owned boolean shared with one or more sub-graphs.
 * The sub-graph only reads it, unless the trigger is one-shot.
 */
export class ManualTrigger {
  readonly cell: SharedCell<boolean>;
  readonly oneShot: boolean;

  constructor(initial = false, options: ManualTriggerOptions = {}) {
    this.cell = new SharedCell(initial);
    this.oneShot = options.oneShot ?? false;
  }

  get value(): boolean {
    return this.cell.read();
  }

  set(value: boolean) {
    this.cell.write(value);
  }

  fire() {
    this.set(true);
  }

  /**
   * Gives back a one-shot fire that opened the gate but did not lead to a run,
   * so the next invocation sees it again. No-op for plain triggers.
   */
  rearm() {
    if (this.oneShot) this.set(true);
  }

  /** Reads the cell for one invocation. */
  consume(): boolean {
    return this.cell.withLock(a => {
      const open = a.get();
      if (open && this.oneShot) a.set(false);
      return open;
    });
  }
}

export type SubGraphTrigger =
  | { mode: 'always' }
  | { mode: 'manual'; handle: ManualTrigger }
  | { mode: 'conditional'; predicate: (inputs: GraphContext) => boolean };

export const Trigger = {
  always(): SubGraphTrigger {
    return { mode: 'always' };
  },

  manual(handle: ManualTrigger): SubGraphTrigger {
    return { mode: 'manual', handle };
  },

  conditional(predicate: (inputs: GraphContext) => boolean): SubGraphTrigger {
    return { mode: 'conditional', predicate };
  },
};

/**
 * Decides whether the sub-graph runs this invocation. Called exactly once per invocation;
 * the graph-input context is only built for conditional triggers.
 */
export function evaluateTrigger(trigger: SubGraphTrigger, inputs: () => GraphContext): boolean {
  switch (trigger.mode) {
    case 'always':
      return true;
    case 'manual':
      return trigger.handle.consume();
    case 'conditional':
      return trigger.predicate(inputs());
  }
}
