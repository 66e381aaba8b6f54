import type { Workgroups } from '../webgpu/host-interface';
import type { DispatchStrategy, GraphContext } from './types';

export interface PerElementOptions {
  /** Bytes per element. */
  elementSize: number;
  /** Invocations per workgroup along x. */
  workgroupSize?: number;
}

export const Dispatch = {
  fixed(x: number, y = 1, z = 1): DispatchStrategy {
    return { type: 'fixed', workgroups: [x, y, z] };
  },

  fromContext(resolve: (ctx: GraphContext) => Workgroups): DispatchStrategy {
    return { type: 'from_context', resolve };
  },

  /**
   * One invocation per element of the buffer bound to `slot`.
   * An absent slot dispatches nothing.
   */
  perElement(slot: string, { elementSize, workgroupSize = 1 }: PerElementOptions): DispatchStrategy {
    return {
      type: 'from_context',
      resolve: ctx => {
        const size = ctx.bufferSize(slot) ?? 0;
        return [Math.ceil(size / elementSize / workgroupSize), 1, 1];
      },
    };
  },
};

/**
 * Computes the workgroup counts for one invocation.
 * Never cached: `from_context` strategies see the current context every time.
 */
export function evaluateDispatch(strategy: DispatchStrategy, ctx: GraphContext): Workgroups {
  if (strategy.type === 'fixed') {
    const [x, y, z] = strategy.workgroups;
    return [x, y, z];
  }
  return strategy.resolve(ctx);
}
