import type { GpuBackend, SlotValue } from '../webgpu/host-interface';
import type { GraphError } from '../graph/errors';
import type { SlotSet } from '../graph/types';

export interface HostNodeIO {
  readonly nodeName: string;
  getInput(slot: string): SlotValue | undefined;
  setOutput(slot: string, value: SlotValue): void;
}

export type NodeRunResult = { success: true } | { success: false; errors: GraphError[] };

/**
 * A node implemented on the host rather than by a compute shader
 * (buffer upload, readback). Runs in topological order with compute nodes.
 */
export abstract class HostNode {
  readonly type = 'host' as const;

  abstract slots(): SlotSet;
  abstract run(io: HostNodeIO, backend: GpuBackend): NodeRunResult;
}
