import { GRAPH_INPUT_NODE, MAX_WORKGROUPS_PER_DIMENSION } from '../constants';
import { evaluateDispatch } from '../graph/dispatch';
import { graphError, type GraphError } from '../graph/errors';
import { checkBufferDescriptor, checkTextureDescriptor, checkWorkgroups } from '../graph/schema';
import type {
  ComputeGraphNode,
  GraphContext,
  OutputBinding,
  SubGraphDefinition,
} from '../graph/types';
import type {
  BindGroupEntry,
  GpuBackend,
  PipelineId,
  SlotValue,
  Workgroups,
} from '../webgpu/host-interface';
import { SlotContext } from './context';
import type { HostNode, NodeRunResult } from './host-node';
import { pipelineDescriptorOf } from './provider';
import { NodeResourceCache, type ResolvedResource } from './resources';
import { evaluateTrigger } from './trigger';

export interface DispatchRecord {
  node: string;
  workgroups: Workgroups;
}

export type SkipReason = 'trigger_closed' | 'providers_pending' | 'pipelines_pending';

export type InvocationReport =
  | { status: 'ran'; dispatches: DispatchRecord[] }
  | { status: 'skipped'; reason: SkipReason }
  | { status: 'failed'; errors: GraphError[]; dispatches: DispatchRecord[] };

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type ExecutorLog = (level: LogLevel, message: string, payload?: unknown) => void;

export interface ExecutorOptions {
  maxWorkgroupsPerDimension?: number;
  log?: ExecutorLog;
}

type StepResult =
  | { success: true; outputs: Map<string, SlotValue> }
  | { success: false; errors: GraphError[] };

/**
 * Runs sub-graph definitions against a GPU backend.
 *
 * Per invocation: gate, pipeline readiness, graph inputs, then every node in order.
 * Workgroup counts and output descriptors are recomputed each time from the resources
 * resolved so far. Created output resources are cached per node here, never in the
 * definition.
 */
export class SubGraphExecutor {
  // sub-graph name -> node name -> cache
  private readonly caches = new Map<string, Map<string, NodeResourceCache>>();

  constructor(
    private readonly backend: GpuBackend,
    private readonly options: ExecutorOptions = {}
  ) {}

  invoke(definition: SubGraphDefinition, inputs: ReadonlyMap<string, SlotValue> = new Map()): InvocationReport {
    const graphInputs = new Map<string, SlotValue>();
    for (const slot of definition.graphInputs) {
      const value = inputs.get(slot.name);
      if (value) graphInputs.set(slot.name, value);
    }

    // 1. Gate
    const open = evaluateTrigger(definition.trigger, () => new SlotContext(GRAPH_INPUT_NODE, graphInputs));
    if (!open) {
      return { status: 'skipped', reason: 'trigger_closed' };
    }

    const report = this.run(definition, graphInputs);
    if (report.status !== 'ran' && definition.trigger.mode === 'manual') {
      definition.trigger.handle.rearm();
    }
    return report;
  }

  private run(definition: SubGraphDefinition, graphInputs: Map<string, SlotValue>): InvocationReport {
    // 2. Pipelines
    const pipelines = new Map<string, PipelineId>();
    const pipelineErrors: GraphError[] = [];
    let pending = false;
    for (const [name, node] of definition.nodes) {
      if (node.type !== 'compute') continue;
      const id = this.backend.pipelines.queueComputePipeline(pipelineDescriptorOf(node.descriptor));
      const state = this.backend.pipelines.getComputePipelineState(id);
      if (state.status === 'err') {
        pipelineErrors.push(graphError('PipelineFailed', `Pipeline of '${name}' failed: ${state.message}`, { node: name }));
      } else if (state.status !== 'ok') {
        pending = true;
      }
      pipelines.set(name, id);
    }
    if (pipelineErrors.length > 0) {
      return { status: 'failed', errors: pipelineErrors, dispatches: [] };
    }
    if (pending) {
      this.log('debug', `Pipelines of '${definition.name}' are still compiling`);
      return { status: 'skipped', reason: 'pipelines_pending' };
    }

    // 3. Graph inputs
    const inputErrors: GraphError[] = [];
    for (const slot of definition.graphInputs) {
      const value = graphInputs.get(slot.name);
      if (!value) {
        inputErrors.push(graphError('MissingGraphInput', `Graph input '${slot.name}' was not provided`, { slot: slot.name }));
      } else if (value.kind !== slot.kind) {
        inputErrors.push(graphError(
          'MissingGraphInput',
          `Graph input '${slot.name}' must be a ${slot.kind}, got a ${value.kind}`,
          { slot: slot.name }
        ));
      }
    }
    if (inputErrors.length > 0) {
      return { status: 'failed', errors: inputErrors, dispatches: [] };
    }

    // 4. Nodes
    const produced = new Map<string, ReadonlyMap<string, SlotValue>>([[GRAPH_INPUT_NODE, graphInputs]]);
    const dispatches: DispatchRecord[] = [];
    for (const name of definition.order) {
      const node = definition.nodes.get(name);
      if (!node) {
        throw new Error(`[SubGraphExecutor] Node '${name}' is missing from '${definition.name}'`);
      }

      const nodeInputs = new Map<string, SlotValue>();
      for (const edge of definition.incoming.get(name) ?? []) {
        const value = produced.get(edge.fromNode)?.get(edge.fromSlot);
        if (value) nodeInputs.set(edge.toSlot, value);
      }

      let result: StepResult;
      if (node.type === 'compute') {
        const pipeline = pipelines.get(name);
        if (pipeline === undefined) {
          this.backend.discard();
          throw new Error(`[SubGraphExecutor] No pipeline queued for '${name}'`);
        }
        try {
          result = this.runCompute(this.cacheFor(definition.name, name), name, node, pipeline, nodeInputs, dispatches);
        } catch (err) {
          this.backend.discard();
          throw err;
        }
      } else {
        result = this.runHost(name, node, nodeInputs);
      }

      if (!result.success) {
        this.backend.discard();
        return { status: 'failed', errors: result.errors, dispatches };
      }
      produced.set(name, result.outputs);
    }

    this.backend.submit();
    return { status: 'ran', dispatches };
  }

  /** Destroys cached output resources of the sub-graph's nodes not in `keep`. */
  prune(subGraph: string, keep: ReadonlySet<string>) {
    const nodes = this.caches.get(subGraph);
    if (!nodes) return;
    for (const [name, cache] of nodes) {
      if (keep.has(name)) continue;
      cache.destroy();
      nodes.delete(name);
    }
    if (nodes.size === 0) this.caches.delete(subGraph);
  }

  destroy() {
    for (const subGraph of [...this.caches.keys()]) {
      this.prune(subGraph, new Set());
    }
  }

  private runCompute(
    cache: NodeResourceCache,
    name: string,
    node: ComputeGraphNode,
    pipeline: PipelineId,
    inputs: Map<string, SlotValue>,
    dispatches: DispatchRecord[]
  ): StepResult {
    const { descriptor } = node;

    // a. Inputs
    const missing = node.slots.inputs.filter(slot => !inputs.has(slot.name));
    if (missing.length > 0) {
      return { success: false, errors: missing.map(slot => missingInput(name, slot.name)) };
    }

    // b. Workgroups
    const ctx = new SlotContext(name, inputs);
    let requested: Workgroups;
    try {
      requested = evaluateDispatch(descriptor.dispatch, ctx);
    } catch (err) {
      return { success: false, errors: [strategyFailed(`Dispatch strategy of '${name}' failed: ${errorMessage(err)}`, name)] };
    }
    const workgroups = checkWorkgroups(
      requested,
      this.options.maxWorkgroupsPerDimension ?? MAX_WORKGROUPS_PER_DIMENSION,
      name
    );
    if (!workgroups.success) return workgroups;

    // c. Outputs
    const entries: BindGroupEntry[] = [];
    const outputs = new Map<string, SlotValue>();
    const errors: GraphError[] = [];
    for (const binding of descriptor.bindings) {
      if (binding.direction !== 'output') {
        const value = inputs.get(binding.name);
        if (!value) continue; // reported above
        entries.push({ binding: binding.index, resource: value });
        if (binding.direction === 'input_output') outputs.set(binding.name, value);
        continue;
      }

      const resolved = resolveOutput(binding, ctx, name);
      if (!resolved.success) {
        errors.push(...resolved.errors);
        continue;
      }
      const { value, created } = cache.acquire(binding.name, resolved.data, this.backend);
      if (created) {
        this.log('debug', `Created ${resolved.data.kind} '${binding.name}' for '${name}'`, resolved.data.descriptor);
      }
      entries.push({ binding: binding.index, resource: value });
      outputs.set(binding.name, value);
    }
    if (errors.length > 0) {
      return { success: false, errors };
    }
    cache.retainOnly(new Set(node.slots.outputs.map(s => s.name)));

    this.backend.dispatch({
      label: descriptor.label ?? name,
      pipeline,
      bindGroupIndex: descriptor.bindGroupIndex,
      entries,
      workgroups: workgroups.data,
    });
    dispatches.push({ node: name, workgroups: workgroups.data });
    return { success: true, outputs };
  }

  private runHost(name: string, node: HostNode, inputs: Map<string, SlotValue>): StepResult {
    const missing = node.slots().inputs.filter(slot => !inputs.has(slot.name));
    if (missing.length > 0) {
      return { success: false, errors: missing.map(slot => missingInput(name, slot.name)) };
    }

    const outputs = new Map<string, SlotValue>();
    let result: NodeRunResult;
    try {
      result = node.run(
        {
          nodeName: name,
          getInput: slot => inputs.get(slot),
          setOutput: (slot, value) => { outputs.set(slot, value); },
        },
        this.backend
      );
    } catch (err) {
      return {
        success: false,
        errors: [graphError('HostNodeFailed', `Host node '${name}' failed: ${errorMessage(err)}`, { node: name })],
      };
    }
    return result.success ? { success: true, outputs } : result;
  }

  private cacheFor(subGraph: string, node: string): NodeResourceCache {
    let nodes = this.caches.get(subGraph);
    if (!nodes) {
      nodes = new Map();
      this.caches.set(subGraph, nodes);
    }
    let cache = nodes.get(node);
    if (!cache) {
      cache = new NodeResourceCache();
      nodes.set(node, cache);
    }
    return cache;
  }

  private log(level: LogLevel, message: string, payload?: unknown) {
    this.options.log?.(level, message, payload);
  }
}

function missingInput(node: string, slot: string): GraphError {
  return graphError('MissingInputSlot', `Input slot '${slot}' of '${node}' received no value`, { node, slot });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function strategyFailed(message: string, node: string, slot?: string): GraphError {
  return graphError('StrategyFailed', message, slot === undefined ? { node } : { node, slot });
}

function resolveOutput(
  binding: OutputBinding,
  ctx: GraphContext,
  node: string
): { success: true; data: ResolvedResource } | { success: false; errors: GraphError[] } {
  try {
    if (binding.kind === 'buffer') {
      const descriptor = binding.creation.mode === 'static' ? binding.creation.descriptor : binding.creation.resolve(ctx);
      const checked = checkBufferDescriptor(descriptor, node, binding.name);
      return checked.success ? { success: true, data: { kind: 'buffer', descriptor: checked.data } } : checked;
    }
    const descriptor = binding.creation.mode === 'static' ? binding.creation.descriptor : binding.creation.resolve(ctx);
    const checked = checkTextureDescriptor(descriptor, node, binding.name);
    return checked.success ? { success: true, data: { kind: 'texture', descriptor: checked.data } } : checked;
  } catch (err) {
    return {
      success: false,
      errors: [strategyFailed(`Resource of '${binding.name}' on '${node}' failed to resolve: ${errorMessage(err)}`, node, binding.name)],
    };
  }
}
