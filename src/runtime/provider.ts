import { action, computed, makeObservable, observable } from 'mobx';
import type { ComputePipelineDescriptor, PipelineCache, PipelineId } from '../webgpu/host-interface';
import type { BuildResult } from '../graph/errors';
import type { ComputeNodeBuilder } from '../graph/node-builder';
import type { NodeDescriptor } from '../graph/types';

export type ComputeNodeState =
  | { status: 'creating' }
  | { status: 'pipeline_queued'; pipeline: PipelineId }
  | { status: 'ready'; pipeline: PipelineId }
  | { status: 'error'; message: string };

export type ProviderState =
  | { status: 'created' }
  | { status: 'updating' }
  | { status: 'ready' }
  | { status: 'error'; message: string };

/**
 * Deferred source of a node descriptor, owned by a host entity.
 * The sub-graph builder resolves it once it reports `ready`.
 */
export interface NodeProvider {
  /** Bumped whenever the provided descriptor changes. */
  readonly version: number;
  state(): ProviderState;
  update(pipelines: PipelineCache): void;
  resolve(): NodeDescriptor | undefined;
}

export function pipelineDescriptorOf(descriptor: NodeDescriptor): ComputePipelineDescriptor {
  return {
    label: descriptor.label,
    shader: descriptor.shader,
    entryPoint: descriptor.entryPoint,
    constants: descriptor.shaderDefs,
  };
}

/**
 * Provides a compute node whose pipeline must be compiled before it can join a graph.
 * Each `update` advances one step: creating -> pipeline_queued -> ready | error.
 */
export class ComputeNodeProvider implements NodeProvider {
  @observable.ref
  descriptor: NodeDescriptor;

  @observable.ref
  node: ComputeNodeState = { status: 'creating' };

  @observable
  version = 0;

  constructor(descriptor: NodeDescriptor) {
    this.descriptor = descriptor;
    makeObservable(this);
  }

  static fromBuilder(builder: ComputeNodeBuilder): BuildResult<ComputeNodeProvider> {
    const built = builder.build();
    if (!built.success) return built;
    return { success: true, data: new ComputeNodeProvider(built.data) };
  }

  @computed
  get status(): ProviderState {
    switch (this.node.status) {
      case 'creating':
        return { status: 'created' };
      case 'pipeline_queued':
        return { status: 'updating' };
      case 'ready':
        return { status: 'ready' };
      case 'error':
        return { status: 'error', message: this.node.message };
    }
  }

  state(): ProviderState {
    return this.status;
  }

  @action
  setDescriptor(descriptor: NodeDescriptor) {
    this.descriptor = descriptor;
    this.node = { status: 'creating' };
    this.version++;
  }

  @action
  update(pipelines: PipelineCache) {
    const node = this.node;
    switch (node.status) {
      case 'creating':
        this.node = {
          status: 'pipeline_queued',
          pipeline: pipelines.queueComputePipeline(pipelineDescriptorOf(this.descriptor)),
        };
        break;
      case 'pipeline_queued': {
        const cached = pipelines.getComputePipelineState(node.pipeline);
        if (cached.status === 'ok') {
          this.node = { status: 'ready', pipeline: node.pipeline };
        } else if (cached.status === 'err') {
          this.node = { status: 'error', message: cached.message };
        }
        break;
      }
      case 'ready':
      case 'error':
        break;
    }
  }

  resolve(): NodeDescriptor | undefined {
    return this.node.status === 'ready' ? this.descriptor : undefined;
  }
}

/** Combined state of several providers: any error wins, then the least advanced. */
export function summarizeProviders(states: readonly ProviderState[]): ProviderState {
  const failed = states.find(s => s.status === 'error');
  if (failed) return failed;
  if (states.some(s => s.status === 'created')) return { status: 'created' };
  if (states.some(s => s.status === 'updating')) return { status: 'updating' };
  return { status: 'ready' };
}
