export * from './constants';

export type * from './graph/types';
export * from './graph/errors';
export * from './graph/schema';
export { Dispatch, evaluateDispatch, type PerElementOptions } from './graph/dispatch';
export * from './graph/node-builder';
export { SlotGraph, type CompiledSlotGraph } from './graph/slot-graph';
export * from './graph/sub-graph-builder';

export { SlotContext } from './runtime/context';
export * from './runtime/executor';
export * from './runtime/host-buffers';
export { HostNode, type HostNodeIO, type NodeRunResult } from './runtime/host-node';
export * from './runtime/provider';
export { NodeResourceCache, resourceKey, type ResolvedResource } from './runtime/resources';
export * from './runtime/shared-cell';
export * from './runtime/sub-graph-runner';
export * from './runtime/trigger';

export { EntityStore, type ComponentType, type EntityId } from './state/entity-store';

export type * from './webgpu/host-interface';
export { computePipelineKey } from './webgpu/host-interface';
export { getSharedDevice } from './webgpu/gpu-device';
export * from './webgpu/mock-backend';
export * from './webgpu/webgpu-backend';
