/**
 * Contract between the sub-graph core and the GPU layer that owns devices,
 * pipelines and memory. The core only ever holds the handles declared here.
 */

export type Workgroups = [number, number, number];

export interface BufferDescriptor {
  label?: string;
  size: number; // bytes
  usage: number; // BufferUsage flags
  mappedAtCreation?: boolean;
}

export interface TextureDescriptor {
  label?: string;
  width: number;
  height: number;
  depthOrArrayLayers?: number;
  format: string;
  usage: number; // TextureUsage flags
}

export interface GpuBuffer {
  readonly label?: string;
  readonly size: number;
  readonly usage: number;
  destroy(): void;
}

export interface GpuTexture {
  readonly label?: string;
  readonly width: number;
  readonly height: number;
  readonly depthOrArrayLayers: number;
  readonly format: string;
  readonly usage: number;
  destroy(): void;
}

export type SlotValue =
  | { kind: 'buffer'; buffer: GpuBuffer }
  | { kind: 'texture'; texture: GpuTexture };

/**
 * Opaque reference to shader source owned by the asset layer.
 * `code` may be inlined; otherwise the pipeline cache asks its source resolver.
 */
export interface ShaderRef {
  readonly id: string;
  readonly code?: string;
}

export interface ComputePipelineDescriptor {
  label?: string;
  shader: ShaderRef;
  entryPoint: string;
  constants: Readonly<Record<string, number>>;
}

export type PipelineId = number;

export type CachedPipelineState =
  | { status: 'queued' } // waiting for shader source
  | { status: 'creating' }
  | { status: 'ok' }
  | { status: 'err'; message: string };

export interface PipelineCache {
  /** Idempotent: equal descriptors map to the same id. */
  queueComputePipeline(descriptor: ComputePipelineDescriptor): PipelineId;
  getComputePipelineState(id: PipelineId): CachedPipelineState;
}

export interface BindGroupEntry {
  binding: number;
  resource: SlotValue;
}

export interface DispatchCommand {
  label: string;
  pipeline: PipelineId;
  bindGroupIndex: number;
  entries: BindGroupEntry[];
  workgroups: Workgroups;
}

/**
 * Interface for the underlying GPU layer.
 * Commands are recorded in call order and flushed by `submit`; `discard` drops
 * whatever was recorded since the last submit. `writeBuffer` goes straight to the queue.
 */
export interface GpuBackend {
  readonly pipelines: PipelineCache;
  createBuffer(descriptor: BufferDescriptor): GpuBuffer;
  createTexture(descriptor: TextureDescriptor): GpuTexture;
  writeBuffer(buffer: GpuBuffer, data: ArrayBufferView): void;
  copyBufferToBuffer(source: GpuBuffer, destination: GpuBuffer, size: number): void;
  dispatch(command: DispatchCommand): void;
  submit(): void;
  discard(): void;
  /** Resolves with a copy of the buffer contents once the GPU has finished writing it. */
  readBuffer(buffer: GpuBuffer): Promise<ArrayBuffer>;
}

export function computePipelineKey(descriptor: ComputePipelineDescriptor): string {
  const constants = Object.keys(descriptor.constants)
    .sort()
    .map(k => `${k}=${descriptor.constants[k]}`)
    .join(',');
  return `${descriptor.shader.id}#${descriptor.entryPoint}(${constants})`;
}
