import {
  computePipelineKey,
  type BufferDescriptor,
  type CachedPipelineState,
  type ComputePipelineDescriptor,
  type DispatchCommand,
  type GpuBackend,
  type GpuBuffer,
  type GpuTexture,
  type PipelineCache,
  type PipelineId,
  type TextureDescriptor,
} from './host-interface';

export class MockBuffer implements GpuBuffer {
  readonly data: Uint8Array;
  destroyed = false;

  constructor(readonly label: string | undefined, readonly size: number, readonly usage: number) {
    this.data = new Uint8Array(size);
  }

  destroy() {
    this.destroyed = true;
  }
}

export class MockTexture implements GpuTexture {
  destroyed = false;

  constructor(
    readonly label: string | undefined,
    readonly width: number,
    readonly height: number,
    readonly depthOrArrayLayers: number,
    readonly format: string,
    readonly usage: number
  ) {}

  destroy() {
    this.destroyed = true;
  }
}

export interface MockPipelineOptions {
  /** State polls answered with `creating` before a pipeline turns `ok`. */
  pollsUntilReady?: number;
}

/**
 * In-memory pipeline cache. Pipelines become ready after a configurable
 * number of polls; shaders can be marked as failing.
 */
export class MockPipelineCache implements PipelineCache {
  private readonly ids = new Map<string, PipelineId>();
  private readonly entries: { descriptor: ComputePipelineDescriptor; polls: number }[] = [];
  private readonly failures = new Map<string, string>();

  constructor(private readonly options: MockPipelineOptions = {}) {}

  queueComputePipeline(descriptor: ComputePipelineDescriptor): PipelineId {
    const key = computePipelineKey(descriptor);
    const existing = this.ids.get(key);
    if (existing !== undefined) return existing;

    const id = this.entries.length;
    this.entries.push({ descriptor, polls: 0 });
    this.ids.set(key, id);
    return id;
  }

  getComputePipelineState(id: PipelineId): CachedPipelineState {
    const entry = this.entries[id];
    if (entry === undefined) return { status: 'err', message: `Unknown pipeline ${id}` };

    const failure = this.failures.get(entry.descriptor.shader.id);
    if (failure !== undefined) return { status: 'err', message: failure };

    if (entry.polls < (this.options.pollsUntilReady ?? 0)) {
      entry.polls++;
      return { status: 'creating' };
    }
    return { status: 'ok' };
  }

  failShader(shaderId: string, message: string) {
    this.failures.set(shaderId, message);
  }

  descriptor(id: PipelineId): ComputePipelineDescriptor | undefined {
    return this.entries[id]?.descriptor;
  }

  get size(): number {
    return this.entries.length;
  }
}

export interface MockBackendOptions extends MockPipelineOptions {
  /** Stands in for the shader: called with every recorded dispatch. */
  onDispatch?: (command: DispatchCommand, backend: MockGpuBackend) => void;
}

/**
 * A backend that doesn't require a real GPUDevice.
 * Records every command; buffer contents live in host memory.
 */
export class MockGpuBackend implements GpuBackend {
  readonly pipelines: MockPipelineCache;
  readonly buffers: MockBuffer[] = [];
  readonly textures: MockTexture[] = [];
  readonly dispatches: DispatchCommand[] = [];
  readonly copies: { source: MockBuffer; destination: MockBuffer; size: number }[] = [];
  readonly writes: { buffer: MockBuffer; byteLength: number }[] = [];
  submits = 0;
  discards = 0;
  reads = 0;
  readFailure?: string;

  constructor(private readonly options: MockBackendOptions = {}) {
    this.pipelines = new MockPipelineCache(options);
  }

  createBuffer(descriptor: BufferDescriptor): MockBuffer {
    const buffer = new MockBuffer(descriptor.label, descriptor.size, descriptor.usage);
    this.buffers.push(buffer);
    return buffer;
  }

  createTexture(descriptor: TextureDescriptor): MockTexture {
    const texture = new MockTexture(
      descriptor.label,
      descriptor.width,
      descriptor.height,
      descriptor.depthOrArrayLayers ?? 1,
      descriptor.format,
      descriptor.usage
    );
    this.textures.push(texture);
    return texture;
  }

  writeBuffer(buffer: GpuBuffer, data: ArrayBufferView) {
    const target = this.toMock(buffer);
    const bytes = new Uint8Array(data.buffer, data.byteOffset, Math.min(data.byteLength, target.size));
    target.data.set(bytes);
    this.writes.push({ buffer: target, byteLength: data.byteLength });
  }

  copyBufferToBuffer(source: GpuBuffer, destination: GpuBuffer, size: number) {
    const src = this.toMock(source);
    const dst = this.toMock(destination);
    dst.data.set(src.data.subarray(0, size));
    this.copies.push({ source: src, destination: dst, size });
  }

  dispatch(command: DispatchCommand) {
    this.dispatches.push(command);
    this.options.onDispatch?.(command, this);
  }

  submit() {
    this.submits++;
  }

  discard() {
    this.discards++;
  }

  async readBuffer(buffer: GpuBuffer): Promise<ArrayBuffer> {
    this.reads++;
    if (this.readFailure !== undefined) {
      throw new Error(this.readFailure);
    }
    const source = this.toMock(buffer);
    const copy = new ArrayBuffer(source.size);
    new Uint8Array(copy).set(source.data);
    return copy;
  }

  toMock(buffer: GpuBuffer): MockBuffer {
    if (!(buffer instanceof MockBuffer)) {
      throw new Error(`[MockGpuBackend] Buffer '${buffer.label ?? ''}' was not created by this backend`);
    }
    return buffer;
  }
}
