/// <reference types="@webgpu/types" />
/**
 * @file webgpu-backend.ts
 * @description `GpuBackend` and `PipelineCache` on a real GPUDevice.
 *
 * @external-interactions
 * - Shader source comes from `ShaderRef.code` or the `resolveShader` callback.
 * - Commands are recorded into one command encoder and flushed by `submit()`.
 *
 * @pitfalls
 * - Pipelines use `layout: 'auto'`, so bind group layouts come from the shader itself.
 *   A binding the shader never reads is stripped from the layout and fails `createBindGroup`.
 * - `writeBuffer` goes straight to the queue and lands before anything recorded since the
 *   last submit.
 */
import { MapMode } from '../constants';
import {
  computePipelineKey,
  type BindGroupEntry,
  type BufferDescriptor,
  type CachedPipelineState,
  type ComputePipelineDescriptor,
  type DispatchCommand,
  type GpuBackend,
  type GpuBuffer,
  type GpuTexture,
  type PipelineCache,
  type PipelineId,
  type ShaderRef,
  type TextureDescriptor,
} from './host-interface';

export type ShaderSourceResolver = (shader: ShaderRef) => string | Promise<string>;

const TEXTURE_FORMATS: readonly GPUTextureFormat[] = [
  'r8unorm', 'r8snorm', 'r8uint', 'r8sint',
  'r16uint', 'r16sint', 'r16float',
  'rg8unorm', 'rg8snorm', 'rg8uint', 'rg8sint',
  'r32uint', 'r32sint', 'r32float',
  'rg16uint', 'rg16sint', 'rg16float',
  'rgba8unorm', 'rgba8unorm-srgb', 'rgba8snorm', 'rgba8uint', 'rgba8sint',
  'bgra8unorm', 'bgra8unorm-srgb',
  'rgb10a2unorm', 'rg11b10ufloat',
  'rg32uint', 'rg32sint', 'rg32float',
  'rgba16uint', 'rgba16sint', 'rgba16float',
  'rgba32uint', 'rgba32sint', 'rgba32float',
];

function textureFormat(format: string): GPUTextureFormat {
  const found = TEXTURE_FORMATS.find(f => f === format);
  if (!found) throw new Error(`[WebGpuBackend] Unsupported texture format '${format}'`);
  return found;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ------------------------------------------------------------------
// Pipelines
// ------------------------------------------------------------------

interface PipelineEntry {
  state: CachedPipelineState;
  pipeline?: GPUComputePipeline;
}

export class WebGpuPipelineCache implements PipelineCache {
  private readonly ids = new Map<string, PipelineId>();
  private readonly entries: PipelineEntry[] = [];
  private readonly shaderCache = new Map<string, Promise<GPUShaderModule>>();

  constructor(
    private readonly device: GPUDevice,
    private readonly resolveShader: ShaderSourceResolver = shader => {
      throw new Error(`No source for shader '${shader.id}'`);
    }
  ) {}

  queueComputePipeline(descriptor: ComputePipelineDescriptor): PipelineId {
    const key = computePipelineKey(descriptor);
    const existing = this.ids.get(key);
    if (existing !== undefined) return existing;

    const id = this.entries.length;
    const entry: PipelineEntry = { state: { status: 'queued' } };
    this.entries.push(entry);
    this.ids.set(key, id);

    this.compile(entry, descriptor).catch(err => {
      entry.state = { status: 'err', message: errorMessage(err) };
    });
    return id;
  }

  getComputePipelineState(id: PipelineId): CachedPipelineState {
    return this.entries[id]?.state ?? { status: 'err', message: `Unknown pipeline ${id}` };
  }

  getPipeline(id: PipelineId): GPUComputePipeline | undefined {
    return this.entries[id]?.pipeline;
  }

  private async compile(entry: PipelineEntry, descriptor: ComputePipelineDescriptor) {
    const code = descriptor.shader.code ?? await this.resolveShader(descriptor.shader);
    entry.state = { status: 'creating' };

    const module = await this.getShaderModule(code);
    entry.pipeline = await this.device.createComputePipelineAsync({
      label: descriptor.label,
      layout: 'auto',
      compute: { module, entryPoint: descriptor.entryPoint, constants: { ...descriptor.constants } },
    });
    entry.state = { status: 'ok' };
  }

  private getShaderModule(code: string): Promise<GPUShaderModule> {
    let cached = this.shaderCache.get(code);
    if (!cached) {
      cached = this.createShaderModule(code);
      this.shaderCache.set(code, cached);
    }
    return cached;
  }

  private async createShaderModule(code: string): Promise<GPUShaderModule> {
    const module = this.device.createShaderModule({ code });

    const info = await module.getCompilationInfo();
    if (info.messages.length > 0) {
      let hasError = false;
      const formatted = info.messages.map(m => {
        if (m.type === 'error') hasError = true;
        return `[${m.type.toUpperCase()}] line ${m.lineNum}:${m.linePos} - ${m.message}`;
      }).join('\n');

      if (hasError) {
        console.error(`[Shader Compilation Error]\n${formatted}`);
        const lines = code.split('\n');
        const codeView = lines.map((l, i) => `${(i + 1).toString().padStart(4, ' ')}| ${l}`).join('\n');
        console.error(`[Source Code]\n${codeView}`);
        throw new Error(formatted);
      }
      console.warn(`[Shader Compilation Warning]\n${formatted}`);
    }
    return module;
  }
}

// ------------------------------------------------------------------
// Resources
// ------------------------------------------------------------------

export class WebGpuBuffer implements GpuBuffer {
  constructor(readonly raw: GPUBuffer) {}

  get label(): string {
    return this.raw.label;
  }

  get size(): number {
    return this.raw.size;
  }

  get usage(): number {
    return this.raw.usage;
  }

  destroy() {
    this.raw.destroy();
  }
}

export class WebGpuTexture implements GpuTexture {
  constructor(readonly raw: GPUTexture) {}

  get label(): string {
    return this.raw.label;
  }

  get width(): number {
    return this.raw.width;
  }

  get height(): number {
    return this.raw.height;
  }

  get depthOrArrayLayers(): number {
    return this.raw.depthOrArrayLayers;
  }

  get format(): string {
    return this.raw.format;
  }

  get usage(): number {
    return this.raw.usage;
  }

  destroy() {
    this.raw.destroy();
  }
}

// ------------------------------------------------------------------
// Backend
// ------------------------------------------------------------------

export class WebGpuBackend implements GpuBackend {
  readonly pipelines: WebGpuPipelineCache;
  private encoder?: GPUCommandEncoder;

  constructor(private readonly device: GPUDevice, resolveShader?: ShaderSourceResolver) {
    this.pipelines = new WebGpuPipelineCache(device, resolveShader);
  }

  createBuffer(descriptor: BufferDescriptor): WebGpuBuffer {
    return new WebGpuBuffer(this.device.createBuffer({
      label: descriptor.label,
      size: descriptor.size,
      usage: descriptor.usage,
      mappedAtCreation: descriptor.mappedAtCreation,
    }));
  }

  createTexture(descriptor: TextureDescriptor): WebGpuTexture {
    return new WebGpuTexture(this.device.createTexture({
      label: descriptor.label,
      size: [descriptor.width, descriptor.height, descriptor.depthOrArrayLayers ?? 1],
      format: textureFormat(descriptor.format),
      usage: descriptor.usage,
    }));
  }

  writeBuffer(buffer: GpuBuffer, data: ArrayBufferView) {
    this.device.queue.writeBuffer(unwrapBuffer(buffer), 0, data.buffer, data.byteOffset, data.byteLength);
  }

  copyBufferToBuffer(source: GpuBuffer, destination: GpuBuffer, size: number) {
    this.currentEncoder().copyBufferToBuffer(unwrapBuffer(source), 0, unwrapBuffer(destination), 0, size);
  }

  dispatch(command: DispatchCommand) {
    const pipeline = this.pipelines.getPipeline(command.pipeline);
    if (!pipeline) {
      throw new Error(`[WebGpuBackend] Pipeline ${command.pipeline} of '${command.label}' is not ready`);
    }

    const pass = this.currentEncoder().beginComputePass({ label: command.label });
    pass.setPipeline(pipeline);
    if (command.entries.length > 0) {
      pass.setBindGroup(command.bindGroupIndex, this.device.createBindGroup({
        label: command.label,
        layout: pipeline.getBindGroupLayout(command.bindGroupIndex),
        entries: command.entries.map(toBindGroupEntry),
      }));
    }
    const [x, y, z] = command.workgroups;
    pass.dispatchWorkgroups(x, y, z);
    pass.end();
  }

  submit() {
    if (!this.encoder) return;
    this.device.queue.submit([this.encoder.finish()]);
    this.encoder = undefined;
  }

  discard() {
    this.encoder = undefined;
  }

  async readBuffer(buffer: GpuBuffer): Promise<ArrayBuffer> {
    const raw = unwrapBuffer(buffer);
    await raw.mapAsync(MapMode.READ);
    try {
      return raw.getMappedRange().slice(0);
    } finally {
      raw.unmap();
    }
  }

  private currentEncoder(): GPUCommandEncoder {
    this.encoder ??= this.device.createCommandEncoder();
    return this.encoder;
  }
}

function unwrapBuffer(buffer: GpuBuffer): GPUBuffer {
  if (!(buffer instanceof WebGpuBuffer)) {
    throw new Error(`[WebGpuBackend] Buffer '${buffer.label ?? ''}' was not created by this backend`);
  }
  return buffer.raw;
}

function unwrapTexture(texture: GpuTexture): GPUTexture {
  if (!(texture instanceof WebGpuTexture)) {
    throw new Error(`[WebGpuBackend] Texture '${texture.label ?? ''}' was not created by this backend`);
  }
  return texture.raw;
}

function toBindGroupEntry(entry: BindGroupEntry): GPUBindGroupEntry {
  const { resource } = entry;
  if (resource.kind === 'buffer') {
    return { binding: entry.binding, resource: { buffer: unwrapBuffer(resource.buffer) } };
  }
  return { binding: entry.binding, resource: unwrapTexture(resource.texture).createView() };
}
