import type {
  BufferDescriptor,
  GpuBackend,
  SlotValue,
  TextureDescriptor,
} from '../webgpu/host-interface';

export type ResolvedResource =
  | { kind: 'buffer'; descriptor: BufferDescriptor }
  | { kind: 'texture'; descriptor: TextureDescriptor };

/** Identity of a resource request; equal keys reuse the same GPU object. */
export function resourceKey(resource: ResolvedResource): string {
  if (resource.kind === 'buffer') {
    const d = resource.descriptor;
    return `buffer|${d.label ?? ''}|${d.size}|${d.usage}|${d.mappedAtCreation ? 1 : 0}`;
  }
  const d = resource.descriptor;
  return `texture|${d.label ?? ''}|${d.width}x${d.height}x${d.depthOrArrayLayers ?? 1}|${d.format}|${d.usage}`;
}

function createResource(resource: ResolvedResource, backend: GpuBackend): SlotValue {
  if (resource.kind === 'buffer') {
    return { kind: 'buffer', buffer: backend.createBuffer(resource.descriptor) };
  }
  return { kind: 'texture', texture: backend.createTexture(resource.descriptor) };
}

function destroyResource(value: SlotValue) {
  if (value.kind === 'buffer') value.buffer.destroy();
  else value.texture.destroy();
}

/**
 * Output resources of one node, keyed by slot.
 * A resource is recreated only when its resolved descriptor changes.
 */
export class NodeResourceCache {
  private readonly entries = new Map<string, { key: string; value: SlotValue }>();

  acquire(slot: string, resource: ResolvedResource, backend: GpuBackend): { value: SlotValue; created: boolean } {
    const key = resourceKey(resource);
    const existing = this.entries.get(slot);
    if (existing && existing.key === key) {
      return { value: existing.value, created: false };
    }
    if (existing) destroyResource(existing.value);

    const value = createResource(resource, backend);
    this.entries.set(slot, { key, value });
    return { value, created: true };
  }

  /** Drops resources whose slot no longer exists on the node. */
  retainOnly(slots: ReadonlySet<string>) {
    for (const [slot, entry] of this.entries) {
      if (!slots.has(slot)) {
        destroyResource(entry.value);
        this.entries.delete(slot);
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }

  destroy() {
    this.entries.forEach(entry => destroyResource(entry.value));
    this.entries.clear();
  }
}
