import type { SlotValue } from '../webgpu/host-interface';
import type { BufferInfo, GraphContext, ResourceKind, TextureInfo } from '../graph/types';

/** GraphContext over a fixed set of resolved slot values. */
export class SlotContext implements GraphContext {
  constructor(
    public readonly nodeName: string,
    private readonly values: ReadonlyMap<string, SlotValue>
  ) {}

  static empty(nodeName: string): SlotContext {
    return new SlotContext(nodeName, new Map());
  }

  slotNames(): string[] {
    return [...this.values.keys()];
  }

  has(slot: string): boolean {
    return this.values.has(slot);
  }

  kind(slot: string): ResourceKind | undefined {
    return this.values.get(slot)?.kind;
  }

  bufferSize(slot: string): number | undefined {
    return this.getInputBuffer(slot)?.size;
  }

  getInputBuffer(slot: string): BufferInfo | undefined {
    const value = this.values.get(slot);
    if (value?.kind !== 'buffer') return undefined;
    const { label, size, usage } = value.buffer;
    return { label, size, usage };
  }

  getInputTexture(slot: string): TextureInfo | undefined {
    const value = this.values.get(slot);
    if (value?.kind !== 'texture') return undefined;
    const { label, width, height, depthOrArrayLayers, format, usage } = value.texture;
    return { label, width, height, depthOrArrayLayers, format, usage };
  }
}
