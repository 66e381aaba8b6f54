/**
 * @file host-buffers.ts
 * @description Host nodes that move data between host memory and the sub-graph.
 *
 * @external-interactions
 * - `InputBufferNode` exposes output slot `out`; the host writes it with `set()`.
 * - `OutputBufferNode` takes input slot `in`; the host polls `bufferReady()` / `takeBuffer()`
 *   after `SubGraphRunner.mapOutputBuffers()` has resolved.
 *
 * @pitfalls
 * - Both nodes keep their state in a `SharedCell`. Calling `takeBuffer()` from inside another
 *   acquisition of the same cell reports `CannotLock` instead of blocking.
 * - A taken buffer is gone: the next run allocates a fresh staging buffer.
 */
import { BufferUsage, INPUT_BUFFER_SLOT, OUTPUT_BUFFER_SLOT } from '../constants';
import { graphError } from '../graph/errors';
import type { SlotSet } from '../graph/types';
import type { GpuBackend, GpuBuffer } from '../webgpu/host-interface';
import { HostNode, type HostNodeIO, type NodeRunResult } from './host-node';
import { SharedCell } from './shared-cell';

// ------------------------------------------------------------------
// Input
// ------------------------------------------------------------------

interface InputBufferState {
  data: ArrayBufferView;
  usage: number;
  dirty: boolean;
  buffer?: GpuBuffer;
}

export interface InputBufferOptions {
  label?: string;
  /** Extra usages; STORAGE and COPY_DST are always set. */
  usage?: number;
}

export class InputBufferNode extends HostNode {
  readonly state: SharedCell<InputBufferState>;
  readonly label: string;

  constructor(data: ArrayBufferView = new Uint8Array(0), options: InputBufferOptions = {}) {
    super();
    this.label = options.label ?? 'input_buffer';
    this.state = new SharedCell<InputBufferState>(
      {
        data,
        usage: BufferUsage.STORAGE | BufferUsage.COPY_DST | (options.usage ?? 0),
        dirty: true,
      },
      state => state.buffer?.destroy()
    );
  }

  set(data: ArrayBufferView) {
    this.state.withLock(a => a.set({ ...a.get(), data, dirty: true }));
  }

  get(): ArrayBufferView {
    return this.state.read().data;
  }

  addUsages(usage: number) {
    this.state.withLock(a => {
      const current = a.get();
      a.set({ ...current, usage: current.usage | usage });
    });
  }

  get usage(): number {
    return this.state.read().usage;
  }

  /** Byte length of the data the next run uploads. */
  size(): number {
    return this.state.read().data.byteLength;
  }

  slots(): SlotSet {
    return { inputs: [], outputs: [{ name: INPUT_BUFFER_SLOT, kind: 'buffer' }] };
  }

  run(io: HostNodeIO, backend: GpuBackend): NodeRunResult {
    const buffer = this.state.withLock(a => {
      const state = a.get();
      const size = state.data.byteLength;
      let buffer = state.buffer;

      if (!buffer || buffer.size !== size || buffer.usage !== state.usage) {
        buffer?.destroy();
        buffer = backend.createBuffer({ label: this.label, size, usage: state.usage });
        backend.writeBuffer(buffer, state.data);
      } else if (state.dirty) {
        backend.writeBuffer(buffer, state.data);
      }

      a.set({ ...state, buffer, dirty: false });
      return buffer;
    });

    io.setOutput(INPUT_BUFFER_SLOT, { kind: 'buffer', buffer });
    return { success: true };
  }
}

// ------------------------------------------------------------------
// Output
// ------------------------------------------------------------------

export type OutputBufferState =
  | { status: 'not_created' }
  | { status: 'ready_to_map'; buffer: GpuBuffer }
  | { status: 'waiting_for_map'; buffer: GpuBuffer }
  | { status: 'mapped'; buffer: GpuBuffer; data: ArrayBuffer }
  | { status: 'mapping_error'; message: string };

export type OutputErrorCode = 'MappedBufferNotFound' | 'CannotLock';

export type TakeResult<T> =
  | { success: true; data: T }
  | { success: false; error: OutputErrorCode; message: string };

const OUTPUT_ERROR_MESSAGES: Record<OutputErrorCode, string> = {
  MappedBufferNotFound: 'Buffer already consumed, not mapped or not created',
  CannotLock: 'The state is locked and cannot be used right now',
};

function takeError<T>(error: OutputErrorCode): TakeResult<T> {
  return { success: false, error, message: OUTPUT_ERROR_MESSAGES[error] };
}

/**
 * Copies its input into a map-readable staging buffer each run.
 * The staging buffer is reused while the input size stays the same.
 */
export class OutputBufferNode extends HostNode {
  readonly state = new SharedCell<OutputBufferState>({ status: 'not_created' });

  get status(): OutputBufferState['status'] {
    return this.state.peek().status;
  }

  slots(): SlotSet {
    return { inputs: [{ name: OUTPUT_BUFFER_SLOT, kind: 'buffer' }], outputs: [] };
  }

  run(io: HostNodeIO, backend: GpuBackend): NodeRunResult {
    const input = io.getInput(OUTPUT_BUFFER_SLOT);
    if (input?.kind !== 'buffer') {
      return {
        success: false,
        errors: [graphError('MissingInputSlot', `Slot '${OUTPUT_BUFFER_SLOT}' of '${io.nodeName}' holds no buffer`, {
          node: io.nodeName,
          slot: OUTPUT_BUFFER_SLOT,
        })],
      };
    }
    const size = input.buffer.size;

    this.state.withLock(a => {
      const state = a.get();
      const previous = state.status === 'ready_to_map' || state.status === 'mapped' ? state.buffer : undefined;

      let staging: GpuBuffer;
      if (previous && previous.size === size) {
        staging = previous;
      } else {
        previous?.destroy();
        staging = backend.createBuffer({
          label: 'output_buffer',
          size,
          usage: BufferUsage.COPY_DST | BufferUsage.MAP_READ,
        });
      }

      backend.copyBufferToBuffer(input.buffer, staging, size);
      a.set({ status: 'ready_to_map', buffer: staging });
    });

    return { success: true };
  }

  /**
   * Reads back a buffer waiting in `ready_to_map`. A run that lands while the
   * read is in flight wins; the stale result and its buffer are dropped.
   */
  async mapPending(backend: GpuBackend): Promise<void> {
    const buffer = this.state.withLock(a => {
      const state = a.get();
      if (state.status !== 'ready_to_map') return undefined;
      a.set({ status: 'waiting_for_map', buffer: state.buffer });
      return state.buffer;
    });
    if (!buffer) return;

    let next: OutputBufferState;
    try {
      const data = await backend.readBuffer(buffer);
      next = { status: 'mapped', buffer, data };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[OutputBufferNode] Failed to map buffer '${buffer.label ?? ''}':`, message);
      next = { status: 'mapping_error', message };
    }

    const current = this.state.withLock(a => {
      const state = a.get();
      if (state.status !== 'waiting_for_map' || state.buffer !== buffer) return false;
      a.set(next);
      return true;
    });
    // A superseded or unreadable staging buffer is no longer referenced by any state.
    if (!current || next.status === 'mapping_error') buffer.destroy();
  }

  bufferReady(): boolean {
    const result = this.state.tryWithLock(a => a.get().status === 'mapped');
    return result.acquired && result.value;
  }

  /** Hands the mapped contents to the caller and resets to `not_created`. */
  takeBuffer(): TakeResult<ArrayBuffer> {
    const result = this.state.tryWithLock((a): TakeResult<ArrayBuffer> => {
      const state = a.get();
      if (state.status !== 'mapped') return takeError('MappedBufferNotFound');
      state.buffer.destroy();
      a.set({ status: 'not_created' });
      return { success: true, data: state.data };
    });
    return result.acquired ? result.value : takeError('CannotLock');
  }

  takeBufferAs<T>(view: new (buffer: ArrayBuffer) => T): TakeResult<T> {
    const taken = this.takeBuffer();
    if (!taken.success) return taken;
    return { success: true, data: new view(taken.data) };
  }
}
