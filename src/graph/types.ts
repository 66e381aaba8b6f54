import type {
  BufferDescriptor,
  ShaderRef,
  TextureDescriptor,
  Workgroups,
} from '../webgpu/host-interface';
import type { HostNode } from '../runtime/host-node';
import type { SubGraphTrigger } from '../runtime/trigger';
import type { EntityId } from '../state/entity-store';

export type ResourceKind = 'buffer' | 'texture';
export type BindingDirection = 'input' | 'output' | 'input_output';

export type ResourceCreation<D> =
  | { mode: 'static'; descriptor: D }
  | { mode: 'from_context'; resolve: (ctx: GraphContext) => D };

interface BindingBase {
  readonly name: string;
  readonly index: number;
}

export type InputBinding = BindingBase & {
  readonly direction: 'input' | 'input_output';
  readonly kind: ResourceKind;
};

export type OutputBinding = BindingBase & (
  | { readonly direction: 'output'; readonly kind: 'buffer'; readonly creation: ResourceCreation<BufferDescriptor> }
  | { readonly direction: 'output'; readonly kind: 'texture'; readonly creation: ResourceCreation<TextureDescriptor> }
);

export type ResourceBinding = InputBinding | OutputBinding;

export type DispatchStrategy =
  | { type: 'fixed'; workgroups: Workgroups }
  | { type: 'from_context'; resolve: (ctx: GraphContext) => Workgroups };

export interface BufferInfo {
  readonly label?: string;
  readonly size: number;
  readonly usage: number;
}

export interface TextureInfo {
  readonly label?: string;
  readonly width: number;
  readonly height: number;
  readonly depthOrArrayLayers: number;
  readonly format: string;
  readonly usage: number;
}

/**
 * Read-only view over the slot resources resolved so far for one node
 * (or over the graph inputs, for trigger predicates).
 */
export interface GraphContext {
  readonly nodeName: string;
  slotNames(): string[];
  has(slot: string): boolean;
  kind(slot: string): ResourceKind | undefined;
  /** `undefined` when the slot was never produced. */
  bufferSize(slot: string): number | undefined;
  getInputBuffer(slot: string): BufferInfo | undefined;
  getInputTexture(slot: string): TextureInfo | undefined;
}

export type ShaderDefs = Readonly<Record<string, number>>;

export interface NodeDescriptor {
  readonly label?: string;
  readonly shader: ShaderRef;
  readonly entryPoint: string;
  readonly shaderDefs: ShaderDefs;
  readonly bindGroupIndex: number;
  readonly bindings: readonly ResourceBinding[];
  readonly dispatch: DispatchStrategy;
}

export interface SlotInfo {
  readonly name: string;
  readonly kind: ResourceKind;
}

export interface SlotSet {
  readonly inputs: readonly SlotInfo[];
  readonly outputs: readonly SlotInfo[];
}

export interface NodeEdge {
  readonly from: string;
  readonly to: string;
}

export interface SlotEdge {
  readonly fromNode: string;
  readonly fromSlot: string;
  readonly toNode: string;
  readonly toSlot: string;
}

export type EdgeRef = NodeEdge | SlotEdge;

export interface ComputeGraphNode {
  readonly type: 'compute';
  readonly descriptor: NodeDescriptor;
  readonly slots: SlotSet;
  /** Set when the node was resolved from a provider. */
  readonly entity?: EntityId;
}

export type GraphNode = ComputeGraphNode | HostNode;

export interface SubGraphDefinition {
  readonly name: string;
  /** Registration order. */
  readonly nodes: ReadonlyMap<string, GraphNode>;
  /** Topological order; ties broken by registration order. */
  readonly order: readonly string[];
  readonly nodeEdges: readonly NodeEdge[];
  readonly slotEdges: readonly SlotEdge[];
  /** Slot edges grouped by destination node. */
  readonly incoming: ReadonlyMap<string, readonly SlotEdge[]>;
  readonly graphInputs: readonly SlotInfo[];
  /** Provider-backed node name -> owning entity. */
  readonly providers: ReadonlyMap<string, EntityId>;
  readonly trigger: SubGraphTrigger;
}
