import { freeze } from 'immer';
import { GRAPH_INPUT_NODE } from '../constants';
import { HostNode } from '../runtime/host-node';
import type { NodeProvider } from '../runtime/provider';
import { Trigger, type SubGraphTrigger } from '../runtime/trigger';
import type { EntityId } from '../state/entity-store';
import { graphError, type BuildResult, type GraphError } from './errors';
import { slotsOf } from './node-builder';
import { SlotGraph } from './slot-graph';
import type {
  GraphNode,
  NodeDescriptor,
  NodeEdge,
  ResourceKind,
  SlotEdge,
  SlotInfo,
  SubGraphDefinition,
} from './types';

type Registration =
  | { type: 'node'; name: string; node: NodeDescriptor | HostNode }
  | { type: 'provider'; name: string; entity: EntityId; provider: NodeProvider };

export interface ProviderRegistration {
  name: string;
  entity: EntityId;
  provider: NodeProvider;
}

/** Supplies the current provider for a registration, e.g. from an entity store. */
export type ProviderLookup = (registration: ProviderRegistration) => NodeProvider | undefined;

/**
 * Collects nodes, providers and edges, then compiles them into a frozen
 * `SubGraphDefinition`. Edges may reference nodes registered later; everything is
 * checked in `build()`, which can be called again after further changes.
 */
export class SubGraphBuilder {
  private graphName?: string;
  private readonly registrations: Registration[] = [];
  private readonly registrationErrors: GraphError[] = [];
  private readonly nodeEdges: NodeEdge[] = [];
  private readonly slotEdges: SlotEdge[] = [];
  private readonly graphInputs = new Map<string, ResourceKind>();
  private triggerValue: SubGraphTrigger = Trigger.always();
  private revisionValue = 0;

  constructor(name?: string) {
    this.graphName = name;
  }

  /** Incremented on every change; lets callers detect that a rebuild is needed. */
  get revision(): number {
    return this.revisionValue;
  }

  get currentName(): string | undefined {
    return this.graphName;
  }

  name(name: string): this {
    this.graphName = name;
    return this.touch();
  }

  trigger(trigger: SubGraphTrigger): this {
    this.triggerValue = trigger;
    return this.touch();
  }

  addNode(name: string, node: NodeDescriptor | HostNode): this {
    if (this.checkName(name)) {
      this.registrations.push({ type: 'node', name, node });
    }
    return this.touch();
  }

  addNodeProvider(name: string, entity: EntityId, provider: NodeProvider): this {
    if (this.checkName(name)) {
      this.registrations.push({ type: 'provider', name, entity, provider });
    }
    return this.touch();
  }

  addNodeEdge(from: string, to: string): this {
    this.nodeEdges.push({ from, to });
    return this.touch();
  }

  addSlotEdge(fromNode: string, fromSlot: string, toNode: string, toSlot: string): this {
    this.slotEdges.push({ fromNode, fromSlot, toNode, toSlot });
    return this.touch();
  }

  /** Declares a slot the host feeds through `GRAPH_INPUT_NODE`. */
  addGraphInput(slot: string, kind: ResourceKind): this {
    this.graphInputs.set(slot, kind);
    return this.touch();
  }

  providers(): ProviderRegistration[] {
    const result: ProviderRegistration[] = [];
    for (const r of this.registrations) {
      if (r.type === 'provider') result.push({ name: r.name, entity: r.entity, provider: r.provider });
    }
    return result;
  }

  build(lookup?: ProviderLookup): BuildResult<SubGraphDefinition> {
    const errors: GraphError[] = [...this.registrationErrors];
    const name = this.graphName;
    if (!name) {
      errors.push(graphError('MissingName', 'Sub-graph has no name'));
    }

    // 1. Resolve providers
    const nodes = new Map<string, GraphNode>();
    const providers = new Map<string, EntityId>();
    for (const r of this.registrations) {
      if (r.type === 'node') {
        nodes.set(r.name, r.node instanceof HostNode ? r.node : { type: 'compute', descriptor: r.node, slots: slotsOf(r.node.bindings) });
        continue;
      }
      const provider = lookup?.({ name: r.name, entity: r.entity, provider: r.provider }) ?? r.provider;
      const descriptor = provider.resolve();
      if (!descriptor) {
        const state = provider.state();
        const detail = state.status === 'error' ? `failed: ${state.message}` : `is ${state.status}`;
        errors.push(graphError('UnresolvedProvider', `Provider of '${r.name}' ${detail}`, { node: r.name }));
        continue;
      }
      nodes.set(r.name, { type: 'compute', descriptor, slots: slotsOf(descriptor.bindings), entity: r.entity });
      providers.set(r.name, r.entity);
    }
    if (errors.some(e => e.code === 'UnresolvedProvider')) {
      return { success: false, errors };
    }

    // 2. Validate and order
    const graphInputs: SlotInfo[] = [...this.graphInputs].map(([slot, kind]) => ({ name: slot, kind }));
    const graph = new SlotGraph(graphInputs);
    nodes.forEach((node, nodeName) => {
      graph.addNode(nodeName, node.type === 'compute' ? node.slots : node.slots());
    });
    this.nodeEdges.forEach(e => graph.addNodeEdge(e));
    this.slotEdges.forEach(e => graph.addSlotEdge(e));

    const compiled = graph.compile();
    if (!compiled.success) {
      errors.push(...compiled.errors);
    }
    if (errors.length > 0 || !compiled.success || !name) {
      return { success: false, errors };
    }

    // 3. Freeze
    const definition: SubGraphDefinition = {
      name,
      nodes,
      order: compiled.data.order,
      nodeEdges: [...this.nodeEdges],
      slotEdges: [...this.slotEdges],
      incoming: compiled.data.incoming,
      graphInputs,
      providers,
      trigger: this.triggerValue,
    };
    return { success: true, data: freeze(definition, true) };
  }

  private checkName(name: string): boolean {
    if (name === GRAPH_INPUT_NODE) {
      this.registrationErrors.push(graphError('ReservedNodeName', `'${name}' is reserved for graph inputs`, { node: name }));
      return false;
    }
    if (this.registrations.some(r => r.name === name)) {
      this.registrationErrors.push(graphError('DuplicateNodeName', `Node '${name}' is already registered`, { node: name }));
      return false;
    }
    return true;
  }

  private touch(): this {
    this.revisionValue++;
    return this;
  }
}
