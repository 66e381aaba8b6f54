import { GRAPH_INPUT_NODE } from '../constants';
import { MinHeap } from '../utils/min-heap';
import { graphError, type BuildResult, type GraphError } from './errors';
import type { EdgeRef, NodeEdge, SlotEdge, SlotInfo, SlotSet } from './types';

export interface CompiledSlotGraph {
  /** Topological order; ties broken by registration order. */
  order: string[];
  /** Slot edges grouped by destination node. */
  incoming: Map<string, SlotEdge[]>;
}

/**
 * Dependency graph over sub-graph nodes, addressed by registration index.
 * `GRAPH_INPUT_NODE` is not part of the arena: it may only appear as an edge source.
 */
export class SlotGraph {
  private readonly names: string[] = [];
  private readonly slotSets: SlotSet[] = [];
  private readonly indexByName = new Map<string, number>();
  private readonly nodeEdges: NodeEdge[] = [];
  private readonly slotEdges: SlotEdge[] = [];

  constructor(private readonly graphInputs: readonly SlotInfo[] = []) {}

  addNode(name: string, slots: SlotSet): number {
    if (this.indexByName.has(name) || name === GRAPH_INPUT_NODE) {
      throw new Error(`[SlotGraph] Node '${name}' cannot be added`);
    }
    const index = this.names.length;
    this.names.push(name);
    this.slotSets.push(slots);
    this.indexByName.set(name, index);
    return index;
  }

  addNodeEdge(edge: NodeEdge) {
    this.nodeEdges.push(edge);
  }

  addSlotEdge(edge: SlotEdge) {
    this.slotEdges.push(edge);
  }

  compile(): BuildResult<CompiledSlotGraph> {
    const errors: GraphError[] = [];
    const successors = this.names.map(() => new Set<number>());
    const link = (from: string, to: string) => {
      const a = this.indexByName.get(from);
      const b = this.indexByName.get(to);
      if (a !== undefined && b !== undefined) successors[a].add(b);
    };

    for (const edge of this.nodeEdges) {
      const sourceOk = this.checkSource(edge.from, edge, errors);
      const targetOk = this.checkTarget(edge.to, edge, errors);
      if (sourceOk && targetOk) link(edge.from, edge.to);
    }

    const fed = new Set<string>();
    const incoming = new Map<string, SlotEdge[]>();
    for (const edge of this.slotEdges) {
      const sourceOk = this.checkSource(edge.fromNode, edge, errors);
      const targetOk = this.checkTarget(edge.toNode, edge, errors);
      if (!sourceOk || !targetOk) continue;

      const output = this.outputSlot(edge.fromNode, edge.fromSlot);
      const input = this.inputSlot(edge.toNode, edge.toSlot);
      if (!output) {
        const message = edge.fromNode === GRAPH_INPUT_NODE
          ? `No graph input named '${edge.fromSlot}'`
          : `Node '${edge.fromNode}' has no output slot '${edge.fromSlot}'`;
        errors.push(graphError('UnknownSlotReference', message, { node: edge.fromNode, slot: edge.fromSlot, edge }));
      }
      if (!input) {
        errors.push(graphError(
          'UnknownSlotReference',
          `Node '${edge.toNode}' has no input slot '${edge.toSlot}'`,
          { node: edge.toNode, slot: edge.toSlot, edge }
        ));
      }
      if (!output || !input) continue;

      const key = JSON.stringify([edge.toNode, edge.toSlot]);
      if (fed.has(key)) {
        errors.push(graphError(
          'InputSlotOccupied',
          `Input slot '${edge.toSlot}' of '${edge.toNode}' is already fed`,
          { node: edge.toNode, slot: edge.toSlot, edge }
        ));
        continue;
      }
      fed.add(key);

      if (output.kind !== input.kind) {
        errors.push(graphError(
          'SlotKindMismatch',
          `'${edge.fromNode}.${edge.fromSlot}' (${output.kind}) cannot feed '${edge.toNode}.${edge.toSlot}' (${input.kind})`,
          { node: edge.toNode, slot: edge.toSlot, edge }
        ));
        continue;
      }

      link(edge.fromNode, edge.toNode);
      const list = incoming.get(edge.toNode) ?? [];
      list.push(edge);
      incoming.set(edge.toNode, list);
    }

    const cycle = this.findCycle(successors);
    if (cycle) {
      const path = cycle.map(i => this.names[i]);
      const from = path[path.length - 2];
      const to = path[path.length - 1];
      errors.push(graphError('CyclicGraph', `Cycle detected: ${path.join(' -> ')}`, { node: to, edge: { from, to } }));
    }

    if (errors.length > 0) {
      return { success: false, errors };
    }

    return {
      success: true,
      data: { order: this.sort(successors).map(i => this.names[i]), incoming },
    };
  }

  private checkSource(name: string, edge: EdgeRef, errors: GraphError[]): boolean {
    if (name === GRAPH_INPUT_NODE || this.indexByName.has(name)) return true;
    errors.push(graphError('UnknownNodeReference', `Unknown node '${name}'`, { node: name, edge }));
    return false;
  }

  private checkTarget(name: string, edge: EdgeRef, errors: GraphError[]): boolean {
    if (this.indexByName.has(name)) return true;
    const message = name === GRAPH_INPUT_NODE
      ? `'${GRAPH_INPUT_NODE}' can only be an edge source`
      : `Unknown node '${name}'`;
    errors.push(graphError('UnknownNodeReference', message, { node: name, edge }));
    return false;
  }

  private outputSlot(node: string, slot: string): SlotInfo | undefined {
    if (node === GRAPH_INPUT_NODE) return this.graphInputs.find(s => s.name === slot);
    const index = this.indexByName.get(node);
    return index === undefined ? undefined : this.slotSets[index].outputs.find(s => s.name === slot);
  }

  private inputSlot(node: string, slot: string): SlotInfo | undefined {
    const index = this.indexByName.get(node);
    return index === undefined ? undefined : this.slotSets[index].inputs.find(s => s.name === slot);
  }

  /**
   * Depth-first search with a recursion-stack marker.
   * Returns the path closed by the first back edge found, e.g. [a, b, a].
   */
  private findCycle(successors: Set<number>[]): number[] | undefined {
    const visited = new Set<number>();
    const recursionStack: number[] = [];
    const onStack = new Set<number>();

    const visit = (node: number): number[] | undefined => {
      visited.add(node);
      recursionStack.push(node);
      onStack.add(node);

      for (const next of successors[node]) {
        if (onStack.has(next)) {
          return [...recursionStack.slice(recursionStack.indexOf(next)), next];
        }
        if (!visited.has(next)) {
          const cycle = visit(next);
          if (cycle) return cycle;
        }
      }

      recursionStack.pop();
      onStack.delete(node);
      return undefined;
    };

    for (let i = 0; i < successors.length; i++) {
      if (visited.has(i)) continue;
      const cycle = visit(i);
      if (cycle) return cycle;
    }
    return undefined;
  }

  /** Kahn's algorithm; the heap picks the earliest registered ready node. */
  private sort(successors: Set<number>[]): number[] {
    const indegree = successors.map(() => 0);
    successors.forEach(targets => targets.forEach(t => { indegree[t]++; }));

    const ready = new MinHeap<number>(i => i);
    indegree.forEach((degree, i) => {
      if (degree === 0) ready.push(i);
    });

    const order: number[] = [];
    let next = ready.pop();
    while (next !== undefined) {
      order.push(next);
      for (const target of successors[next]) {
        indegree[target]--;
        if (indegree[target] === 0) ready.push(target);
      }
      next = ready.pop();
    }
    return order;
  }
}
