import { freeze } from 'immer';
import { DEFAULT_BIND_GROUP_INDEX } from '../constants';
import type { BufferDescriptor, ShaderRef, TextureDescriptor } from '../webgpu/host-interface';
import { graphError, type BuildResult, type GraphError } from './errors';
import {
  BindingDeclarationSchema,
  BufferDescriptorSchema,
  FixedWorkgroupsSchema,
  TextureDescriptorSchema,
  issuesToErrors,
} from './schema';
import type {
  BindingDirection,
  DispatchStrategy,
  GraphContext,
  NodeDescriptor,
  ResourceBinding,
  ResourceCreation,
  ResourceKind,
  SlotInfo,
  SlotSet,
} from './types';

type OutputResource =
  | { kind: 'buffer'; creation: ResourceCreation<BufferDescriptor> }
  | { kind: 'texture'; creation: ResourceCreation<TextureDescriptor> };

interface BindingDraft {
  name?: string;
  index?: number;
  direction?: BindingDirection;
  kind?: ResourceKind;
  output?: OutputResource;
}

/**
 * Fluent declaration of a compute node.
 *
 * ```ts
 * const node = new ComputeNodeBuilder()
 *   .shader({ id: 'shaders/fill.wgsl' })
 *   .entryPoint('main')
 *   .dispatch(Dispatch.perElement('buffer', { elementSize: 4 }))
 *   .bindResource().name('buffer').binding(0).inputOutput().buffer().add()
 *   .build();
 * ```
 *
 * Nothing is validated until `build()`, which reports every problem at once.
 */
export class ComputeNodeBuilder {
  private labelValue?: string;
  private shaderRef?: ShaderRef;
  private entryPointName?: string;
  private defs: Record<string, number> = {};
  private groupIndex = DEFAULT_BIND_GROUP_INDEX;
  private strategy?: DispatchStrategy;
  private readonly drafts: BindingDraft[] = [];

  label(label: string): this {
    this.labelValue = label;
    return this;
  }

  shader(shader: ShaderRef | string): this {
    this.shaderRef = typeof shader === 'string' ? { id: shader } : shader;
    return this;
  }

  entryPoint(name: string): this {
    this.entryPointName = name;
    return this;
  }

  /** Pipeline-overridable constants; merged with earlier calls. */
  shaderDefs(defs: Record<string, number>): this {
    this.defs = { ...this.defs, ...defs };
    return this;
  }

  bindGroupIndex(index: number): this {
    this.groupIndex = index;
    return this;
  }

  dispatch(strategy: DispatchStrategy): this {
    this.strategy = strategy;
    return this;
  }

  bindResource(): BindingBuilder {
    return new BindingBuilder(this, draft => this.drafts.push(draft));
  }

  build(): BuildResult<NodeDescriptor> {
    const errors: GraphError[] = [];

    if (!this.shaderRef || this.shaderRef.id === '') {
      errors.push(graphError('MissingShader', 'Compute node has no shader'));
    }
    if (!this.entryPointName) {
      errors.push(graphError('MissingEntryPoint', 'Compute node has no entry point'));
    }
    if (!this.strategy) {
      errors.push(graphError('MissingDispatchStrategy', 'Compute node has no dispatch strategy'));
    } else if (this.strategy.type === 'fixed') {
      const parsed = FixedWorkgroupsSchema.safeParse(this.strategy.workgroups);
      if (!parsed.success) {
        errors.push(...issuesToErrors(parsed.error.issues, 'InvalidDispatch', 'Fixed workgroups'));
      }
    }
    if (!Number.isInteger(this.groupIndex) || this.groupIndex < 0) {
      errors.push(graphError('InvalidBinding', `Bind group index ${this.groupIndex} must be a non-negative integer`));
    }

    const bindings = this.collectBindings(errors);

    if (errors.length > 0 || !this.shaderRef || !this.entryPointName || !this.strategy) {
      return { success: false, errors };
    }

    const descriptor: NodeDescriptor = {
      label: this.labelValue,
      shader: { ...this.shaderRef },
      entryPoint: this.entryPointName,
      shaderDefs: { ...this.defs },
      bindGroupIndex: this.groupIndex,
      bindings,
      dispatch: this.strategy,
    };
    return { success: true, data: freeze(descriptor, true) };
  }

  private collectBindings(errors: GraphError[]): ResourceBinding[] {
    const bindings: ResourceBinding[] = [];
    const byIndex = new Map<number, string>();
    const names = new Set<string>();

    this.drafts.forEach((draft, position) => {
      const parsed = BindingDeclarationSchema.safeParse({
        name: draft.name,
        index: draft.index,
        direction: draft.direction,
        kind: draft.kind,
      });
      if (!parsed.success) {
        errors.push(...issuesToErrors(parsed.error.issues, 'InvalidBinding', `Binding #${position}`));
        return;
      }
      const { name, index, direction, kind } = parsed.data;

      const owner = byIndex.get(index);
      if (owner !== undefined) {
        errors.push(graphError(
          'DuplicateBindingIndex',
          `Binding index ${index} is declared by both '${owner}' and '${name}'`,
          { slot: name }
        ));
        return;
      }
      if (names.has(name)) {
        errors.push(graphError('DuplicateBindingName', `Binding name '${name}' is declared twice`, { slot: name }));
        return;
      }
      byIndex.set(index, name);
      names.add(name);

      if (direction !== 'output') {
        bindings.push({ name, index, direction, kind });
        return;
      }

      const output = draft.output;
      if (!output) {
        errors.push(graphError('InvalidBinding', `Output binding '${name}' declares no resource`, { slot: name }));
        return;
      }
      if (output.creation.mode === 'static') {
        const schema = output.kind === 'buffer' ? BufferDescriptorSchema : TextureDescriptorSchema;
        const check = schema.safeParse(output.creation.descriptor);
        if (!check.success) {
          errors.push(...issuesToErrors(check.error.issues, 'InvalidBinding', `Output binding '${name}'`, { slot: name }));
          return;
        }
      }
      if (output.kind === 'buffer') {
        bindings.push({ name, index, direction, kind: 'buffer', creation: output.creation });
      } else {
        bindings.push({ name, index, direction, kind: 'texture', creation: output.creation });
      }
    });

    return bindings;
  }
}

/** One `@binding` of the node's bind group. Returns to the node builder on `add()`. */
export class BindingBuilder {
  private readonly draft: BindingDraft = {};

  constructor(
    private readonly node: ComputeNodeBuilder,
    private readonly commit: (draft: BindingDraft) => void
  ) {}

  name(name: string): this {
    this.draft.name = name;
    return this;
  }

  binding(index: number): this {
    this.draft.index = index;
    return this;
  }

  input(): BindingKindBuilder {
    this.draft.direction = 'input';
    return new BindingKindBuilder(this, kind => { this.draft.kind = kind; });
  }

  inputOutput(): BindingKindBuilder {
    this.draft.direction = 'input_output';
    return new BindingKindBuilder(this, kind => { this.draft.kind = kind; });
  }

  output(): OutputResourceBuilder {
    this.draft.direction = 'output';
    return new OutputResourceBuilder(this, output => {
      this.draft.kind = output.kind;
      this.draft.output = output;
    });
  }

  add(): ComputeNodeBuilder {
    this.commit({ ...this.draft });
    return this.node;
  }
}

export class BindingKindBuilder {
  constructor(
    private readonly binding: BindingBuilder,
    private readonly setKind: (kind: ResourceKind) => void
  ) {}

  buffer(): BindingBuilder {
    this.setKind('buffer');
    return this.binding;
  }

  texture(): BindingBuilder {
    this.setKind('texture');
    return this.binding;
  }
}

/** How the resource behind an output binding is created. */
export class OutputResourceBuilder {
  constructor(
    private readonly binding: BindingBuilder,
    private readonly setOutput: (output: OutputResource) => void
  ) {}

  buffer(descriptor: BufferDescriptor): BindingBuilder {
    this.setOutput({ kind: 'buffer', creation: { mode: 'static', descriptor } });
    return this.binding;
  }

  bufferFromContext(resolve: (ctx: GraphContext) => BufferDescriptor): BindingBuilder {
    this.setOutput({ kind: 'buffer', creation: { mode: 'from_context', resolve } });
    return this.binding;
  }

  texture(descriptor: TextureDescriptor): BindingBuilder {
    this.setOutput({ kind: 'texture', creation: { mode: 'static', descriptor } });
    return this.binding;
  }

  textureFromContext(resolve: (ctx: GraphContext) => TextureDescriptor): BindingBuilder {
    this.setOutput({ kind: 'texture', creation: { mode: 'from_context', resolve } });
    return this.binding;
  }
}

/**
 * Slots a compute node exposes to the sub-graph.
 * `input_output` bindings appear on both sides under the same name.
 */
export function slotsOf(bindings: readonly ResourceBinding[]): SlotSet {
  const inputs: SlotInfo[] = [];
  const outputs: SlotInfo[] = [];
  for (const b of bindings) {
    if (b.direction !== 'output') inputs.push({ name: b.name, kind: b.kind });
    if (b.direction !== 'input') outputs.push({ name: b.name, kind: b.kind });
  }
  return { inputs, outputs };
}
