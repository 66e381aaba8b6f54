/**
 * @file sub-graph-runner.ts
 * @description Owns deployed sub-graphs and runs them once per host tick.
 *
 * @external-interactions
 * - Pulls `ComputeNodeProvider` components from the `EntityStore` and advances them against
 *   the backend's pipeline cache.
 * - Delegates invocation to `SubGraphExecutor`; readback goes through `mapOutputBuffers()`.
 *
 * @pitfalls
 * - A definition is rebuilt only when the builder revision or a provider (identity or version)
 *   changes. A failed build is not retried until one of those changes.
 * - With an entity store, a provider registration whose entity no longer holds a
 *   `ComputeNodeProvider` fails with `UnresolvedProvider`; the builder's copy is not used.
 * - Failures are logged once per signature, but reported on every tick.
 */
import { action, makeObservable, observable } from 'mobx';
import { graphError, type BuildResult, type GraphError } from '../graph/errors';
import { RunnerOptionsSchema, type RunnerOptions } from '../graph/schema';
import type { SubGraphBuilder } from '../graph/sub-graph-builder';
import type { SubGraphDefinition } from '../graph/types';
import type { EntityStore, EntityId } from '../state/entity-store';
import type { GpuBackend, SlotValue } from '../webgpu/host-interface';
import { SubGraphExecutor, type InvocationReport, type LogLevel } from './executor';
import { OutputBufferNode } from './host-buffers';
import { ComputeNodeProvider, summarizeProviders, type NodeProvider, type ProviderState } from './provider';

export type TickReport = { subGraph: string } & InvocationReport;

interface ProviderStamp {
  name: string;
  entity: EntityId;
  // undefined when the entity store no longer holds a provider for the entity
  provider?: NodeProvider;
  version: number;
}

interface Deployment {
  builder: SubGraphBuilder;
  revision: number;
  stamps: ProviderStamp[];
  definition?: SubGraphDefinition;
  failure?: GraphError[];
  logged: boolean;
}

export class SubGraphRunner {
  @observable.ref
  lastReports: readonly TickReport[] = [];

  private readonly deployments = new Map<string, Deployment>();
  private readonly executor: SubGraphExecutor;
  private readonly options: RunnerOptions;

  constructor(
    private readonly backend: GpuBackend,
    private readonly entities?: EntityStore,
    options: RunnerOptions = {}
  ) {
    const parsed = RunnerOptionsSchema.safeParse(options);
    if (!parsed.success) {
      const details = parsed.error.issues.map(i => `${i.path.map(String).join('.')}: ${i.message}`).join('; ');
      throw new Error(`[SubGraphRunner] Invalid options: ${details}`);
    }
    this.options = parsed.data;
    this.executor = new SubGraphExecutor(backend, {
      maxWorkgroupsPerDimension: this.options.maxWorkgroupsPerDimension,
      log: (level, message, payload) => this.log(level, message, payload),
    });
    makeObservable(this);
  }

  /** Registers a builder under its name, replacing any earlier deployment of that name. */
  deploy(builder: SubGraphBuilder): string {
    const name = builder.currentName;
    if (!name) {
      throw new Error('[SubGraphRunner] Cannot deploy a sub-graph without a name');
    }
    if (this.deployments.has(name)) {
      this.executor.prune(name, new Set());
    }
    this.deployments.set(name, { builder, revision: -1, stamps: [], logged: false });
    this.log('debug', `Deployed '${name}'`);
    return name;
  }

  undeploy(name: string): boolean {
    if (!this.deployments.delete(name)) return false;
    this.executor.prune(name, new Set());
    this.log('debug', `Undeployed '${name}'`);
    return true;
  }

  /** The definition currently in use for `name`, if it has been built. */
  definition(name: string): SubGraphDefinition | undefined {
    return this.deployments.get(name)?.definition;
  }

  get names(): string[] {
    return [...this.deployments.keys()];
  }

  /**
   * Runs every deployed sub-graph once, in deployment order.
   * `inputs` maps a sub-graph name to the values of its graph inputs.
   */
  tick(inputs: ReadonlyMap<string, ReadonlyMap<string, SlotValue>> = new Map()): TickReport[] {
    const reports: TickReport[] = [];
    for (const [name, deployment] of this.deployments) {
      reports.push({ subGraph: name, ...this.step(name, deployment, inputs.get(name)) });
    }
    this.setReports(reports);
    return reports;
  }

  /** Resolves once every pending output buffer read has settled. */
  async mapOutputBuffers(): Promise<void> {
    const reads: Promise<void>[] = [];
    for (const { definition } of this.deployments.values()) {
      definition?.nodes.forEach(node => {
        if (node instanceof OutputBufferNode) reads.push(node.mapPending(this.backend));
      });
    }
    await Promise.all(reads);
  }

  /** Releases every cached output resource. Deployments stay registered. */
  destroy() {
    this.executor.destroy();
  }

  private step(
    name: string,
    deployment: Deployment,
    inputs: ReadonlyMap<string, SlotValue> | undefined
  ): InvocationReport {
    // 1. Pull providers
    const stamps = this.pullProviders(deployment.builder);
    if (deployment.revision !== deployment.builder.revision || !sameStamps(deployment.stamps, stamps)) {
      deployment.revision = deployment.builder.revision;
      deployment.stamps = stamps;
      deployment.definition = undefined;
      deployment.failure = undefined;
      deployment.logged = false;
    }

    // 2. Provider readiness
    const failed: GraphError[] = [];
    const states: ProviderState[] = [];
    for (const stamp of stamps) {
      if (!stamp.provider) {
        failed.push(graphError('UnresolvedProvider', `Provider of '${stamp.name}' is missing from entity ${stamp.entity}`, {
          node: stamp.name,
        }));
        continue;
      }
      const state = stamp.provider.state();
      if (state.status === 'error') {
        failed.push(graphError('ProviderFailed', `Provider of '${stamp.name}' failed: ${state.message}`, {
          node: stamp.name,
        }));
      }
      states.push(state);
    }
    if (failed.length > 0) {
      return this.fail(name, deployment, failed);
    }
    const summary = summarizeProviders(states);
    if (summary.status !== 'ready') {
      return { status: 'skipped', reason: 'providers_pending' };
    }

    // 3. Build
    if (deployment.failure) {
      return this.fail(name, deployment, deployment.failure);
    }
    if (!deployment.definition) {
      const built = this.build(deployment);
      if (!built.success) {
        deployment.failure = built.errors;
        return this.fail(name, deployment, built.errors);
      }
      deployment.definition = built.data;
      this.executor.prune(name, new Set(built.data.nodes.keys()));
      this.log('debug', `Built '${name}'`, built.data.order);
    }

    // 4. Invoke
    const report = this.executor.invoke(deployment.definition, inputs);
    if (report.status === 'failed') {
      this.log('error', `Invocation of '${name}' failed`, report.errors);
    }
    return report;
  }

  private build(deployment: Deployment): BuildResult<SubGraphDefinition> {
    const byName = new Map<string, NodeProvider>();
    for (const stamp of deployment.stamps) {
      if (stamp.provider) byName.set(stamp.name, stamp.provider);
    }
    return deployment.builder.build(registration => byName.get(registration.name));
  }

  /**
   * With an entity store, providers are read from their entities on every tick.
   * Without one, the providers registered on the builder are used.
   */
  private pullProviders(builder: SubGraphBuilder): ProviderStamp[] {
    return builder.providers().map(({ name, entity, provider: registered }) => {
      const provider = this.entities ? this.entities.get(entity, ComputeNodeProvider) : registered;
      if (!provider) return { name, entity, version: -1 };
      provider.update(this.backend.pipelines);
      return { name, entity, provider, version: provider.version };
    });
  }

  private fail(name: string, deployment: Deployment, errors: GraphError[]): InvocationReport {
    if (!deployment.logged) {
      deployment.logged = true;
      this.log('error', `Sub-graph '${name}' cannot run`, errors);
    }
    return { status: 'failed', errors, dispatches: [] };
  }

  @action
  private setReports(reports: TickReport[]) {
    this.lastReports = reports;
  }

  private log(level: LogLevel, message: string, payload?: unknown) {
    if (level === 'debug' && !this.options.debug) return;
    this.options.logHandler?.(message, payload);
    const line = `[SubGraphRunner] ${message}`;
    if (payload === undefined) {
      console[level](line);
    } else {
      console[level](line, payload);
    }
  }
}

function sameStamps(a: readonly ProviderStamp[], b: readonly ProviderStamp[]): boolean {
  return a.length === b.length && a.every((s, i) => s.provider === b[i].provider && s.version === b[i].version);
}
