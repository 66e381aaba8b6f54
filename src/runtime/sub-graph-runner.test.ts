import { describe, it, expect, vi, afterEach } from 'vitest';
import { BufferUsage, GRAPH_INPUT_NODE } from '../constants';
import { Dispatch } from '../graph/dispatch';
import { expectBuilt } from '../graph/errors';
import { ComputeNodeBuilder } from '../graph/node-builder';
import { SubGraphBuilder } from '../graph/sub-graph-builder';
import { EntityStore } from '../state/entity-store';
import { MockGpuBackend } from '../webgpu/mock-backend';
import { InputBufferNode, OutputBufferNode } from './host-buffers';
import { ComputeNodeProvider } from './provider';
import { SubGraphRunner } from './sub-graph-runner';

function fillDescriptor(shader = 'shaders/fill.wgsl') {
  return expectBuilt(
    new ComputeNodeBuilder()
      .shader(shader)
      .entryPoint('main')
      .dispatch(Dispatch.perElement('buffer', { elementSize: 4 }))
      .bindResource().name('buffer').binding(0).inputOutput().buffer().add()
      .build()
  );
}

function fixedNode(x = 1) {
  return expectBuilt(new ComputeNodeBuilder().shader('shaders/work.wgsl').entryPoint('main').dispatch(Dispatch.fixed(x)).build());
}

function fillGraph(backend: MockGpuBackend) {
  const entities = new EntityStore();
  const provider = new ComputeNodeProvider(fillDescriptor());
  const entity = entities.spawn(provider);
  const output = new OutputBufferNode();
  const builder = new SubGraphBuilder('fill')
    .addNode('input_buffer', new InputBufferNode(new Float32Array(4)))
    .addNodeProvider('fill', entity, provider)
    .addNode('output_buffer', output)
    .addSlotEdge('input_buffer', 'out', 'fill', 'buffer')
    .addSlotEdge('fill', 'buffer', 'output_buffer', 'in');
  const runner = new SubGraphRunner(backend, entities);
  runner.deploy(builder);
  return { entities, entity, provider, output, builder, runner };
}

describe('SubGraphRunner', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('skips while providers compile, then builds and runs', () => {
    const { runner } = fillGraph(new MockGpuBackend());

    expect(runner.tick()).toEqual([{ subGraph: 'fill', status: 'skipped', reason: 'providers_pending' }]);
    expect(runner.definition('fill')).toBeUndefined();

    const reports = runner.tick();
    expect(reports).toEqual([
      { subGraph: 'fill', status: 'ran', dispatches: [{ node: 'fill', workgroups: [4, 1, 1] }] },
    ]);
    expect(runner.lastReports).toBe(reports);
    expect(runner.definition('fill')?.order).toEqual(['input_buffer', 'fill', 'output_buffer']);
  });

  it('reads output buffers back after a run', async () => {
    const backend = new MockGpuBackend({
      onDispatch: (command, mock) => {
        const resource = command.entries[0].resource;
        if (resource.kind === 'buffer') new Float32Array(mock.toMock(resource.buffer).data.buffer).fill(1.5);
      },
    });
    const { runner, output } = fillGraph(backend);
    runner.tick();
    runner.tick();
    expect(output.bufferReady()).toBe(false);

    await runner.mapOutputBuffers();

    expect(output.bufferReady()).toBe(true);
    const taken = output.takeBufferAs(Float32Array);
    if (!taken.success) throw new Error(taken.message);
    expect(Array.from(taken.data)).toEqual([1.5, 1.5, 1.5, 1.5]);
  });

  it('rebuilds when a provider publishes a new descriptor', () => {
    const { runner, provider } = fillGraph(new MockGpuBackend());
    runner.tick();
    runner.tick();
    const first = runner.definition('fill');

    const next = fillDescriptor('shaders/fill_v2.wgsl');
    provider.setDescriptor(next);
    expect(runner.tick()).toEqual([{ subGraph: 'fill', status: 'skipped', reason: 'providers_pending' }]);
    expect(runner.definition('fill')).toBeUndefined();

    expect(runner.tick()[0].status).toBe('ran');
    const fill = runner.definition('fill')?.nodes.get('fill');
    expect(runner.definition('fill')).not.toBe(first);
    expect(fill?.type === 'compute' ? fill.descriptor : undefined).toBe(next);
  });

  it('pulls the provider currently stored on the entity', () => {
    const { runner, entities, entity } = fillGraph(new MockGpuBackend());
    runner.tick();
    runner.tick();

    const replacement = new ComputeNodeProvider(fillDescriptor('shaders/replacement.wgsl'));
    entities.insert(entity, replacement);
    expect(runner.tick()[0].status).toBe('skipped');
    expect(runner.tick()[0].status).toBe('ran');

    const fill = runner.definition('fill')?.nodes.get('fill');
    expect(fill?.type === 'compute' ? fill.descriptor : undefined).toBe(replacement.descriptor);
  });

  it('fails with UnresolvedProvider once the provider entity is despawned', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { runner, entities, entity } = fillGraph(new MockGpuBackend());
    runner.tick();
    expect(runner.tick()[0].status).toBe('ran');

    entities.despawn(entity);
    expect(runner.tick()).toEqual([{
      subGraph: 'fill',
      status: 'failed',
      errors: [{ code: 'UnresolvedProvider', message: `Provider of 'fill' is missing from entity ${entity}`, node: 'fill' }],
      dispatches: [],
    }]);
    expect(runner.definition('fill')).toBeUndefined();
  });

  it('keeps running other sub-graphs when a strategy throws', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const backend = new MockGpuBackend();
    const runner = new SubGraphRunner(backend);
    runner.deploy(new SubGraphBuilder('broken').addNode('work', expectBuilt(
      new ComputeNodeBuilder()
        .shader('shaders/work.wgsl')
        .entryPoint('main')
        .dispatch(Dispatch.fromContext(() => { throw new Error('boom'); }))
        .build()
    )));
    runner.deploy(new SubGraphBuilder('healthy').addNode('work', fixedNode()));

    const reports = runner.tick();

    expect(reports).toEqual([
      {
        subGraph: 'broken',
        status: 'failed',
        errors: [{ code: 'StrategyFailed', message: "Dispatch strategy of 'work' failed: boom", node: 'work' }],
        dispatches: [],
      },
      { subGraph: 'healthy', status: 'ran', dispatches: [{ node: 'work', workgroups: [1, 1, 1] }] },
    ]);
    expect(runner.lastReports).toBe(reports);
    expect(backend.discards).toBe(1);
    expect(backend.submits).toBe(1);
  });

  it('reports a failed provider on every tick and logs it once', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const backend = new MockGpuBackend();
    backend.pipelines.failShader('shaders/fill.wgsl', 'bad shader');
    const logHandler = vi.fn();
    const entities = new EntityStore();
    const provider = new ComputeNodeProvider(fillDescriptor());
    const runner = new SubGraphRunner(backend, entities, { logHandler });
    runner.deploy(new SubGraphBuilder('fill').addNodeProvider('fill', entities.spawn(provider), provider));

    runner.tick();
    const error = { code: 'ProviderFailed', message: "Provider of 'fill' failed: bad shader", node: 'fill' };
    expect(runner.tick()).toEqual([{ subGraph: 'fill', status: 'failed', errors: [error], dispatches: [] }]);
    expect(runner.tick()).toEqual([{ subGraph: 'fill', status: 'failed', errors: [error], dispatches: [] }]);

    expect(logHandler).toHaveBeenCalledTimes(1);
    expect(logHandler).toHaveBeenCalledWith("Sub-graph 'fill' cannot run", [error]);
    expect(console.error).toHaveBeenCalledWith("[SubGraphRunner] Sub-graph 'fill' cannot run", [error]);
  });

  it('keeps a failed build until the builder changes', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const runner = new SubGraphRunner(new MockGpuBackend());
    const builder = new SubGraphBuilder('g').addNode('work', fixedNode()).addNodeEdge('work', 'ghost');
    runner.deploy(builder);

    const first = runner.tick()[0];
    expect(first.status === 'failed' ? first.errors.map(e => e.code) : []).toEqual(['UnknownNodeReference']);
    expect(runner.tick()[0].status).toBe('failed');
    expect(console.error).toHaveBeenCalledTimes(1);

    builder.addNode('ghost', fixedNode());
    expect(runner.tick()).toEqual([{
      subGraph: 'g',
      status: 'ran',
      dispatches: [
        { node: 'work', workgroups: [1, 1, 1] },
        { node: 'ghost', workgroups: [1, 1, 1] },
      ],
    }]);
  });

  it('routes graph inputs by sub-graph name', () => {
    const backend = new MockGpuBackend();
    const runner = new SubGraphRunner(backend);
    runner.deploy(
      new SubGraphBuilder('sum')
        .addGraphInput('data', 'buffer')
        .addNode('work', fillDescriptor())
        .addSlotEdge(GRAPH_INPUT_NODE, 'data', 'work', 'buffer')
    );
    const data = backend.createBuffer({ size: 64, usage: BufferUsage.STORAGE });

    const reports = runner.tick(new Map([['sum', new Map([['data', { kind: 'buffer' as const, buffer: data }]])]]));
    expect(reports).toEqual([
      { subGraph: 'sum', status: 'ran', dispatches: [{ node: 'work', workgroups: [16, 1, 1] }] },
    ]);
  });

  it('applies the configured workgroup limit', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const runner = new SubGraphRunner(new MockGpuBackend(), undefined, { maxWorkgroupsPerDimension: 8 });
    runner.deploy(new SubGraphBuilder('g').addNode('work', fixedNode(9)));

    const report = runner.tick()[0];
    expect(report.status === 'failed' ? report.errors.map(e => e.code) : []).toEqual(['InvalidWorkgroupCount']);
  });

  it('destroys cached outputs of undeployed sub-graphs', () => {
    const backend = new MockGpuBackend();
    const runner = new SubGraphRunner(backend);
    runner.deploy(
      new SubGraphBuilder('g').addNode('producer', expectBuilt(
        new ComputeNodeBuilder()
          .shader('shaders/produce.wgsl')
          .entryPoint('main')
          .dispatch(Dispatch.fixed(1))
          .bindResource().name('buf').binding(0).output().buffer({ size: 16, usage: BufferUsage.STORAGE }).add()
          .build()
      ))
    );
    runner.tick();
    expect(backend.buffers).toHaveLength(1);
    expect(backend.buffers[0].destroyed).toBe(false);

    expect(runner.undeploy('g')).toBe(true);
    expect(backend.buffers[0].destroyed).toBe(true);
    expect(runner.names).toEqual([]);
    expect(runner.undeploy('g')).toBe(false);
  });

  it('logs debug detail only when enabled', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const logHandler = vi.fn();

    new SubGraphRunner(new MockGpuBackend()).deploy(new SubGraphBuilder('quiet'));
    expect(debug).not.toHaveBeenCalled();

    new SubGraphRunner(new MockGpuBackend(), undefined, { debug: true, logHandler }).deploy(new SubGraphBuilder('loud'));
    expect(logHandler).toHaveBeenCalledWith("Deployed 'loud'", undefined);
    expect(debug).toHaveBeenCalledWith("[SubGraphRunner] Deployed 'loud'");
  });

  it('rejects invalid options and unnamed builders', () => {
    expect(() => new SubGraphRunner(new MockGpuBackend(), undefined, { maxWorkgroupsPerDimension: 0 })).toThrow(
      /^\[SubGraphRunner\] Invalid options: maxWorkgroupsPerDimension: /
    );
    expect(() => new SubGraphRunner(new MockGpuBackend()).deploy(new SubGraphBuilder())).toThrow(
      '[SubGraphRunner] Cannot deploy a sub-graph without a name'
    );
  });
});
