import { describe, it, expect } from 'vitest';
import { Dispatch } from '../src/graph/dispatch';
import { expectBuilt } from '../src/graph/errors';
import { ComputeNodeBuilder } from '../src/graph/node-builder';
import { SubGraphBuilder } from '../src/graph/sub-graph-builder';
import { InputBufferNode, OutputBufferNode } from '../src/runtime/host-buffers';
import { ComputeNodeProvider } from '../src/runtime/provider';
import { SubGraphRunner } from '../src/runtime/sub-graph-runner';
import { ManualTrigger, Trigger } from '../src/runtime/trigger';
import { EntityStore } from '../src/state/entity-store';
import { MockGpuBackend } from '../src/webgpu/mock-backend';

const ELEMENTS = 65535;

/** Stands in for fill.wgsl: writes `index * 2` into every f32 of binding 0. */
function fillShader() {
  return new MockGpuBackend({
    onDispatch: (command, backend) => {
      const resource = command.entries[0].resource;
      if (resource.kind !== 'buffer') return;
      const data = new Float32Array(backend.toMock(resource.buffer).data.buffer);
      for (let i = 0; i < data.length; i++) data[i] = i * 2;
    },
  });
}

function setup(data: Float32Array, trigger: ManualTrigger) {
  const backend = fillShader();
  const entities = new EntityStore();
  const provider = expectBuilt(ComputeNodeProvider.fromBuilder(
    new ComputeNodeBuilder()
      .label('fill buffer')
      .shader('shaders/fill.wgsl')
      .entryPoint('main')
      .dispatch(Dispatch.perElement('buffer', { elementSize: 4 }))
      .bindResource().name('buffer').binding(0).inputOutput().buffer().add()
  ));
  const input = new InputBufferNode(data);
  const output = new OutputBufferNode();

  const runner = new SubGraphRunner(backend, entities);
  runner.deploy(
    new SubGraphBuilder('fill_buffer')
      .addNode('input_buffer', input)
      .addNodeProvider('fill', entities.spawn(provider), provider)
      .addNode('output_buffer', output)
      .addSlotEdge('input_buffer', 'out', 'fill', 'buffer')
      .addSlotEdge('fill', 'buffer', 'output_buffer', 'in')
      .trigger(Trigger.manual(trigger))
  );
  return { backend, runner, input, output };
}

describe('Fill buffer sub-graph', () => {
  it('does nothing until triggered, then fills and reads back the buffer', async () => {
    const trigger = new ManualTrigger(false);
    const { backend, runner, output } = setup(new Float32Array(ELEMENTS), trigger);

    expect(runner.tick()[0]).toEqual({ subGraph: 'fill_buffer', status: 'skipped', reason: 'providers_pending' });
    expect(runner.tick()[0]).toEqual({ subGraph: 'fill_buffer', status: 'skipped', reason: 'trigger_closed' });
    expect(backend.buffers).toHaveLength(0);
    expect(backend.writes).toHaveLength(0);

    trigger.fire();
    expect(runner.tick()[0]).toEqual({
      subGraph: 'fill_buffer',
      status: 'ran',
      dispatches: [{ node: 'fill', workgroups: [ELEMENTS, 1, 1] }],
    });
    expect(backend.dispatches[0].label).toBe('fill buffer');

    await runner.mapOutputBuffers();
    const taken = output.takeBufferAs(Float32Array);
    if (!taken.success) throw new Error(taken.message);
    expect(taken.data).toHaveLength(ELEMENTS);
    expect(Array.from(taken.data.subarray(0, 3))).toEqual([0, 2, 4]);
    expect(taken.data[ELEMENTS - 1]).toBe(131068);
    expect(output.takeBuffer()).toEqual({
      success: false,
      error: 'MappedBufferNotFound',
      message: 'Buffer already consumed, not mapped or not created',
    });
  });

  it('keeps running while a plain manual trigger stays set', () => {
    const trigger = new ManualTrigger(true);
    const { runner } = setup(new Float32Array(4), trigger);
    runner.tick();

    expect(runner.tick()[0].status).toBe('ran');
    expect(runner.tick()[0].status).toBe('ran');
    trigger.set(false);
    expect(runner.tick()[0].status).toBe('skipped');
  });

  it('runs once per fire with a one-shot trigger', () => {
    const trigger = new ManualTrigger(false, { oneShot: true });
    const { runner } = setup(new Float32Array(4), trigger);
    runner.tick();

    trigger.fire();
    expect(runner.tick()[0].status).toBe('ran');
    expect(runner.tick()[0].status).toBe('skipped');
    expect(trigger.value).toBe(false);
  });

  it('uploads new host data without recreating the buffer', () => {
    const trigger = new ManualTrigger(true);
    const { backend, runner, input } = setup(new Float32Array(4), trigger);
    runner.tick();
    runner.tick();

    input.set(new Float32Array([1, 2, 3, 4]));
    runner.tick();

    const inputBuffers = backend.buffers.filter(b => b.label === 'input_buffer');
    expect(inputBuffers).toHaveLength(1);
    expect(backend.writes.map(w => w.byteLength)).toEqual([16, 16]);
  });

  it('dispatches nothing for an empty input', () => {
    const { runner } = setup(new Float32Array(0), new ManualTrigger(true));
    runner.tick();
    expect(runner.tick()[0]).toEqual({
      subGraph: 'fill_buffer',
      status: 'ran',
      dispatches: [{ node: 'fill', workgroups: [0, 1, 1] }],
    });
  });
});
