import { describe, it, expect } from 'vitest';
import { autorun } from 'mobx';
import { Dispatch } from '../graph/dispatch';
import { expectBuilt } from '../graph/errors';
import { ComputeNodeBuilder } from '../graph/node-builder';
import { MockPipelineCache } from '../webgpu/mock-backend';
import { ComputeNodeProvider, summarizeProviders, type ProviderState } from './provider';

function builder(shader = 'shaders/fill.wgsl') {
  return new ComputeNodeBuilder()
    .shader(shader)
    .entryPoint('main')
    .dispatch(Dispatch.fixed(1))
    .bindResource().name('buffer').binding(0).inputOutput().buffer().add();
}

describe('ComputeNodeProvider', () => {
  it('advances one step per update until the pipeline is ready', () => {
    const pipelines = new MockPipelineCache({ pollsUntilReady: 1 });
    const provider = new ComputeNodeProvider(expectBuilt(builder().build()));

    expect(provider.state()).toEqual({ status: 'created' });
    expect(provider.resolve()).toBeUndefined();

    provider.update(pipelines);
    expect(provider.node).toEqual({ status: 'pipeline_queued', pipeline: 0 });
    expect(provider.state()).toEqual({ status: 'updating' });

    provider.update(pipelines); // cache still compiling
    expect(provider.state()).toEqual({ status: 'updating' });

    provider.update(pipelines);
    expect(provider.state()).toEqual({ status: 'ready' });
    expect(provider.resolve()).toBe(provider.descriptor);
  });

  it('surfaces pipeline errors', () => {
    const pipelines = new MockPipelineCache();
    pipelines.failShader('shaders/broken.wgsl', 'unknown identifier');
    const provider = new ComputeNodeProvider(expectBuilt(builder('shaders/broken.wgsl').build()));

    provider.update(pipelines);
    provider.update(pipelines);
    expect(provider.state()).toEqual({ status: 'error', message: 'unknown identifier' });
    expect(provider.resolve()).toBeUndefined();

    provider.update(pipelines);
    expect(provider.state()).toEqual({ status: 'error', message: 'unknown identifier' });
  });

  it('restarts and bumps the version on a new descriptor', () => {
    const pipelines = new MockPipelineCache();
    const provider = new ComputeNodeProvider(expectBuilt(builder().build()));
    provider.update(pipelines);
    provider.update(pipelines);

    provider.setDescriptor(expectBuilt(builder('shaders/other.wgsl').build()));
    expect(provider.version).toBe(1);
    expect(provider.state()).toEqual({ status: 'created' });

    provider.update(pipelines);
    expect(provider.node).toEqual({ status: 'pipeline_queued', pipeline: 1 });
  });

  it('passes shader defs to the pipeline as constants', () => {
    const pipelines = new MockPipelineCache();
    const provider = new ComputeNodeProvider(expectBuilt(builder().shaderDefs({ SCALE: 2 }).label('fill').build()));
    provider.update(pipelines);
    expect(pipelines.descriptor(0)).toEqual({
      label: 'fill',
      shader: { id: 'shaders/fill.wgsl' },
      entryPoint: 'main',
      constants: { SCALE: 2 },
    });
  });

  it('is built from a node builder', () => {
    const built = ComputeNodeProvider.fromBuilder(builder());
    expect(built.success).toBe(true);

    const failed = ComputeNodeProvider.fromBuilder(new ComputeNodeBuilder());
    expect(failed.success).toBe(false);
  });

  it('exposes its state to observers', () => {
    const pipelines = new MockPipelineCache();
    const provider = new ComputeNodeProvider(expectBuilt(builder().build()));
    const seen: string[] = [];
    const dispose = autorun(() => { seen.push(provider.status.status); });
    provider.update(pipelines);
    provider.update(pipelines);
    dispose();
    expect(seen).toEqual(['created', 'updating', 'ready']);
  });
});

describe('summarizeProviders', () => {
  const created: ProviderState = { status: 'created' };
  const updating: ProviderState = { status: 'updating' };
  const ready: ProviderState = { status: 'ready' };
  const error: ProviderState = { status: 'error', message: 'bad' };

  it('prefers errors, then the least advanced state', () => {
    expect(summarizeProviders([ready, created, error])).toEqual(error);
    expect(summarizeProviders([ready, updating, created])).toEqual(created);
    expect(summarizeProviders([ready, updating])).toEqual(updating);
    expect(summarizeProviders([ready, ready])).toEqual(ready);
    expect(summarizeProviders([])).toEqual(ready);
  });
});
