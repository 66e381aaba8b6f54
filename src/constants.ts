/**
 * @file constants.ts
 * @description Global configuration constants.
 *
 * @external-interactions
 * - `GRAPH_INPUT_NODE` is the name hosts use to wire their own graph inputs into a sub-graph.
 * - `INPUT_BUFFER_SLOT` / `OUTPUT_BUFFER_SLOT` are the fixed slot names of the host buffer nodes.
 *
 * @pitfalls
 * - `GRAPH_INPUT_NODE` is reserved: a sub-graph node registered under this name fails the build.
 */

export const GRAPH_INPUT_NODE = '<graph input>';

// Output slot of an InputBufferNode, input slot of an OutputBufferNode.
export const INPUT_BUFFER_SLOT = 'out';
export const OUTPUT_BUFFER_SLOT = 'in';

export const DEFAULT_BIND_GROUP_INDEX = 0;

// WebGPU's default maxComputeWorkgroupsPerDimension.
export const MAX_WORKGROUPS_PER_DIMENSION = 65535;

export const BufferUsage = {
  MAP_READ: 0x0001,
  MAP_WRITE: 0x0002,
  COPY_SRC: 0x0004,
  COPY_DST: 0x0008,
  INDEX: 0x0010,
  VERTEX: 0x0020,
  UNIFORM: 0x0040,
  STORAGE: 0x0080,
  INDIRECT: 0x0100,
  QUERY_RESOLVE: 0x0200,
} as const;

export const TextureUsage = {
  COPY_SRC: 0x01,
  COPY_DST: 0x02,
  TEXTURE_BINDING: 0x04,
  STORAGE_BINDING: 0x08,
  RENDER_ATTACHMENT: 0x10,
} as const;

export const MapMode = {
  READ: 0x1,
  WRITE: 0x2,
} as const;
