import type { EdgeRef } from './types';

export type BuildErrorCode =
  | 'DuplicateNodeName'
  | 'ReservedNodeName'
  | 'DuplicateBindingName'
  | 'DuplicateBindingIndex'
  | 'InvalidBinding'
  | 'InvalidDispatch'
  | 'UnknownNodeReference'
  | 'UnknownSlotReference'
  | 'InputSlotOccupied'
  | 'SlotKindMismatch'
  | 'CyclicGraph'
  | 'UnresolvedProvider'
  | 'MissingShader'
  | 'MissingEntryPoint'
  | 'MissingDispatchStrategy'
  | 'MissingName';

export type InvocationErrorCode =
  | 'MissingGraphInput'
  | 'MissingInputSlot'
  | 'InvalidWorkgroupCount'
  | 'InvalidResourceDescriptor'
  | 'ProviderFailed'
  | 'PipelineFailed'
  | 'HostNodeFailed'
  | 'StrategyFailed';

export type GraphErrorCode = BuildErrorCode | InvocationErrorCode;

export interface GraphError {
  code: GraphErrorCode;
  message: string;
  node?: string;
  slot?: string;
  edge?: EdgeRef;
}

export type BuildResult<T> =
  | { success: true; data: T }
  | { success: false; errors: GraphError[] };

export function graphError(
  code: GraphErrorCode,
  message: string,
  context: Pick<GraphError, 'node' | 'slot' | 'edge'> = {}
): GraphError {
  return { code, message, ...context };
}

export function formatErrors(errors: readonly GraphError[]): string {
  return errors.map(e => `${e.code}: ${e.message}`).join('\n');
}

export class GraphBuildError extends Error {
  constructor(public readonly errors: GraphError[]) {
    super(formatErrors(errors));
    this.name = 'GraphBuildError';
  }
}

/** Unwraps a build result, throwing `GraphBuildError` on failure. */
export function expectBuilt<T>(result: BuildResult<T>): T {
  if (!result.success) {
    throw new GraphBuildError(result.errors);
  }
  return result.data;
}
