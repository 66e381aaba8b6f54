import { z } from 'zod';
import type { BufferDescriptor, TextureDescriptor, Workgroups } from '../webgpu/host-interface';
import { graphError, type GraphError, type GraphErrorCode } from './errors';

// ------------------------------------------------------------------
// Structural schemas
// ------------------------------------------------------------------

export const ResourceKindSchema = z.enum(['buffer', 'texture']);
export const BindingDirectionSchema = z.enum(['input', 'output', 'input_output']);

export const BindingDeclarationSchema = z.object({
  name: z.string().min(1, 'Binding name must not be empty'),
  index: z.number().int().nonnegative(),
  direction: BindingDirectionSchema,
  kind: ResourceKindSchema,
});

export const BufferDescriptorSchema = z.object({
  label: z.string().optional(),
  size: z.number().int().nonnegative(),
  usage: z.number().int().nonnegative(),
  mappedAtCreation: z.boolean().optional(),
});

export const TextureDescriptorSchema = z.object({
  label: z.string().optional(),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  depthOrArrayLayers: z.number().int().positive().optional(),
  format: z.string().min(1),
  usage: z.number().int().nonnegative(),
});

const FixedCountSchema = z.number().int().positive();
export const FixedWorkgroupsSchema = z.tuple([FixedCountSchema, FixedCountSchema, FixedCountSchema]);

/** Counts produced at invocation time; zero is a legal no-op. */
export function workgroupsSchema(maxPerDimension: number) {
  const count = z.number().int().nonnegative().max(maxPerDimension);
  return z.tuple([count, count, count]);
}

export type LogHandler = (message: string, payload?: unknown) => void;

export const RunnerOptionsSchema = z.object({
  debug: z.boolean().optional(),
  maxWorkgroupsPerDimension: z.number().int().positive().optional(),
  logHandler: z.custom<LogHandler>(v => typeof v === 'function', 'logHandler must be a function').optional(),
});

export type RunnerOptions = z.infer<typeof RunnerOptionsSchema>;

// ------------------------------------------------------------------
// Issue mapping
// ------------------------------------------------------------------

export function issuesToErrors(
  issues: readonly z.ZodIssue[],
  code: GraphErrorCode,
  subject: string,
  context: Pick<GraphError, 'node' | 'slot'> = {}
): GraphError[] {
  return issues.map(issue => {
    const where = issue.path.length > 0 ? `.${issue.path.map(String).join('.')}` : '';
    return graphError(code, `${subject}${where}: ${issue.message}`, context);
  });
}

export type Checked<T> = { success: true; data: T } | { success: false; errors: GraphError[] };

function check<T>(
  schema: z.ZodType<T>,
  value: unknown,
  code: GraphErrorCode,
  subject: string,
  context: Pick<GraphError, 'node' | 'slot'>
): Checked<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    return { success: false, errors: issuesToErrors(result.error.issues, code, subject, context) };
  }
  return { success: true, data: result.data };
}

export function checkWorkgroups(
  value: unknown,
  maxPerDimension: number,
  node: string
): Checked<Workgroups> {
  return check(workgroupsSchema(maxPerDimension), value, 'InvalidWorkgroupCount', `Workgroup count of '${node}'`, { node });
}

export function checkBufferDescriptor(value: unknown, node: string, slot: string): Checked<BufferDescriptor> {
  return check(BufferDescriptorSchema, value, 'InvalidResourceDescriptor', `Buffer '${slot}' of '${node}'`, { node, slot });
}

export function checkTextureDescriptor(value: unknown, node: string, slot: string): Checked<TextureDescriptor> {
  return check(TextureDescriptorSchema, value, 'InvalidResourceDescriptor', `Texture '${slot}' of '${node}'`, { node, slot });
}
