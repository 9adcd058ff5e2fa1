import { z } from 'zod';
import { MetricKeySchema, type MetricKey } from './metrics.js';

export const PayloadShapeSchema = z.enum(['html-status', 'json']);
export type PayloadShape = z.infer<typeof PayloadShapeSchema>;

/** Object key for JSON objects, position for JSON arrays. */
export const FieldSelectorSchema = z.union([z.string().min(1), z.number().int().nonnegative()]);
export type FieldSelector = z.infer<typeof FieldSelectorSchema>;

const DevicePathSchema = z.string().startsWith('/', 'Endpoint paths must start with "/"');

export const EndpointDescriptorSchema = z.object({
  id: z.string().min(1),
  path: DevicePathSchema,
  shape: PayloadShapeSchema,
  priority: z.number().int(),
  /** Page to visit first in the same cycle; some firmware only fills data endpoints afterwards. */
  primeWith: DevicePathSchema.optional(),
  timeoutMs: z.number().int().positive().optional(),
  fields: z
    .record(MetricKeySchema, z.union([FieldSelectorSchema, z.array(FieldSelectorSchema).min(1)]))
    .default({}),
});
export type EndpointDescriptorInput = z.input<typeof EndpointDescriptorSchema>;

export const EndpointTableFileSchema = z.object({
  endpoints: z.array(EndpointDescriptorSchema).min(1),
});

export interface EndpointDescriptor {
  readonly id: string;
  readonly path: string;
  readonly shape: PayloadShape;
  readonly priority: number;
  readonly primeWith?: string | undefined;
  readonly timeoutMs?: number | undefined;
  readonly fields: Readonly<Partial<Record<MetricKey, readonly FieldSelector[]>>>;
  /** Every metric key this endpoint can populate. */
  readonly provides: ReadonlySet<MetricKey>;
}
