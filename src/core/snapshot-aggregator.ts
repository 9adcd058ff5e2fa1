import { getMetricField, METRIC_FIELDS } from './metric-catalog.js';
import { normalizeRawFields } from './field-normalizer.js';
import { createChildLogger } from '../utils/logger.js';
import type { MonitorError } from '../utils/errors.js';
import type { EndpointDescriptor } from '../types/endpoints.js';
import type {
  MetricKey,
  MetricSnapshot,
  RawFieldMap,
  SnapshotEntry,
  UnmappedCodeWarning,
} from '../types/metrics.js';

const logger = createChildLogger('snapshot-aggregator');

export type EndpointAttempt =
  | { descriptor: EndpointDescriptor; ok: true; raw: RawFieldMap }
  | { descriptor: EndpointDescriptor; ok: false; error: MonitorError };

export interface AggregateResult {
  snapshot: MetricSnapshot;
  warnings: UnmappedCodeWarning[];
}

/**
 * Folds per-endpoint results into one snapshot. Higher priority endpoints are
 * applied first and a populated key is never overwritten.
 */
export function aggregate(attempts: readonly EndpointAttempt[], takenAt: Date = new Date()): AggregateResult {
  const ordered = [...attempts].sort((a, b) => a.descriptor.priority - b.descriptor.priority);
  const fields: Partial<Record<MetricKey, Readonly<SnapshotEntry>>> = {};
  const warnings: UnmappedCodeWarning[] = [];
  const claimed = new Set<MetricKey>();

  for (const attempt of ordered) {
    const { descriptor } = attempt;
    for (const key of descriptor.provides) claimed.add(key);

    if (!attempt.ok) continue;

    const normalized = normalizeRawFields(attempt.raw);
    for (const { key } of METRIC_FIELDS) {
      const value = normalized[key];
      if (value === undefined) continue;

      if (!descriptor.provides.has(key)) {
        logger.debug({ endpoint: descriptor.id, key }, 'Ignoring field the endpoint does not declare');
        continue;
      }
      if (fields[key] !== undefined) continue;

      fields[key] = Object.freeze({
        key,
        value: Object.freeze(value),
        category: getMetricField(key).category,
        source: descriptor.id,
      });

      if (value.kind === 'enum' && value.unmappedCode !== undefined) {
        warnings.push({ key, code: value.unmappedCode, label: value.value, source: descriptor.id });
        logger.warn({ key, code: value.unmappedCode, endpoint: descriptor.id }, 'Unmapped device code');
      }
    }
  }

  const unavailable = METRIC_FIELDS
    .map(f => f.key)
    .filter(key => fields[key] === undefined && claimed.has(key));

  const snapshot: MetricSnapshot = Object.freeze({
    takenAt,
    fields: Object.freeze(fields),
    unavailable: Object.freeze(unavailable),
  });

  return { snapshot, warnings };
}

export function populatedKeys(snapshot: MetricSnapshot): MetricKey[] {
  return METRIC_FIELDS.map(f => f.key).filter(key => snapshot.fields[key] !== undefined);
}
