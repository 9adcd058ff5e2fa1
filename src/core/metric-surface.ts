import { METRIC_FIELDS } from './metric-catalog.js';
import type {
  MetricCategory,
  MetricKey,
  MetricSnapshot,
  NormalizedValue,
  ValueKind,
} from '../types/metrics.js';

export type MetricAvailability = 'available' | 'unavailable' | 'absent';

export interface MetricSurfaceEntry {
  key: MetricKey;
  label: string;
  category: MetricCategory;
  kind: ValueKind;
  /**
   * `unavailable`: an endpoint that could supply the key failed, or sent a
   * value the field cannot represent. `absent`: nothing in the table maps it.
   */
  availability: MetricAvailability;
  value: string | number | boolean | null;
  unit?: string | undefined;
  source?: string | undefined;
}

export interface MetricSurface {
  lastUpdate: Date;
  entries: MetricSurfaceEntry[];
}

function displayValue(value: NormalizedValue): string | number | boolean | null {
  switch (value.kind) {
    case 'unavailable':
      return null;
    case 'enum':
    case 'string':
    case 'integer':
    case 'boolean':
    case 'rate':
      return value.value;
  }
}

/** Lists every catalog key in catalog order, whether or not the snapshot has it. */
export function toMetricSurface(snapshot: MetricSnapshot): MetricSurface {
  const unavailable = new Set<MetricKey>(snapshot.unavailable);

  const entries = METRIC_FIELDS.map((field): MetricSurfaceEntry => {
    const base = { key: field.key, label: field.label, category: field.category, kind: field.kind };
    const entry = snapshot.fields[field.key];

    if (!entry) {
      return {
        ...base,
        availability: unavailable.has(field.key) ? 'unavailable' : 'absent',
        value: null,
      };
    }

    const { value } = entry;
    const unit = value.kind === 'rate' ? value.unit : field.unit;
    return {
      ...base,
      availability: value.kind === 'unavailable' ? 'unavailable' : 'available',
      value: displayValue(value),
      unit,
      source: entry.source,
    };
  });

  return { lastUpdate: snapshot.takenAt, entries };
}
