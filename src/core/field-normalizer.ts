import { getMetricField, METRIC_FIELDS } from './metric-catalog.js';
import { getLookupTable, lookupCode, MODEM_STATUS_LABELS } from './lookup-tables.js';
import type {
  ChannelRow,
  MetricKey,
  NormalizedFieldMap,
  NormalizedValue,
  RawFieldMap,
  RawValue,
} from '../types/metrics.js';

const TRUE_WORDS = new Set(['1', 'yes', 'true', 'on', 'enabled', 'active']);
const FALSE_WORDS = new Set(['0', 'no', 'false', 'off', 'disabled', 'inactive']);

const NUMBER_WITH_UNIT = /^(\d+(?:\.\d+)?)\s*([A-Za-z/]+)?$/;
const WHOLE_NUMBER = /^\d+$/;

// js_cm_oper_value: codes from 3 up mean the modem has acquired the network
const OPERATIONAL_THRESHOLD = 3;

export interface ChannelCounts {
  docsis30Downstream: number;
  docsis30Upstream: number;
  docsis31Downstream: number;
  docsis31Upstream: number;
  totalDownstream: number;
  totalUpstream: number;
}

function unavailable(raw: RawValue, reason: string): NormalizedValue {
  return { kind: 'unavailable', raw: String(raw), reason };
}

function asText(raw: RawValue): string {
  return String(raw).trim();
}

function toBoolean(raw: RawValue): boolean | undefined {
  if (typeof raw === 'boolean') return raw;
  const word = asText(raw).toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  return undefined;
}

function toWholeNumber(raw: RawValue): number | undefined {
  if (typeof raw === 'number') {
    return Number.isInteger(raw) && raw >= 0 ? raw : undefined;
  }
  if (typeof raw === 'string' && WHOLE_NUMBER.test(raw.trim())) {
    return Number(raw.trim());
  }
  return undefined;
}

function normalizeModemStatus(raw: RawValue): NormalizedValue {
  if (typeof raw === 'number' || (typeof raw === 'string' && WHOLE_NUMBER.test(raw.trim()))) {
    return { kind: 'enum', value: Number(raw) >= OPERATIONAL_THRESHOLD ? 'Online' : 'Offline' };
  }
  const text = asText(raw);
  const label = MODEM_STATUS_LABELS.entries.get(text.toLowerCase());
  return { kind: 'enum', value: label ?? text };
}

function normalizeRate(raw: RawValue, defaultUnit: string): NormalizedValue {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) && raw >= 0
      ? { kind: 'rate', value: raw, unit: defaultUnit }
      : unavailable(raw, 'not a non-negative number');
  }
  if (typeof raw === 'boolean') {
    return unavailable(raw, 'not a number');
  }
  const match = NUMBER_WITH_UNIT.exec(raw.trim());
  if (!match?.[1]) {
    return unavailable(raw, 'not a number');
  }
  return { kind: 'rate', value: Number(match[1]), unit: match[2] ?? defaultUnit };
}

/**
 * Maps one raw device value onto the canonical form for `key`. Pure and total:
 * anything the field cannot represent becomes an `unavailable` marker.
 */
export function normalize(key: MetricKey, raw: RawValue): NormalizedValue {
  const field = getMetricField(key);

  if (typeof raw === 'string' && raw.trim() === '') {
    return unavailable(raw, 'empty value');
  }

  switch (field.kind) {
    case 'boolean': {
      const value = toBoolean(raw);
      return value === undefined ? unavailable(raw, 'not a boolean') : { kind: 'boolean', value };
    }

    case 'integer': {
      const value = toWholeNumber(raw);
      return value === undefined ? unavailable(raw, 'not a whole number') : { kind: 'integer', value };
    }

    case 'rate':
      return normalizeRate(raw, field.unit ?? '');

    case 'string':
      return { kind: 'string', value: asText(raw) };

    case 'enum': {
      if (key === 'cable_modem_status') {
        return normalizeModemStatus(raw);
      }
      if (!field.lookup) {
        return { kind: 'enum', value: asText(raw) };
      }
      const result = lookupCode(getLookupTable(field.lookup), raw);
      return result.unmappedCode === undefined
        ? { kind: 'enum', value: result.value }
        : { kind: 'enum', value: result.value, unmappedCode: result.unmappedCode };
    }
  }
}

export function tallyChannels(rows: readonly ChannelRow[]): ChannelCounts {
  const count = (version: ChannelRow['version'], direction: ChannelRow['direction']): number =>
    rows.filter(row => row.version === version && row.direction === direction).length;

  const docsis30Downstream = count('3.0', 'downstream');
  const docsis30Upstream = count('3.0', 'upstream');
  const docsis31Downstream = count('3.1', 'downstream');
  const docsis31Upstream = count('3.1', 'upstream');

  return {
    docsis30Downstream,
    docsis30Upstream,
    docsis31Downstream,
    docsis31Upstream,
    totalDownstream: docsis30Downstream + docsis31Downstream,
    totalUpstream: docsis30Upstream + docsis31Upstream,
  };
}

function integer(value: number): NormalizedValue {
  return { kind: 'integer', value };
}

function integerOf(value: NormalizedValue | undefined): number | undefined {
  return value?.kind === 'integer' ? value.value : undefined;
}

/** Fills in a cross-version total when both per-version counts are known. */
function deriveTotal(
  out: NormalizedFieldMap,
  total: 'total_downstream_channels' | 'total_upstream_channels',
  parts: readonly ['docsis_3_0_downstream' | 'docsis_3_0_upstream', 'docsis_3_1_downstream' | 'docsis_3_1_upstream']
): void {
  if (out[total] !== undefined) return;
  const first = integerOf(out[parts[0]]);
  const second = integerOf(out[parts[1]]);
  if (first !== undefined && second !== undefined) {
    out[total] = integer(first + second);
  }
}

/** Normalizes every field of one endpoint's raw map, including channel tallies. */
export function normalizeRawFields(raw: RawFieldMap): NormalizedFieldMap {
  const out: NormalizedFieldMap = {};

  for (const { key } of METRIC_FIELDS) {
    const value = raw.fields[key];
    if (value === undefined) continue;
    out[key] = normalize(key, value);
  }

  if (raw.channels) {
    const counts = tallyChannels(raw.channels);
    out.docsis_3_0_downstream = integer(counts.docsis30Downstream);
    out.docsis_3_0_upstream = integer(counts.docsis30Upstream);
    out.docsis_3_1_downstream = integer(counts.docsis31Downstream);
    out.docsis_3_1_upstream = integer(counts.docsis31Upstream);
    out.total_downstream_channels = integer(counts.totalDownstream);
    out.total_upstream_channels = integer(counts.totalUpstream);
  }

  deriveTotal(out, 'total_downstream_channels', ['docsis_3_0_downstream', 'docsis_3_1_downstream']);
  deriveTotal(out, 'total_upstream_channels', ['docsis_3_0_upstream', 'docsis_3_1_upstream']);

  return out;
}
