import type { MetricCategory, MetricField, MetricKey } from '../types/metrics.js';

function field(
  key: MetricKey,
  label: string,
  category: MetricCategory,
  kind: MetricField['kind'],
  extra: Pick<MetricField, 'lookup' | 'unit'> = {}
): MetricField {
  return Object.freeze({ key, label, category, kind, ...extra });
}

export const METRIC_FIELDS: readonly MetricField[] = Object.freeze([
  field('cable_modem_status', 'Cable Modem Status', 'status', 'enum', { lookup: 'modem-status' }),
  field('primary_downstream_channel', 'Primary Downstream Channel', 'status', 'enum', { lookup: 'lock-state' }),
  field('cable_modem_registration', 'Cable Modem Registration', 'status', 'enum', { lookup: 'registration' }),
  field('docsis_3_0_downstream', 'DOCSIS 3.0 Downstream Channels', 'status', 'integer', { unit: 'channels' }),
  field('docsis_3_0_upstream', 'DOCSIS 3.0 Upstream Channels', 'status', 'integer', { unit: 'channels' }),
  field('docsis_3_1_downstream', 'DOCSIS 3.1 Downstream Channels', 'status', 'integer', { unit: 'channels' }),
  field('docsis_3_1_upstream', 'DOCSIS 3.1 Upstream Channels', 'status', 'integer', { unit: 'channels' }),
  field('total_downstream_channels', 'Total Downstream Channels', 'status', 'integer', { unit: 'channels' }),
  field('total_upstream_channels', 'Total Upstream Channels', 'status', 'integer', { unit: 'channels' }),

  field('fail_safe_mode', 'Fail Safe Mode', 'diagnostic', 'boolean'),
  field('no_rf_detected', 'No RF Detected', 'diagnostic', 'boolean'),

  field('docsis_version', 'DOCSIS Version', 'configuration', 'string'),
  field('docsis_mode', 'DOCSIS Mode', 'configuration', 'enum', { lookup: 'docsis-mode' }),
  field('wan_ip_provision_mode', 'WAN IP Provision Mode', 'configuration', 'enum', { lookup: 'wan-ip-provision-mode' }),
  field('isp_provider', 'ISP Provider', 'configuration', 'enum', { lookup: 'isp-provider' }),
  field('network_access', 'Network Access', 'configuration', 'enum', { lookup: 'network-access' }),
  field('max_cpes', 'Maximum Number of CPEs', 'configuration', 'integer'),
  field('baseline_privacy', 'Baseline Privacy', 'configuration', 'enum', { lookup: 'baseline-privacy' }),
  field('config_file', 'Config File', 'configuration', 'string'),

  field('primary_downstream_sfid', 'Primary Downstream SFID', 'service-flow', 'integer'),
  field('primary_downstream_max_traffic_rate', 'Primary Downstream Max Traffic Rate', 'service-flow', 'rate', { unit: 'bps' }),
  field('primary_downstream_max_traffic_burst', 'Primary Downstream Max Traffic Burst', 'service-flow', 'rate', { unit: 'bytes' }),
  field('primary_downstream_min_traffic_rate', 'Primary Downstream Min Traffic Rate', 'service-flow', 'rate', { unit: 'bps' }),
  field('primary_upstream_sfid', 'Primary Upstream SFID', 'service-flow', 'integer'),
  field('primary_upstream_max_traffic_rate', 'Primary Upstream Max Traffic Rate', 'service-flow', 'rate', { unit: 'bps' }),
  field('primary_upstream_max_traffic_burst', 'Primary Upstream Max Traffic Burst', 'service-flow', 'rate', { unit: 'bytes' }),
  field('primary_upstream_min_traffic_rate', 'Primary Upstream Min Traffic Rate', 'service-flow', 'rate', { unit: 'bps' }),
  field('primary_upstream_max_concatenated_burst', 'Primary Upstream Max Concatenated Burst', 'service-flow', 'rate', { unit: 'bytes' }),
  field('primary_upstream_scheduling_type', 'Primary Upstream Scheduling Type', 'service-flow', 'enum', { lookup: 'scheduling-type' }),
]);

const FIELDS_BY_KEY: ReadonlyMap<MetricKey, MetricField> = new Map(
  METRIC_FIELDS.map(f => [f.key, f])
);

export function getMetricField(key: MetricKey): MetricField {
  const found = FIELDS_BY_KEY.get(key);
  if (!found) {
    throw new Error(`Metric field '${key}' is missing from the catalog`);
  }
  return found;
}

export const CHANNEL_COUNT_KEYS = [
  'docsis_3_0_downstream',
  'docsis_3_0_upstream',
  'docsis_3_1_downstream',
  'docsis_3_1_upstream',
  'total_downstream_channels',
  'total_upstream_channels',
] as const satisfies readonly MetricKey[];
