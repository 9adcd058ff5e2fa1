import { z } from 'zod';

export const METRIC_KEYS = [
  'cable_modem_status',
  'primary_downstream_channel',
  'cable_modem_registration',
  'docsis_3_0_downstream',
  'docsis_3_0_upstream',
  'docsis_3_1_downstream',
  'docsis_3_1_upstream',
  'total_downstream_channels',
  'total_upstream_channels',
  'fail_safe_mode',
  'no_rf_detected',
  'docsis_version',
  'docsis_mode',
  'wan_ip_provision_mode',
  'isp_provider',
  'network_access',
  'max_cpes',
  'baseline_privacy',
  'config_file',
  'primary_downstream_sfid',
  'primary_downstream_max_traffic_rate',
  'primary_downstream_max_traffic_burst',
  'primary_downstream_min_traffic_rate',
  'primary_upstream_sfid',
  'primary_upstream_max_traffic_rate',
  'primary_upstream_max_traffic_burst',
  'primary_upstream_min_traffic_rate',
  'primary_upstream_max_concatenated_burst',
  'primary_upstream_scheduling_type',
] as const;

export const MetricKeySchema = z.enum(METRIC_KEYS);
export type MetricKey = z.infer<typeof MetricKeySchema>;

export const MetricCategorySchema = z.enum(['status', 'configuration', 'service-flow', 'diagnostic']);
export type MetricCategory = z.infer<typeof MetricCategorySchema>;

export const ValueKindSchema = z.enum(['enum', 'string', 'integer', 'rate', 'boolean']);
export type ValueKind = z.infer<typeof ValueKindSchema>;

export type LookupTableName =
  | 'isp-provider'
  | 'registration'
  | 'wan-ip-provision-mode'
  | 'docsis-mode'
  | 'network-access'
  | 'baseline-privacy'
  | 'lock-state'
  | 'scheduling-type'
  | 'modem-status';

export interface MetricField {
  key: MetricKey;
  label: string;
  category: MetricCategory;
  kind: ValueKind;
  lookup?: LookupTableName | undefined;
  /** Unit assumed when the device reports a bare number. */
  unit?: string | undefined;
}

export type DocsisVersion = '3.0' | '3.1';
export type ChannelDirection = 'downstream' | 'upstream';

export interface ChannelRow {
  version: DocsisVersion;
  direction: ChannelDirection;
}

export type RawValue = string | number | boolean;

/**
 * Values pulled from one endpoint response, keyed by the metric they feed.
 * `channels` is set only when the payload carried channel tables at all.
 */
export interface RawFieldMap {
  readonly fields: Readonly<Partial<Record<MetricKey, RawValue>>>;
  readonly channels?: readonly ChannelRow[] | undefined;
}

export type NormalizedValue =
  | { kind: 'enum'; value: string; unmappedCode?: string | undefined }
  | { kind: 'string'; value: string }
  | { kind: 'integer'; value: number }
  | { kind: 'rate'; value: number; unit: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'unavailable'; raw: string; reason: string };

export type NormalizedFieldMap = Partial<Record<MetricKey, NormalizedValue>>;

export interface SnapshotEntry {
  key: MetricKey;
  value: NormalizedValue;
  category: MetricCategory;
  /** Id of the endpoint that supplied the value. */
  source: string;
}

export interface MetricSnapshot {
  readonly takenAt: Date;
  readonly fields: Readonly<Partial<Record<MetricKey, Readonly<SnapshotEntry>>>>;
  /** Keys an attempted endpoint could have supplied that no endpoint did. */
  readonly unavailable: readonly MetricKey[];
}

/** An unmatched device code, kept as a fallback label instead of an error. */
export interface UnmappedCodeWarning {
  key: MetricKey;
  code: string;
  label: string;
  source: string;
}

export type HealthVerdict = 'healthy' | 'degraded' | 'unavailable';

export type EndpointStatus =
  | 'success'
  | 'empty'
  | 'parse-error'
  | 'network-error'
  | 'http-error'
  | 'timeout'
  | 'cancelled';

export interface EndpointOutcome {
  endpointId: string;
  path: string;
  status: EndpointStatus;
  attempts: number;
  fieldCount: number;
  durationMs: number;
  error?: { code: number; message: string } | undefined;
}

export interface PollResult {
  snapshot: MetricSnapshot;
  health: HealthVerdict;
  outcomes: EndpointOutcome[];
  warnings: UnmappedCodeWarning[];
}
