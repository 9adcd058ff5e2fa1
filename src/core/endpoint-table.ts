import { readFile } from 'fs/promises';
import { z } from 'zod';
import { METRIC_FIELDS } from './metric-catalog.js';
import { STATUS_PAGE_FIELDS } from './parsers/status-page-parser.js';
import { ConfigurationError, ErrorCode } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import {
  EndpointDescriptorSchema,
  EndpointTableFileSchema,
  type EndpointDescriptor,
  type EndpointDescriptorInput,
  type FieldSelector,
} from '../types/endpoints.js';
import type { MetricKey } from '../types/metrics.js';

const logger = createChildLogger('endpoint-table');

export const STATUS_PAGE_PATH = '/';

/**
 * Default strategy for ARRIS-built gateways. Richer JSON endpoints go first;
 * both need the status page visited earlier in the same cycle.
 */
export const DEFAULT_ENDPOINTS: readonly EndpointDescriptorInput[] = [
  {
    id: 'network-status',
    path: '/php/ajaxGet_device_networkstatus_data.php',
    shape: 'json',
    priority: 10,
    primeWith: STATUS_PAGE_PATH,
    fields: {
      primary_downstream_channel: 2,
      isp_provider: [4, 'cust_id'],
      network_access: 5,
      max_cpes: 6,
      baseline_privacy: 7,
      docsis_version: 8,
      docsis_mode: 8,
      config_file: 9,
      primary_downstream_sfid: 10,
      primary_downstream_max_traffic_rate: 11,
      primary_downstream_max_traffic_burst: 12,
      primary_downstream_min_traffic_rate: 13,
      primary_upstream_sfid: 14,
      primary_upstream_max_traffic_rate: 15,
      primary_upstream_max_traffic_burst: 16,
      primary_upstream_min_traffic_rate: 17,
      primary_upstream_max_concatenated_burst: 18,
      primary_upstream_scheduling_type: 19,
      docsis_3_0_upstream: 25,
      docsis_3_0_downstream: 26,
      docsis_3_1_downstream: 27,
      docsis_3_1_upstream: 28,
    },
  },
  {
    id: 'troubleshoot',
    path: '/php/connection_troubleshoot_data.php',
    shape: 'json',
    priority: 20,
    primeWith: STATUS_PAGE_PATH,
    fields: {
      cable_modem_status: 'js_cm_oper_value',
      cable_modem_registration: 'js_cm_reg_value',
      wan_ip_provision_mode: 'js_wan_ip_prov_mode',
      fail_safe_mode: 'js_fail_safe_mode',
      no_rf_detected: 'js_NoRF_Detected',
    },
  },
  {
    id: 'status-page',
    path: STATUS_PAGE_PATH,
    shape: 'html-status',
    priority: 30,
  },
];

export class EndpointTable {
  /** Descriptors in attempt order. */
  readonly endpoints: readonly EndpointDescriptor[];
  private readonly byKey: ReadonlyMap<MetricKey, readonly EndpointDescriptor[]>;

  constructor(descriptors: readonly EndpointDescriptor[]) {
    if (descriptors.length === 0) {
      throw new ConfigurationError('Endpoint table is empty', { code: ErrorCode.ENDPOINT_TABLE_INVALID });
    }

    const ids = new Set<string>();
    for (const d of descriptors) {
      if (ids.has(d.id)) {
        throw new ConfigurationError(`Duplicate endpoint id '${d.id}'`, {
          code: ErrorCode.ENDPOINT_TABLE_INVALID,
        });
      }
      ids.add(d.id);
    }

    this.endpoints = Object.freeze([...descriptors].sort((a, b) => a.priority - b.priority));

    const byKey = new Map<MetricKey, EndpointDescriptor[]>();
    for (const d of this.endpoints) {
      for (const key of d.provides) {
        const list = byKey.get(key) ?? [];
        list.push(d);
        byKey.set(key, list);
      }
    }
    this.byKey = byKey;
  }

  /** Endpoints that could supply `key`, highest priority first. */
  endpointsFor(key: MetricKey): readonly EndpointDescriptor[] {
    return this.byKey.get(key) ?? [];
  }

  canSupply(key: MetricKey): boolean {
    return this.endpointsFor(key).length > 0;
  }
}

function derivedProvides(fields: EndpointDescriptor['fields']): Set<MetricKey> {
  const provides = new Set<MetricKey>();
  for (const { key } of METRIC_FIELDS) {
    if (fields[key]) provides.add(key);
  }
  // Totals are summed from the per-version counts
  if (provides.has('docsis_3_0_downstream') && provides.has('docsis_3_1_downstream')) {
    provides.add('total_downstream_channels');
  }
  if (provides.has('docsis_3_0_upstream') && provides.has('docsis_3_1_upstream')) {
    provides.add('total_upstream_channels');
  }
  return provides;
}

function freezeDescriptor(parsed: z.output<typeof EndpointDescriptorSchema>): EndpointDescriptor {
  const fields: Partial<Record<MetricKey, readonly FieldSelector[]>> = {};
  for (const { key } of METRIC_FIELDS) {
    const selector = parsed.fields[key];
    if (selector === undefined) continue;
    fields[key] = Object.freeze(Array.isArray(selector) ? [...selector] : [selector]);
  }

  const provides =
    parsed.shape === 'html-status' ? new Set<MetricKey>(STATUS_PAGE_FIELDS) : derivedProvides(fields);

  return Object.freeze({
    id: parsed.id,
    path: parsed.path,
    shape: parsed.shape,
    priority: parsed.priority,
    primeWith: parsed.primeWith,
    timeoutMs: parsed.timeoutMs,
    fields: Object.freeze(fields),
    provides,
  });
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function createEndpointTable(inputs: readonly unknown[] = DEFAULT_ENDPOINTS): EndpointTable {
  const descriptors = inputs.map((input, index) => {
    const result = EndpointDescriptorSchema.safeParse(input);
    if (!result.success) {
      throw new ConfigurationError(`Invalid endpoint descriptor #${index}: ${formatIssues(result.error)}`, {
        code: ErrorCode.ENDPOINT_TABLE_INVALID,
        cause: result.error,
      });
    }
    if (result.data.shape === 'json' && Object.keys(result.data.fields).length === 0) {
      throw new ConfigurationError(`JSON endpoint '${result.data.id}' maps no fields`, {
        code: ErrorCode.ENDPOINT_TABLE_INVALID,
      });
    }
    return freezeDescriptor(result.data);
  });

  return new EndpointTable(descriptors);
}

/** Reads a replacement table, `{ "endpoints": [...] }`, from a JSON file. */
export async function loadEndpointTable(filePath: string): Promise<EndpointTable> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read endpoint table ${filePath}`, {
      code: ErrorCode.ENDPOINT_TABLE_INVALID,
      cause: err instanceof Error ? err : undefined,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (err) {
    throw new ConfigurationError(`Endpoint table ${filePath} is not valid JSON`, {
      code: ErrorCode.ENDPOINT_TABLE_INVALID,
      cause: err instanceof Error ? err : undefined,
    });
  }

  const file = EndpointTableFileSchema.safeParse(json);
  if (!file.success) {
    throw new ConfigurationError(`Invalid endpoint table ${filePath}: ${formatIssues(file.error)}`, {
      code: ErrorCode.ENDPOINT_TABLE_INVALID,
      cause: file.error,
    });
  }

  const table = createEndpointTable(file.data.endpoints);
  logger.info({ filePath, endpoints: table.endpoints.map(e => e.id) }, 'Loaded endpoint table');
  return table;
}
