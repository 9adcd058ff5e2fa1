import type { LookupTableName, RawValue } from '../types/metrics.js';

export interface LookupTable {
  readonly name: LookupTableName;
  readonly category: string;
  /** Lower-cased code or alias → canonical label. */
  readonly entries: ReadonlyMap<string, string>;
  formatUnknown(code: string): string;
  /** Code embedded in a label produced by `formatUnknown`, if `text` is one. */
  parseUnknown(text: string): string | undefined;
}

export interface LookupResult {
  value: string;
  unmappedCode?: string | undefined;
}

interface TableDefinition {
  name: LookupTableName;
  category: string;
  entries: Record<string, string>;
  unknownPrefix?: string;
  unknownSuffix?: string;
}

function defineTable(def: TableDefinition): LookupTable {
  const prefix = def.unknownPrefix ?? `Unknown ${def.category} (ID: `;
  const suffix = def.unknownSuffix ?? ')';

  const entries = new Map<string, string>();
  for (const [code, label] of Object.entries(def.entries)) {
    entries.set(code.toLowerCase(), label);
  }
  // Canonical labels resolve to themselves
  for (const label of Object.values(def.entries)) {
    entries.set(label.toLowerCase(), label);
  }

  return Object.freeze({
    name: def.name,
    category: def.category,
    entries,
    formatUnknown: (code: string) => `${prefix}${code}${suffix}`,
    parseUnknown: (text: string) => {
      if (text.length <= prefix.length + suffix.length) return undefined;
      if (!text.startsWith(prefix) || !text.endsWith(suffix)) return undefined;
      return text.slice(prefix.length, text.length - suffix.length);
    },
  });
}

export const ISP_PROVIDERS = defineTable({
  name: 'isp-provider',
  category: 'ISP',
  unknownPrefix: 'Unknown ISP ID=',
  unknownSuffix: '',
  entries: {
    '6': 'Virgin Media (VTR)',
    '8': 'Virgin Media',
    '20': 'Ziggo',
    '41': 'Virgin Media Ireland',
    '44': 'Telekom Austria',
    '50': 'Yallo',
    '51': 'Sunrise',
    '118': 'Virgin Media',
  },
});

export const REGISTRATION_STATES = defineTable({
  name: 'registration',
  category: 'Registration',
  entries: {
    '0': 'Unregistered',
    '1': 'Other',
    '2': 'Registered',
    '3': 'Not Registered',
    '4': 'Registration Complete',
    '5': 'Access Denied',
    '6': 'Operational',
  },
});

export const WAN_IP_PROVISION_MODES = defineTable({
  name: 'wan-ip-provision-mode',
  category: 'WAN IP Provision Mode',
  entries: {
    '0': 'DHCP',
    '1': 'Static',
    '2': 'PPPoE',
  },
});

// docsIfDocsisBaseCapability
export const DOCSIS_MODES = defineTable({
  name: 'docsis-mode',
  category: 'DOCSIS Mode',
  entries: {
    '1': 'DOCSIS 1.0',
    '2': 'DOCSIS 1.1',
    '3': 'DOCSIS 2.0',
    '4': 'DOCSIS 3.0',
    '5': 'DOCSIS 3.1',
    '6': 'DOCSIS 4.0',
  },
});

export const NETWORK_ACCESS = defineTable({
  name: 'network-access',
  category: 'Network Access',
  entries: {
    '0': 'Denied',
    '1': 'Allowed',
    'false': 'Denied',
    'true': 'Allowed',
    'disabled': 'Denied',
    'enabled': 'Allowed',
  },
});

export const BASELINE_PRIVACY = defineTable({
  name: 'baseline-privacy',
  category: 'Baseline Privacy',
  entries: {
    '0': 'Disabled',
    '1': 'Enabled',
    'false': 'Disabled',
    'true': 'Enabled',
    'no': 'Disabled',
    'yes': 'Enabled',
    'off': 'Disabled',
    'on': 'Enabled',
  },
});

export const LOCK_STATES = defineTable({
  name: 'lock-state',
  category: 'Lock State',
  entries: {
    '0': 'Not Locked',
    '1': 'Locked',
    'unlocked': 'Not Locked',
  },
});

// docsQosServiceFlowSchedulingType
export const SCHEDULING_TYPES = defineTable({
  name: 'scheduling-type',
  category: 'Scheduling Type',
  entries: {
    '1': 'Undefined',
    '2': 'Best Effort',
    '3': 'Non-Real-Time Polling Service',
    '4': 'Real-Time Polling Service',
    '5': 'Unsolicited Grant Service with Activity Detection',
    '6': 'Unsolicited Grant Service',
    'be': 'Best Effort',
    'nrtps': 'Non-Real-Time Polling Service',
    'rtps': 'Real-Time Polling Service',
    'ugs-ad': 'Unsolicited Grant Service with Activity Detection',
    'ugs': 'Unsolicited Grant Service',
  },
});

export const MODEM_STATUS_LABELS = defineTable({
  name: 'modem-status',
  category: 'Modem Status',
  entries: {
    'online': 'Online',
    'offline': 'Offline',
    'operational': 'Operational',
    'ok': 'OK',
  },
});

export const LOOKUP_TABLES: ReadonlyMap<LookupTableName, LookupTable> = new Map(
  [
    ISP_PROVIDERS,
    REGISTRATION_STATES,
    WAN_IP_PROVISION_MODES,
    DOCSIS_MODES,
    NETWORK_ACCESS,
    BASELINE_PRIVACY,
    LOCK_STATES,
    SCHEDULING_TYPES,
    MODEM_STATUS_LABELS,
  ].map(table => [table.name, table])
);

export function getLookupTable(name: LookupTableName): LookupTable {
  const table = LOOKUP_TABLES.get(name);
  if (!table) {
    throw new Error(`Lookup table '${name}' is not defined`);
  }
  return table;
}

/**
 * Resolves a device code to its label. Never throws: an unmatched code comes
 * back as the table's unknown label with the code attached.
 */
export function lookupCode(table: LookupTable, raw: RawValue): LookupResult {
  const code = String(raw).trim();

  const label = table.entries.get(code.toLowerCase());
  if (label !== undefined) {
    return { value: label };
  }

  const embedded = table.parseUnknown(code);
  if (embedded !== undefined) {
    return { value: code, unmappedCode: embedded };
  }

  return { value: table.formatUnknown(code), unmappedCode: code };
}
