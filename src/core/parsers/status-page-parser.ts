import * as cheerio from 'cheerio';
import { createChildLogger } from '../../utils/logger.js';
import type {
  ChannelDirection,
  ChannelRow,
  DocsisVersion,
  MetricKey,
  RawFieldMap,
  RawValue,
} from '../../types/metrics.js';

const logger = createChildLogger('status-page-parser');

/** Row labels on the status/configuration tables, matched as substrings. */
const STATUS_LABELS: ReadonlyArray<[string, MetricKey]> = [
  ['cable modem status', 'cable_modem_status'],
  ['primary downstream channel', 'primary_downstream_channel'],
  ['docsis version', 'docsis_version'],
  ['docsis mode', 'docsis_mode'],
  ['network access', 'network_access'],
  ['maximum number of cpes', 'max_cpes'],
  ['baseline privacy', 'baseline_privacy'],
  ['config file', 'config_file'],
];

/** Metric keys this page shape can populate. */
export const STATUS_PAGE_FIELDS: readonly MetricKey[] = [
  ...STATUS_LABELS.map(([, key]) => key),
  'docsis_3_0_downstream',
  'docsis_3_0_upstream',
  'docsis_3_1_downstream',
  'docsis_3_1_upstream',
  'total_downstream_channels',
  'total_upstream_channels',
];

const SUMMARY_ROW = /^docsis\s*3\.[01]\s*channels?\b/;
const VERSION_TAG = /^docsis\s*(3\.[01])$/;

interface ChannelType {
  version: DocsisVersion;
  direction: ChannelDirection;
}

/** Modulation or channel-type cells, in the spellings firmware uses (`SC-QAM`, `QAM256`, `256QAM`, `QAM 256`). */
const CHANNEL_TYPES: ReadonlyArray<[RegExp, ChannelType]> = [
  [/^(sc-?)?qam\s*\d*$/, { version: '3.0', direction: 'downstream' }],
  [/^\d+\s*-?qam$/, { version: '3.0', direction: 'downstream' }],
  [/^(a-?)?tdma$/, { version: '3.0', direction: 'upstream' }],
  [/^s-?cdma$/, { version: '3.0', direction: 'upstream' }],
  [/^ofdm$/, { version: '3.1', direction: 'downstream' }],
  [/^ofdma$/, { version: '3.1', direction: 'upstream' }],
];

function channelTypeOf(cell: string): ChannelType | undefined {
  return CHANNEL_TYPES.find(([pattern]) => pattern.test(cell))?.[1];
}

function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function cleanLabel(text: string): string {
  return cleanText(text).toLowerCase().replace(/:$/, '').trim();
}

function directionOf(text: string): ChannelDirection | undefined {
  const lower = text.toLowerCase();
  const down = lower.includes('downstream');
  const up = lower.includes('upstream');
  if (down && !up) return 'downstream';
  if (up && !down) return 'upstream';
  return undefined;
}

function matchStatusLabel(label: string): MetricKey | undefined {
  for (const [needle, key] of STATUS_LABELS) {
    if (label.includes(needle)) return key;
  }
  return undefined;
}

/**
 * Tags one table row as a channel of a DOCSIS version and direction. Returns
 * undefined for anything that is not a channel row.
 */
export function classifyChannelRow(
  cells: readonly string[],
  tableDirection: ChannelDirection | undefined
): ChannelRow | undefined {
  let version: DocsisVersion | undefined;
  let rowDirection: ChannelDirection | undefined;
  let typeDirection: ChannelDirection | undefined;

  for (const cell of cells) {
    const lower = cell.toLowerCase();

    const tagged = VERSION_TAG.exec(lower)?.[1];
    if (tagged === '3.0' || tagged === '3.1') {
      version ??= tagged;
      continue;
    }

    const type = channelTypeOf(lower);
    if (type) {
      version ??= type.version;
      typeDirection ??= type.direction;
      continue;
    }

    if (lower === 'downstream' || lower === 'upstream') {
      rowDirection = lower;
    }
  }

  const direction = rowDirection ?? tableDirection ?? typeDirection;
  if (!version || !direction) return undefined;
  return { version, direction };
}

/**
 * Extracts the status table and per-row channel tags from the modem's main
 * page. A page without any recognizable table yields an empty map.
 */
export function parseStatusPage(html: string): RawFieldMap {
  const $ = cheerio.load(html);
  const fields: Partial<Record<MetricKey, RawValue>> = {};
  const channels: ChannelRow[] = [];
  let untaggedRows = 0;

  $('table').each((_, table) => {
    const $table = $(table);

    const heading = [
      $table.children('caption').text(),
      $table.attr('id') ?? '',
      $table.attr('class') ?? '',
      $table.find('tr').first().children('th').text(),
      $table.prevAll('h1, h2, h3, h4, h5, h6').first().text(),
    ].join(' ');
    const tableDirection = directionOf(heading);

    // Rows of nested tables belong to the nested table
    const rows = $table.find('tr').filter((_, tr) => $(tr).closest('table').get(0) === table);

    rows.each((_, tr) => {
      const $cells = $(tr).children('td, th');
      const hasData = $(tr).children('td').length > 0;
      const cells = $cells.toArray().map(cell => cleanText($(cell).text()));
      if (!hasData || cells.length < 2) return;

      const label = cleanLabel(cells[0] ?? '');
      const statusKey = matchStatusLabel(label);
      if (statusKey) {
        if (fields[statusKey] === undefined) {
          fields[statusKey] = cells[1] ?? '';
        }
        return;
      }

      if (SUMMARY_ROW.test(label)) return;

      const channel = classifyChannelRow(cells, tableDirection);
      if (channel) {
        channels.push(channel);
      } else if (tableDirection) {
        untaggedRows++;
      }
    });
  });

  logger.debug({ fieldCount: Object.keys(fields).length, channelRows: channels.length, untaggedRows }, 'Parsed status page');

  // Channel counts are only reported when at least one row could be tagged
  if (channels.length === 0) {
    if (untaggedRows > 0) {
      logger.warn({ untaggedRows }, 'Channel table rows carry no recognizable channel type');
    }
    return { fields };
  }
  return { fields, channels };
}
