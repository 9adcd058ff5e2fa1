import { getMetricField, METRIC_FIELDS } from '../metric-catalog.js';
import { ErrorCode, ParseError } from '../../utils/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import type { EndpointDescriptor, FieldSelector } from '../../types/endpoints.js';
import type { MetricKey, RawFieldMap, RawValue } from '../../types/metrics.js';

const logger = createChildLogger('json-payload-parser');

const NUMERIC_TEXT = /^\s*-?\d+(?:\.\d+)?\s*$/;

export type JsonParseResult =
  | { ok: true; raw: RawFieldMap }
  | { ok: false; error: ParseError };

interface JsonView {
  positional: readonly unknown[];
  keyed: ReadonlyMap<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRawValue(value: unknown): value is RawValue {
  return typeof value === 'string' || typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value));
}

function toView(root: unknown): JsonView | undefined {
  if (isRecord(root)) {
    return { positional: [], keyed: new Map(Object.entries(root)) };
  }
  if (Array.isArray(root)) {
    const keyed = new Map<string, unknown>();
    for (const item of root) {
      if (!isRecord(item)) continue;
      for (const [key, value] of Object.entries(item)) {
        if (!keyed.has(key)) keyed.set(key, value);
      }
    }
    return { positional: root, keyed };
  }
  return undefined;
}

function select(view: JsonView, selector: FieldSelector): unknown {
  return typeof selector === 'number' ? view.positional[selector] : view.keyed.get(selector);
}

/** Numeric text becomes a number for integer and rate fields; anything else is left as sent. */
function coerce(key: MetricKey, value: RawValue): RawValue {
  const { kind } = getMetricField(key);
  if ((kind === 'integer' || kind === 'rate') && typeof value === 'string' && NUMERIC_TEXT.test(value)) {
    return Number(value);
  }
  return value;
}

export function parseJsonPayload(body: string, descriptor: EndpointDescriptor): JsonParseResult {
  let root: unknown;
  try {
    root = JSON.parse(body);
  } catch (err) {
    return {
      ok: false,
      error: new ParseError(`Response from ${descriptor.path} is not valid JSON`, {
        cause: err instanceof Error ? err : undefined,
        context: { endpoint: descriptor.id, length: body.length },
      }),
    };
  }

  const view = toView(root);
  if (!view) {
    return {
      ok: false,
      error: new ParseError(`Response from ${descriptor.path} is not a JSON object or array`, {
        code: ErrorCode.PAYLOAD_SHAPE_UNEXPECTED,
        context: { endpoint: descriptor.id, type: root === null ? 'null' : typeof root },
      }),
    };
  }

  const fields: Partial<Record<MetricKey, RawValue>> = {};
  const missing: MetricKey[] = [];

  for (const { key } of METRIC_FIELDS) {
    const selectors = descriptor.fields[key];
    if (!selectors) continue;

    let found: RawValue | undefined;
    for (const selector of selectors) {
      const value = select(view, selector);
      if (isRawValue(value)) {
        found = value;
        break;
      }
    }

    if (found === undefined) {
      missing.push(key);
    } else {
      fields[key] = coerce(key, found);
    }
  }

  logger.debug({ endpoint: descriptor.id, found: Object.keys(fields).length, missing }, 'Parsed JSON payload');

  return { ok: true, raw: { fields } };
}
