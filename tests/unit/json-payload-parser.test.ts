import { describe, it, expect } from 'vitest';
import { parseJsonPayload } from '../../src/core/parsers/json-payload-parser.js';
import { createEndpointTable } from '../../src/core/endpoint-table.js';
import { ErrorCode, ParseError } from '../../src/utils/errors.js';
import type { EndpointDescriptor } from '../../src/types/endpoints.js';

const table = createEndpointTable();

function endpoint(id: string): EndpointDescriptor {
  const found = table.endpoints.find(e => e.id === id);
  if (!found) throw new Error(`No default endpoint ${id}`);
  return found;
}

const networkStatus = endpoint('network-status');
const troubleshoot = endpoint('troubleshoot');

function networkStatusArray(overrides: Record<number, unknown> = {}): unknown[] {
  const values: unknown[] = [
    'x', 'x', '1', '', 118, '1', '5', '1', 'DOCSIS 3.1', 'cm.cfg',
    '1001', '1000000 bps', '42600', '0', '2001', '50000000', '3044', '0', '3044', '2',
    '', '', '', '', '', '4', '24', '2', '1',
  ];
  for (const [index, value] of Object.entries(overrides)) {
    values[Number(index)] = value;
  }
  return values;
}

describe('parseJsonPayload', () => {
  it('should read positional fields from an array of primitives', () => {
    const result = parseJsonPayload(JSON.stringify(networkStatusArray()), networkStatus);
    if (!result.ok) throw result.error;

    expect(result.raw.fields.primary_downstream_channel).toBe('1');
    expect(result.raw.fields.isp_provider).toBe(118);
    expect(result.raw.fields.docsis_version).toBe('DOCSIS 3.1');
    expect(result.raw.fields.docsis_mode).toBe('DOCSIS 3.1');
    expect(result.raw.fields.config_file).toBe('cm.cfg');
    expect(result.raw.channels).toBeUndefined();
  });

  it('should coerce numeric text for integer and rate fields only', () => {
    const result = parseJsonPayload(JSON.stringify(networkStatusArray()), networkStatus);
    if (!result.ok) throw result.error;

    expect(result.raw.fields.max_cpes).toBe(5);
    expect(result.raw.fields.primary_downstream_sfid).toBe(1001);
    expect(result.raw.fields.primary_downstream_max_traffic_burst).toBe(42600);
    expect(result.raw.fields.docsis_3_0_downstream).toBe(24);
    // Unit suffix keeps the text for the normalizer
    expect(result.raw.fields.primary_downstream_max_traffic_rate).toBe('1000000 bps');
    // Lookup codes stay as sent
    expect(result.raw.fields.network_access).toBe('1');
  });

  it('should fall back to the next selector when the first is missing', () => {
    const result = parseJsonPayload(JSON.stringify({ cust_id: 999 }), networkStatus);
    if (!result.ok) throw result.error;

    expect(result.raw.fields).toEqual({ isp_provider: 999 });
  });

  it('should skip values that are not primitives', () => {
    const result = parseJsonPayload(JSON.stringify(networkStatusArray({ 4: null, 6: { n: 5 } })), networkStatus);
    if (!result.ok) throw result.error;

    expect(result.raw.fields.isp_provider).toBeUndefined();
    expect(result.raw.fields.max_cpes).toBeUndefined();
  });

  it('should merge arrays of objects with the first occurrence winning', () => {
    const body = JSON.stringify([
      { js_cm_oper_value: '12', unrelated: 'x' },
      { js_cm_oper_value: '1', js_fail_safe_mode: '0' },
    ]);
    const result = parseJsonPayload(body, troubleshoot);
    if (!result.ok) throw result.error;

    expect(result.raw.fields).toEqual({
      cable_modem_status: '12',
      fail_safe_mode: '0',
    });
  });

  it('should leave missing keys absent', () => {
    const result = parseJsonPayload('{}', troubleshoot);

    expect(result).toEqual({ ok: true, raw: { fields: {} } });
  });

  it('should reject invalid JSON', () => {
    const result = parseJsonPayload('<html>Login</html>', troubleshoot);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ParseError);
    expect(result.error.code).toBe(ErrorCode.PAYLOAD_PARSE_FAILED);
    expect(result.error.message).toBe('Response from /php/connection_troubleshoot_data.php is not valid JSON');
  });

  it('should reject roots that are not containers', () => {
    for (const body of ['42', '"text"', 'null']) {
      const result = parseJsonPayload(body, troubleshoot);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCode.PAYLOAD_SHAPE_UNEXPECTED);
      }
    }
  });
});
