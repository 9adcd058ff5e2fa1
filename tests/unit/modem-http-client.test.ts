import { describe, it, expect, afterEach } from 'vitest';
import {
  AxiosError,
  CanceledError,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';
import { ModemHttpClient, type TransportSession } from '../../src/infra/modem-http-client.js';
import {
  CancelledError,
  ConnectionError,
  ErrorCode,
  HttpStatusError,
  OperationTimeoutError,
} from '../../src/utils/errors.js';

type Route = (config: InternalAxiosRequestConfig) => Promise<{ status: number; data: string }>;

function respond(config: InternalAxiosRequestConfig, status: number, data: string): AxiosResponse<string> {
  return { data, status, statusText: String(status), headers: {}, config };
}

function fakeDevice(routes: Record<string, Route>): { adapter: AxiosAdapter; calls: string[] } {
  const calls: string[] = [];
  const adapter: AxiosAdapter = async (config) => {
    const url = config.url ?? '';
    calls.push(url);
    const route = routes[url];
    if (!route) return respond(config, 404, 'Not Found');
    const { status, data } = await route(config);
    return respond(config, status, data);
  };
  return { adapter, calls };
}

const page = (data: string, status = 200): Route => async () => ({ status, data });

const refuse: Route = async (config) => {
  throw new AxiosError('connect ECONNREFUSED 192.168.100.1:80', 'ECONNREFUSED', config);
};

const hang: Route = () => new Promise(() => undefined);

describe('ModemHttpClient', () => {
  let session: TransportSession | undefined;

  afterEach(() => {
    session?.close();
    session = undefined;
  });

  it('should build the base URL from host, port and scheme', () => {
    expect(new ModemHttpClient({ host: '192.168.100.1' }).baseUrl).toBe('http://192.168.100.1:80');
    expect(new ModemHttpClient({ host: 'modem.lan', useSsl: true }).baseUrl).toBe('https://modem.lan:443');
    expect(new ModemHttpClient({ host: 'modem.lan', port: 8080 }).baseUrl).toBe('http://modem.lan:8080');
  });

  it('should return the body as text without parsing it', async () => {
    const { adapter } = fakeDevice({ '/data.php': page('{"a":1}') });
    session = new ModemHttpClient({ host: 'modem', adapter }).openSession();

    const result = await session.fetch('/data.php');

    expect(result).toEqual({ ok: true, path: '/data.php', status: 200, body: '{"a":1}', fromCache: false });
  });

  it('should map non-2xx responses to HttpStatusError', async () => {
    const { adapter } = fakeDevice({});
    session = new ModemHttpClient({ host: 'modem', adapter }).openSession();

    const result = await session.fetch('/missing');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(HttpStatusError);
    expect(result.error.message).toBe('GET /missing returned HTTP 404');
  });

  it('should map refused connections to ConnectionError', async () => {
    const { adapter } = fakeDevice({ '/': refuse });
    session = new ModemHttpClient({ host: 'modem', adapter }).openSession();

    const result = await session.fetch('/');

    if (result.ok) throw new Error('expected failure');
    expect(result.error).toBeInstanceOf(ConnectionError);
    expect(result.error.message).toBe('Cannot reach modem for GET /: connect ECONNREFUSED 192.168.100.1:80');
  });

  it('should map axios timeouts to OperationTimeoutError', async () => {
    const { adapter } = fakeDevice({
      '/': async (config) => {
        throw new AxiosError('timeout of 10ms exceeded', 'ECONNABORTED', config);
      },
    });
    session = new ModemHttpClient({ host: 'modem', adapter }).openSession();

    const result = await session.fetch('/', { timeoutMs: 10 });

    if (result.ok) throw new Error('expected failure');
    expect(result.error).toBeInstanceOf(OperationTimeoutError);
    expect(result.error.message).toBe("Operation 'GET /' timed out after 10ms");
  });

  it('should give up on a device that never answers', async () => {
    const { adapter } = fakeDevice({ '/slow': hang });
    session = new ModemHttpClient({ host: 'modem', adapter }).openSession();

    const result = await session.fetch('/slow', { timeoutMs: 20 });

    if (result.ok) throw new Error('expected failure');
    expect(result.error).toBeInstanceOf(OperationTimeoutError);
    expect(result.error.code).toBe(ErrorCode.MODEM_REQUEST_TIMEOUT);
  });

  it('should map aborted requests to CancelledError', async () => {
    const { adapter } = fakeDevice({
      '/': async () => {
        throw new CanceledError('canceled');
      },
    });
    session = new ModemHttpClient({ host: 'modem', adapter }).openSession();

    const result = await session.fetch('/');

    if (result.ok) throw new Error('expected failure');
    expect(result.error).toBeInstanceOf(CancelledError);
    expect(result.error.message).toBe('GET / was aborted');
  });

  it('should reuse a page already fetched in the same session', async () => {
    const { adapter, calls } = fakeDevice({ '/': page('<html>DOCSIS</html>') });
    session = new ModemHttpClient({ host: 'modem', adapter }).openSession();

    await session.fetch('/');
    const second = await session.fetch('/');

    expect(calls).toEqual(['/']);
    expect(second).toMatchObject({ ok: true, fromCache: true, body: '<html>DOCSIS</html>' });
  });

  it('should not share the page cache between sessions', async () => {
    const { adapter, calls } = fakeDevice({ '/': page('<html></html>') });
    const client = new ModemHttpClient({ host: 'modem', adapter });

    const first = client.openSession();
    await first.fetch('/');
    first.close();

    session = client.openSession();
    await session.fetch('/');

    expect(calls).toEqual(['/', '/']);
  });

  it('should visit the priming page before the data endpoint', async () => {
    const { adapter, calls } = fakeDevice({
      '/': page('<html></html>'),
      '/php/data.php': page('[1,2,3]'),
    });
    session = new ModemHttpClient({ host: 'modem', adapter }).openSession();

    const result = await session.fetchPrimed('/', '/php/data.php');

    expect(calls).toEqual(['/', '/php/data.php']);
    expect(result).toMatchObject({ ok: true, body: '[1,2,3]' });
  });

  it('should skip the data endpoint when the device is unreachable', async () => {
    const { adapter, calls } = fakeDevice({ '/': refuse, '/php/data.php': page('[]') });
    session = new ModemHttpClient({ host: 'modem', adapter }).openSession();

    const result = await session.fetchPrimed('/', '/php/data.php');

    expect(calls).toEqual(['/']);
    if (result.ok) throw new Error('expected failure');
    expect(result.path).toBe('/php/data.php');
    expect(result.error).toBeInstanceOf(ConnectionError);
  });

  it('should still try the data endpoint when priming is rejected with a status', async () => {
    const { adapter, calls } = fakeDevice({ '/': page('busy', 503), '/php/data.php': page('[]') });
    session = new ModemHttpClient({ host: 'modem', adapter }).openSession();

    const result = await session.fetchPrimed('/', '/php/data.php');

    expect(calls).toEqual(['/', '/php/data.php']);
    expect(result.ok).toBe(true);
  });

  it('should refuse requests after close or abort', async () => {
    const { adapter, calls } = fakeDevice({ '/': page('ok') });
    const client = new ModemHttpClient({ host: 'modem', adapter });

    const closed = client.openSession();
    closed.close();
    const afterClose = await closed.fetch('/');

    const controller = new AbortController();
    controller.abort();
    session = client.openSession(controller.signal);
    const afterAbort = await session.fetch('/');

    expect(calls).toEqual([]);
    expect(closed.closed).toBe(true);
    for (const result of [afterClose, afterAbort]) {
      if (result.ok) throw new Error('expected failure');
      expect(result.error).toBeInstanceOf(CancelledError);
      expect(result.error.message).toBe('Session ended before GET /');
    }
  });

  describe('probe', () => {
    it('should recognize a cable modem landing page', async () => {
      const { adapter } = fakeDevice({ '/': page('<title>Cable Modem Status</title>') });

      const result = await new ModemHttpClient({ host: 'modem', adapter }).probe();

      expect(result).toEqual({ reachable: true, recognized: true, status: 200 });
    });

    it('should flag a page that does not look like a modem', async () => {
      const { adapter } = fakeDevice({ '/': page('<title>Router login</title>') });

      const result = await new ModemHttpClient({ host: 'modem', adapter }).probe();

      expect(result).toEqual({ reachable: true, recognized: false, status: 200 });
    });

    it('should report an unreachable device', async () => {
      const { adapter } = fakeDevice({ '/': page('error', 500) });

      const result = await new ModemHttpClient({ host: 'modem', adapter }).probe();

      expect(result.reachable).toBe(false);
      expect(result.status).toBe(500);
      expect(result.error).toBeInstanceOf(HttpStatusError);
    });
  });
});
