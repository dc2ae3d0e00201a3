import {describe, expect, it, vi} from 'vitest';

import {
  filterResponseHeaders,
  forwardStraightforward,
  forwardStructured,
  parseBody,
  stripHopByHopHeaders,
  type FetchLike,
  type UpstreamTarget
} from '../index';

type CapturedRequest = {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: string | undefined;
};

const createFetch = (respond: () => Response = () => new Response('{"ok":true}', {status: 200})) => {
  const calls: CapturedRequest[] = [];
  const fetchImpl = vi.fn<FetchLike>((input, init) => {
    const body = init?.body;
    calls.push({
      url: String(input),
      method: init?.method ?? 'GET',
      headers: Object.fromEntries(new Headers(init?.headers).entries()),
      body: Buffer.isBuffer(body) ? body.toString('utf8') : undefined
    });
    return Promise.resolve(respond());
  });

  return {calls, fetchImpl};
};

const target: UpstreamTarget = {base_url: 'http://upstream.test/api/'};

describe('forwardStructured', () => {
  it('sends query parameters as a map and no body on GET', async () => {
    const {calls, fetchImpl} = createFetch();

    const result = await forwardStructured({
      target,
      method: 'GET',
      path: '/v1/llm/list',
      query: {page: '1', tag: ['a', 'b']},
      body: {kind: 'json', value: {ignored: true}},
      fetchImpl
    });

    expect(result.ok).toBe(true);
    expect(calls).toEqual([
      {
        url: 'http://upstream.test/api/v1/llm/list?page=1&tag=a&tag=b',
        method: 'GET',
        headers: {accept: 'application/json'},
        body: undefined
      }
    ]);
  });

  it('warns when a GET body is discarded', async () => {
    const {calls, fetchImpl} = createFetch();
    const warn = vi.fn();
    const logger = {log: vi.fn(), debug: vi.fn(), info: vi.fn(), warn, error: vi.fn(), fatal: vi.fn()};

    await forwardStructured({
      target,
      method: 'GET',
      path: '/v1/llm/list',
      query: {},
      body: {kind: 'json', value: {ignored: true}},
      fetchImpl,
      logger
    });
    await forwardStructured({target, method: 'GET', path: '/v1/llm/list', query: {}, body: {kind: 'empty'}, fetchImpl, logger});

    expect(calls.map(call => call.body)).toEqual([undefined, undefined]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith({
      event: 'forwarder.body.dropped',
      component: 'forwarder.structured',
      message: 'Request body discarded on a structured GET',
      reason_code: 'body_not_forwarded',
      metadata: {path: '/v1/llm/list', payload_kind: 'json'}
    });
  });

  it('keeps every Set-Cookie line of the upstream reply', async () => {
    const {fetchImpl} = createFetch(
      () =>
        new Response('{}', {
          status: 200,
          headers: [
            ['content-type', 'application/json'],
            ['set-cookie', 'a=1; Expires=Wed, 21 Oct 2026 07:28:00 GMT'],
            ['set-cookie', 'b=2']
          ]
        })
    );

    const result = await forwardStructured({target, method: 'GET', path: '/v1/session', query: {}, body: {kind: 'empty'}, fetchImpl});

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }

    expect(result.value.set_cookie).toEqual(['a=1; Expires=Wed, 21 Oct 2026 07:28:00 GMT', 'b=2']);
    expect(result.value.headers).toEqual({'content-type': 'application/json'});
  });

  it('re-serializes JSON bodies and applies injected headers', async () => {
    const {calls, fetchImpl} = createFetch();

    await forwardStructured({
      target,
      method: 'post',
      path: '/v1/kb/create',
      query: {},
      body: {kind: 'json', value: {name: 'docs'}},
      injectedHeaders: {authorization: 'test-token'},
      fetchImpl
    });

    expect(calls[0]).toEqual({
      url: 'http://upstream.test/api/v1/kb/create',
      method: 'POST',
      headers: {accept: 'application/json', authorization: 'test-token', 'content-type': 'application/json'},
      body: '{"name":"docs"}'
    });
  });

  it('sends raw bodies unmodified with the caller content type', async () => {
    const {calls, fetchImpl} = createFetch();

    await forwardStructured({
      target,
      method: 'PUT',
      path: '/v1/document/upload',
      query: {},
      body: {kind: 'raw', bytes: Buffer.from('name=docs&x={', 'utf8')},
      contentType: 'application/x-www-form-urlencoded',
      fetchImpl
    });

    expect(calls[0]?.body).toBe('name=docs&x={');
    expect(calls[0]?.headers['content-type']).toBe('application/x-www-form-urlencoded');
  });

  it('refuses unsupported verbs without contacting the upstream', async () => {
    const {fetchImpl} = createFetch();

    const result = await forwardStructured({
      target,
      method: 'PATCH',
      path: '/v1/kb/update',
      query: {},
      body: {kind: 'empty'},
      fetchImpl
    });

    expect(result).toEqual({ok: false, error: {code: 'method_not_allowed', message: 'Method PATCH not allowed'}});
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('passes non-2xx upstream replies through as results', async () => {
    const {fetchImpl} = createFetch(
      () => new Response('missing', {status: 404, headers: {'content-type': 'text/plain', 'x-upstream-id': 'u_1'}})
    );

    const result = await forwardStructured({
      target,
      method: 'GET',
      path: '/v1/kb/detail',
      query: {},
      body: {kind: 'empty'},
      fetchImpl
    });

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }

    expect(result.value.status).toBe(404);
    expect(result.value.body.toString('utf8')).toBe('missing');
    expect(result.value.headers['content-type']).toBe('text/plain');
    expect(result.value.headers['x-upstream-id']).toBe('u_1');
  });

  it('maps a silent upstream to upstream_timeout', async () => {
    const hangingFetch: FetchLike = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });

    const result = await forwardStructured({
      target: {...target, timeouts: {connect_timeout_ms: 100}},
      method: 'GET',
      path: '/slow',
      query: {},
      body: {kind: 'empty'},
      fetchImpl: hangingFetch
    });

    expect(result).toEqual({
      ok: false,
      error: {code: 'upstream_timeout', message: 'Upstream did not respond within 100ms'}
    });
  });

  it('maps connection failures to upstream_network_error', async () => {
    const result = await forwardStructured({
      target,
      method: 'GET',
      path: '/down',
      query: {},
      body: {kind: 'empty'},
      fetchImpl: () => Promise.reject(new TypeError('fetch failed'))
    });

    expect(result).toEqual({ok: false, error: {code: 'upstream_network_error', message: 'fetch failed'}});
  });

  it('bounds the buffered reply size', async () => {
    const {fetchImpl} = createFetch(() => new Response('abcdefgh', {status: 200}));

    const result = await forwardStructured({
      target: {...target, limits: {max_response_bytes: 4}},
      method: 'GET',
      path: '/big',
      query: {},
      body: {kind: 'empty'},
      fetchImpl
    });

    expect(result.ok === false && result.error.code).toBe('upstream_response_too_large');
  });
});

describe('forwardStraightforward', () => {
  it('copies headers except the removal set and keeps query and body bytes', async () => {
    const {calls, fetchImpl} = createFetch();

    const result = await forwardStraightforward({
      target,
      method: 'POST',
      path: '/threads/search',
      rawQuery: 'a=1&b=%20x',
      headers: {
        host: 'gateway.test',
        'content-length': '5',
        authorization: 'Bearer caller-token',
        connection: 'keep-alive, x-trace',
        'x-trace': '1',
        'keep-alive': 'timeout=5',
        te: 'trailers',
        trailer: 'x-checksum',
        'transfer-encoding': 'chunked',
        upgrade: 'h2c',
        'proxy-authorization': 'Basic placeholder',
        'proxy-authenticate': 'Basic',
        'content-type': 'multipart/form-data; boundary=abc',
        accept: 'application/json',
        'x-custom': ['a', 'b'],
        'x-missing': undefined
      },
      body: Buffer.from('hello', 'utf8'),
      injectedHeaders: {authorization: 'test-token'},
      fetchImpl
    });

    expect(result.ok).toBe(true);
    expect(calls).toEqual([
      {
        url: 'http://upstream.test/api/threads/search?a=1&b=%20x',
        method: 'POST',
        headers: {
          accept: 'application/json',
          authorization: 'test-token',
          'content-type': 'multipart/form-data; boundary=abc',
          'x-custom': 'a, b'
        },
        body: 'hello'
      }
    ]);
  });

  it('forwards without a body or authorization when none is given', async () => {
    const {calls, fetchImpl} = createFetch();

    await forwardStraightforward({
      target,
      method: 'GET',
      path: '/threads/t_1',
      rawQuery: '',
      headers: {authorization: 'Bearer caller-token'},
      body: Buffer.alloc(0),
      fetchImpl
    });

    expect(calls[0]).toEqual({url: 'http://upstream.test/api/threads/t_1', method: 'GET', headers: {}, body: undefined});
  });

  it('fails closed on malformed Connection tokens', async () => {
    const {fetchImpl} = createFetch();

    const result = await forwardStraightforward({
      target,
      method: 'GET',
      path: '/threads',
      rawQuery: '',
      headers: {connection: 'x-valid, bad token'},
      body: Buffer.alloc(0),
      fetchImpl
    });

    expect(result.ok === false && result.error.code).toBe('invalid_connection_header');
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});

describe('headers', () => {
  it('strips hop-by-hop and Connection-nominated headers', () => {
    expect(
      stripHopByHopHeaders({Connection: 'Keep-Alive, X-Remove-Me', 'Keep-Alive': 'timeout=5', 'X-Remove-Me': '1', 'X-Keep-Me': 'ok'})
    ).toEqual({ok: true, value: {'x-keep-me': 'ok'}});
  });

  it('drops framing headers from upstream replies', () => {
    expect(
      filterResponseHeaders({
        'content-type': 'application/json',
        'content-length': '10',
        'content-encoding': 'gzip',
        'transfer-encoding': 'chunked',
        connection: 'close',
        'x-request-id': 'r_1'
      })
    ).toEqual({'content-type': 'application/json', 'x-request-id': 'r_1'});
  });
});

describe('parseBody', () => {
  it('classifies payloads without failing', () => {
    expect(parseBody(Buffer.alloc(0))).toEqual({kind: 'empty'});
    expect(parseBody(Buffer.from('{"a":[1,2]}', 'utf8'))).toEqual({kind: 'json', value: {a: [1, 2]}});

    const notJson = parseBody(Buffer.from('{"a":', 'utf8'));
    expect(notJson.kind === 'raw' && notJson.bytes.toString('utf8')).toBe('{"a":');

    const binary = parseBody(Uint8Array.from([0xff, 0xfe, 0x00]));
    expect(binary.kind === 'raw' && [...binary.bytes]).toEqual([0xff, 0xfe, 0x00]);
  });
});
