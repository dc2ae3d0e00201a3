import type {ReadableStream as NodeReadableStream, ReadableStreamDefaultReader} from 'node:stream/web';

import type {StructuredLogger} from '@relaygate/logging';

import {serializeBody} from './body';
import {
  DEFAULT_FORWARDER_LIMITS,
  DEFAULT_FORWARDER_TIMEOUTS,
  STRUCTURED_METHODS,
  type Body,
  type FetchLike,
  type ForwarderLimits,
  type ForwarderTimeouts,
  type HeaderMap,
  type InboundHeaders,
  type QueryParams,
  type StructuredMethod,
  type UpstreamResponse,
  type UpstreamTarget
} from './contracts';
import {err, ok, type ForwarderResult} from './errors';
import {buildPassthroughHeaders, filterResponseHeaders, readSetCookies, stripHopByHopHeaders, toHeaderMap} from './headers';

const METHODS_WITHOUT_BODY = new Set(['GET', 'HEAD']);

export const resolveTimeouts = (target: UpstreamTarget): ForwarderTimeouts => ({
  ...DEFAULT_FORWARDER_TIMEOUTS,
  ...(target.timeouts ?? {})
});

export const resolveLimits = (target: UpstreamTarget): ForwarderLimits => ({
  ...DEFAULT_FORWARDER_LIMITS,
  ...(target.limits ?? {})
});

/**
 * Joins the upstream base URL with a sub-path. The base URL may carry its own
 * path prefix, which is kept.
 */
export const buildUpstreamUrl = ({
  baseUrl,
  path,
  query
}: {
  baseUrl: string;
  path: string;
  query?: QueryParams | string;
}): ForwarderResult<URL> => {
  let url: URL;
  try {
    url = new URL(baseUrl);
  } catch {
    return err('request_url_invalid', `Invalid upstream base URL: ${baseUrl}`);
  }

  const basePath = url.pathname.replace(/\/+$/u, '');
  const subPath = path.startsWith('/') ? path : `/${path}`;
  url.pathname = `${basePath}${subPath}`;

  if (typeof query === 'string') {
    url.search = query.length > 0 ? `?${query.replace(/^\?/u, '')}` : '';
  } else if (query) {
    const searchParams = new URLSearchParams();
    for (const [name, value] of Object.entries(query)) {
      for (const item of Array.isArray(value) ? value : [value]) {
        searchParams.append(name, item);
      }
    }
    url.search = searchParams.toString();
  }

  return ok(url);
};

const isStructuredMethod = (method: string): method is StructuredMethod =>
  STRUCTURED_METHODS.some(candidate => candidate === method);

const toError = (value: unknown) => (value instanceof Error ? value : new Error(String(value)));

const readResponseBodyWithLimit = async ({
  response,
  maxResponseBytes,
  readTimeoutMs,
  abort
}: {
  response: Response;
  maxResponseBytes: number;
  readTimeoutMs: number;
  abort: () => void;
}): Promise<ForwarderResult<Buffer>> => {
  const contentLengthHeader = response.headers.get('content-length');
  if (contentLengthHeader && /^\d+$/u.test(contentLengthHeader.trim())) {
    const contentLength = Number.parseInt(contentLengthHeader, 10);
    if (Number.isSafeInteger(contentLength) && contentLength > maxResponseBytes) {
      abort();
      return err('upstream_response_too_large', `Upstream response exceeds max_response_bytes=${maxResponseBytes}`);
    }
  }

  if (!response.body) {
    return ok(Buffer.alloc(0));
  }

  const reader: ReadableStreamDefaultReader<Uint8Array> = (response.body as NodeReadableStream<Uint8Array>).getReader();
  const chunks: Buffer[] = [];
  let totalBytes = 0;
  let idleTimedOut = false;
  let idleTimer: NodeJS.Timeout | undefined;
  const armIdleTimer = () => {
    clearTimeout(idleTimer);
    idleTimer = setTimeout(() => {
      idleTimedOut = true;
      abort();
    }, readTimeoutMs);
  };

  try {
    armIdleTimer();
    while (true) {
      const readResult = await reader.read();
      if (readResult.done) {
        break;
      }

      armIdleTimer();
      const chunk = readResult.value;
      if (chunk.byteLength === 0) {
        continue;
      }

      totalBytes += chunk.byteLength;
      if (totalBytes > maxResponseBytes) {
        await reader.cancel();
        return err('upstream_response_too_large', `Upstream response exceeds max_response_bytes=${maxResponseBytes}`);
      }

      chunks.push(Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength));
    }

    return ok(Buffer.concat(chunks, totalBytes));
  } catch {
    if (idleTimedOut) {
      return err('upstream_timeout', `Upstream response body stalled for ${readTimeoutMs}ms`);
    }

    return err('upstream_network_error', 'Failed while reading upstream response body');
  } finally {
    clearTimeout(idleTimer);
  }
};

/**
 * Sends one request and buffers the reply. Any status is a successful result;
 * only transport failures, timeouts and oversized replies are errors.
 */
export const executeUpstreamRequest = async ({
  url,
  method,
  headers,
  body,
  target,
  fetchImpl
}: {
  url: URL;
  method: string;
  headers: HeaderMap;
  body: Buffer | undefined;
  target: UpstreamTarget;
  fetchImpl?: FetchLike;
}): Promise<ForwarderResult<UpstreamResponse>> => {
  const timeouts = resolveTimeouts(target);
  const limits = resolveLimits(target);
  const requestFetch = fetchImpl ?? globalThis.fetch;

  const controller = new AbortController();
  let connectTimedOut = false;
  const connectTimer = setTimeout(() => {
    connectTimedOut = true;
    controller.abort();
  }, timeouts.connect_timeout_ms);

  let upstreamResponse: Response;
  try {
    upstreamResponse = await requestFetch(url, {
      method,
      headers,
      ...(body && !METHODS_WITHOUT_BODY.has(method) ? {body} : {}),
      redirect: 'manual',
      signal: controller.signal
    });
  } catch (unknownError) {
    if (connectTimedOut) {
      return err('upstream_timeout', `Upstream did not respond within ${timeouts.connect_timeout_ms}ms`);
    }

    return err('upstream_network_error', toError(unknownError).message);
  } finally {
    clearTimeout(connectTimer);
  }

  const bufferedBody = await readResponseBodyWithLimit({
    response: upstreamResponse,
    maxResponseBytes: limits.max_response_bytes,
    readTimeoutMs: timeouts.read_timeout_ms,
    abort: () => controller.abort()
  });
  if (!bufferedBody.ok) {
    return bufferedBody;
  }

  return ok({
    status: upstreamResponse.status,
    headers: filterResponseHeaders(toHeaderMap(upstreamResponse.headers)),
    set_cookie: readSetCookies(upstreamResponse.headers),
    body: bufferedBody.value
  });
};

export type StructuredForwardInput = {
  target: UpstreamTarget;
  method: string;
  path: string;
  query: QueryParams;
  body: Body;
  /** content-type sent with a raw body */
  contentType?: string;
  injectedHeaders?: HeaderMap;
  fetchImpl?: FetchLike;
  logger?: StructuredLogger;
};

/**
 * Structured mode: query as a parameter map, JSON bodies re-serialized, raw
 * bodies sent unmodified. Verbs other than GET/POST/PUT/DELETE are refused
 * without contacting the upstream. A GET is always sent without a body; one
 * supplied by the caller is discarded with a warning.
 */
export const forwardStructured = async (input: StructuredForwardInput): Promise<ForwarderResult<UpstreamResponse>> => {
  const method = input.method.toUpperCase();
  if (!isStructuredMethod(method)) {
    return err('method_not_allowed', `Method ${method} not allowed`);
  }

  const url = buildUpstreamUrl({baseUrl: input.target.base_url, path: input.path, query: input.query});
  if (!url.ok) {
    return url;
  }

  if (method === 'GET' && input.body.kind !== 'empty') {
    input.logger?.warn({
      event: 'forwarder.body.dropped',
      component: 'forwarder.structured',
      message: 'Request body discarded on a structured GET',
      reason_code: 'body_not_forwarded',
      metadata: {path: input.path, payload_kind: input.body.kind}
    });
  }

  const serialized = method === 'GET' ? {bytes: undefined, contentType: undefined} : serializeBody(input.body);
  const contentType = serialized.contentType ?? (serialized.bytes ? input.contentType : undefined);
  const injected = stripHopByHopHeaders(input.injectedHeaders ?? {});
  if (!injected.ok) {
    return injected;
  }

  return executeUpstreamRequest({
    url: url.value,
    method,
    headers: {
      accept: 'application/json',
      ...(contentType ? {'content-type': contentType} : {}),
      ...injected.value
    },
    body: serialized.bytes,
    target: input.target,
    ...(input.fetchImpl ? {fetchImpl: input.fetchImpl} : {})
  });
};

export type StraightforwardInput = {
  target: UpstreamTarget;
  method: string;
  path: string;
  rawQuery: string;
  headers: InboundHeaders;
  body: Buffer;
  injectedHeaders?: HeaderMap;
  fetchImpl?: FetchLike;
};

/** Builds the URL and headers shared by passthrough forwarding and the streaming relay. */
export const preparePassthrough = ({
  target,
  path,
  rawQuery,
  headers,
  injectedHeaders
}: Pick<StraightforwardInput, 'target' | 'path' | 'rawQuery' | 'headers' | 'injectedHeaders'>): ForwarderResult<{
  url: URL;
  headers: HeaderMap;
}> => {
  const url = buildUpstreamUrl({baseUrl: target.base_url, path, query: rawQuery});
  if (!url.ok) {
    return url;
  }

  const passthroughHeaders = buildPassthroughHeaders(headers);
  if (!passthroughHeaders.ok) {
    return passthroughHeaders;
  }

  const injected = stripHopByHopHeaders(injectedHeaders ?? {});
  if (!injected.ok) {
    return injected;
  }

  return ok({url: url.value, headers: {...passthroughHeaders.value, ...injected.value}});
};

/** Passthrough mode: method, filtered headers, raw query and body bytes go out unchanged. */
export const forwardStraightforward = async (input: StraightforwardInput): Promise<ForwarderResult<UpstreamResponse>> => {
  const prepared = preparePassthrough(input);
  if (!prepared.ok) {
    return prepared;
  }

  const method = input.method.toUpperCase();
  return executeUpstreamRequest({
    url: prepared.value.url,
    method,
    headers: prepared.value.headers,
    body: input.body.byteLength > 0 ? input.body : undefined,
    target: input.target,
    ...(input.fetchImpl ? {fetchImpl: input.fetchImpl} : {})
  });
};
