import type {HeaderMap, InboundHeaders} from './contracts';
import {err, ok, type ForwarderResult} from './errors';

const HTTP_HEADER_NAME_REGEX = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
const CONNECTION_TOKEN_SPLIT_REGEX = /\s*,\s*/u;
const SET_COOKIE_HEADER_NAME = 'set-cookie';

export const HOP_BY_HOP_HEADER_NAMES = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade'
]);

/** Never copied from the caller to the upstream in passthrough mode. */
export const PASSTHROUGH_REMOVED_HEADER_NAMES = new Set(['host', 'content-length', 'authorization']);

// fetch decodes compressed bodies and the HTTP layer recomputes the length
const RESPONSE_REMOVED_HEADER_NAMES = new Set(['content-length', 'content-encoding']);

export const normalizeHeaderName = (name: string): ForwarderResult<string> => {
  const normalizedName = name.trim().toLowerCase();
  if (!HTTP_HEADER_NAME_REGEX.test(normalizedName)) {
    return err('invalid_header_name', `Invalid header name: ${name}`);
  }

  return ok(normalizedName);
};

export const validateHeaderValue = (value: string): ForwarderResult<string> => {
  if (/[\r\n]/u.test(value)) {
    return err('invalid_header_value', 'Header values must not contain CR or LF');
  }

  return ok(value.trim());
};

const parseConnectionHeaderTokens = (connectionHeaderValue: string): ForwarderResult<Set<string>> => {
  const tokenSet = new Set<string>();

  for (const rawToken of connectionHeaderValue.split(CONNECTION_TOKEN_SPLIT_REGEX)) {
    const token = rawToken.trim().toLowerCase();
    if (token.length === 0) {
      continue;
    }

    if (!HTTP_HEADER_NAME_REGEX.test(token)) {
      return err('invalid_connection_header', `Connection header contains an invalid token: ${rawToken}`);
    }

    tokenSet.add(token);
  }

  return ok(tokenSet);
};

/** Set-Cookie is left out: its lines cannot be comma-joined. See {@link readSetCookies}. */
export const toHeaderMap = (headers: InboundHeaders | Headers): HeaderMap => {
  const headerMap: HeaderMap = {};
  const entries: Iterable<[string, string | string[] | undefined]> =
    headers instanceof Headers ? headers.entries() : Object.entries(headers);

  for (const [name, value] of entries) {
    if (value === undefined) {
      continue;
    }

    const lowered = name.toLowerCase();
    if (lowered === SET_COOKIE_HEADER_NAME) {
      continue;
    }

    const joined = Array.isArray(value) ? value.join(', ') : value;
    const existing = headerMap[lowered];
    headerMap[lowered] = existing === undefined ? joined : `${existing}, ${joined}`;
  }

  return headerMap;
};

export const readSetCookies = (headers: InboundHeaders | Headers): string[] => {
  if (headers instanceof Headers) {
    return headers.getSetCookie();
  }

  const value = headers[SET_COOKIE_HEADER_NAME];
  if (value === undefined) {
    return [];
  }

  return Array.isArray(value) ? [...value] : [value];
};

/**
 * Drops hop-by-hop headers, any header the Connection header nominates and the
 * extra names given. Fails on names or values that cannot be sent on the wire.
 */
export const stripHopByHopHeaders = (
  headers: HeaderMap,
  extraRemoved: Iterable<string> = []
): ForwarderResult<HeaderMap> => {
  const normalizedHeaders: HeaderMap = {};
  const headersToStrip = new Set<string>([...HOP_BY_HOP_HEADER_NAMES, ...extraRemoved]);

  for (const [name, value] of Object.entries(headers)) {
    const normalizedName = normalizeHeaderName(name);
    if (!normalizedName.ok) {
      return normalizedName;
    }

    const normalizedValue = validateHeaderValue(value);
    if (!normalizedValue.ok) {
      return normalizedValue;
    }

    if (normalizedName.value === 'connection') {
      const parsedConnectionTokens = parseConnectionHeaderTokens(normalizedValue.value);
      if (!parsedConnectionTokens.ok) {
        return parsedConnectionTokens;
      }

      for (const token of parsedConnectionTokens.value) {
        headersToStrip.add(token);
      }
    }

    normalizedHeaders[normalizedName.value] = normalizedValue.value;
  }

  return ok(
    Object.fromEntries(Object.entries(normalizedHeaders).filter(([name]) => !headersToStrip.has(name)))
  );
};

export const buildPassthroughHeaders = (inbound: InboundHeaders): ForwarderResult<HeaderMap> => {
  const flattened = toHeaderMap(inbound);
  const stripped = stripHopByHopHeaders(flattened, PASSTHROUGH_REMOVED_HEADER_NAMES);
  if (!stripped.ok) {
    return stripped;
  }

  // multipart boundaries live in content-type, so it must survive even if nominated by Connection
  const contentType = flattened['content-type'];
  return ok(contentType === undefined ? stripped.value : {...stripped.value, 'content-type': contentType});
};

/** Response headers safe to relay to the caller. Malformed entries are skipped. */
export const filterResponseHeaders = (headers: HeaderMap): HeaderMap => {
  const stripped = stripHopByHopHeaders(
    Object.fromEntries(
      Object.entries(headers).filter(
        ([name, value]) => normalizeHeaderName(name).ok && validateHeaderValue(value).ok
      )
    ),
    RESPONSE_REMOVED_HEADER_NAMES
  );

  if (stripped.ok) {
    return stripped.value;
  }

  return Object.fromEntries(
    Object.entries(headers).filter(
      ([name]) => !HOP_BY_HOP_HEADER_NAMES.has(name) && !RESPONSE_REMOVED_HEADER_NAMES.has(name)
    )
  );
};
