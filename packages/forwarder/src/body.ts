import type {Body} from './contracts';

const utf8Decoder = new TextDecoder('utf-8', {fatal: true});

const decodeUtf8 = (bytes: Uint8Array): string | null => {
  try {
    return utf8Decoder.decode(bytes);
  } catch {
    return null;
  }
};

const parseJsonText = (text: string): {ok: true; value: unknown} | {ok: false} => {
  try {
    return {ok: true, value: JSON.parse(text)};
  } catch {
    return {ok: false};
  }
};

/**
 * Best-effort classification of a payload. Bytes that are not valid UTF-8 JSON
 * are kept verbatim as `raw`; this is never an error.
 */
export const parseBody = (bytes: Uint8Array): Body => {
  if (bytes.byteLength === 0) {
    return {kind: 'empty'};
  }

  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const text = decodeUtf8(buffer);
  if (text === null) {
    return {kind: 'raw', bytes: buffer};
  }

  const parsed = parseJsonText(text);
  return parsed.ok ? {kind: 'json', value: parsed.value} : {kind: 'raw', bytes: buffer};
};

export const serializeBody = (body: Body): {bytes: Buffer | undefined; contentType: string | undefined} => {
  switch (body.kind) {
    case 'empty':
      return {bytes: undefined, contentType: undefined};
    case 'json':
      return {bytes: Buffer.from(JSON.stringify(body.value), 'utf8'), contentType: 'application/json'};
    case 'raw':
      return {bytes: body.bytes, contentType: undefined};
  }
};
