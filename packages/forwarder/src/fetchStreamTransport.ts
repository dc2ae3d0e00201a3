import type {ReadableStream as NodeReadableStream} from 'node:stream/web';

import type {FetchLike} from './contracts';
import {readSetCookies, toHeaderMap} from './headers';
import type {StreamSession, StreamTransport} from './streamTransport';

const METHODS_WITHOUT_BODY = new Set(['GET', 'HEAD']);

/** Primary transport: the pooled fetch client. */
export const createFetchStreamTransport = ({fetchImpl}: {fetchImpl?: FetchLike} = {}): StreamTransport => ({
  name: 'fetch',
  open: async (request, signal) => {
    const requestFetch = fetchImpl ?? globalThis.fetch;
    const controller = new AbortController();
    const abortFromCaller = () => controller.abort();
    if (signal.aborted) {
      controller.abort();
    } else {
      signal.addEventListener('abort', abortFromCaller, {once: true});
    }

    let response: Response;
    try {
      response = await requestFetch(request.url, {
        method: request.method,
        headers: request.headers,
        ...(request.body && !METHODS_WITHOUT_BODY.has(request.method) ? {body: request.body} : {}),
        redirect: 'manual',
        signal: controller.signal
      });
    } catch (error) {
      signal.removeEventListener('abort', abortFromCaller);
      throw error;
    }

    const reader = response.body ? (response.body as NodeReadableStream<Uint8Array>).getReader() : null;
    let closed = false;

    const session: StreamSession = {
      read: async () => {
        if (!reader || closed) {
          return {done: true};
        }

        const result = await reader.read();
        return result.done ? {done: true} : {done: false, chunk: result.value};
      },
      close: () => {
        if (closed) {
          return;
        }

        closed = true;
        signal.removeEventListener('abort', abortFromCaller);
        // aborting the request also errors the body stream and any pending read
        controller.abort();
      }
    };

    return {
      status: response.status,
      headers: toHeaderMap(response.headers),
      set_cookie: readSetCookies(response.headers),
      session
    };
  }
});
