import http from 'node:http';
import https from 'node:https';

import {readSetCookies, toHeaderMap} from './headers';
import type {StreamOpenResult, StreamTransport} from './streamTransport';

/**
 * Fallback transport on node:http. Every request gets its own agent with
 * keep-alive disabled, so nothing is shared with the pooled fetch client.
 */
export const createNodeHttpStreamTransport = (): StreamTransport => ({
  name: 'node-http',
  open: (request, signal) =>
    new Promise<StreamOpenResult>((resolve, reject) => {
      const isHttps = request.url.protocol === 'https:';
      const agent = isHttps ? new https.Agent({keepAlive: false}) : new http.Agent({keepAlive: false});
      const options: http.RequestOptions = {method: request.method, headers: request.headers, agent, signal};

      const onResponse = (response: http.IncomingMessage) => {
        const iterator: AsyncIterator<unknown> = response[Symbol.asyncIterator]();
        let closed = false;

        resolve({
          status: response.statusCode ?? 502,
          headers: toHeaderMap(response.headers),
          set_cookie: readSetCookies(response.headers),
          session: {
            read: async () => {
              if (closed) {
                return {done: true};
              }

              const next = await iterator.next();
              if (next.done) {
                return {done: true};
              }

              const value: unknown = next.value;
              if (typeof value === 'string') {
                return {done: false, chunk: Buffer.from(value, 'utf8')};
              }

              return {done: false, chunk: value instanceof Uint8Array ? value : new Uint8Array(0)};
            },
            close: () => {
              if (closed) {
                return;
              }

              closed = true;
              response.destroy();
              clientRequest.destroy();
              agent.destroy();
            }
          }
        });
      };

      const clientRequest = isHttps
        ? https.request(request.url, options, onResponse)
        : http.request(request.url, options, onResponse);

      clientRequest.on('error', error => {
        agent.destroy();
        reject(error);
      });

      if (request.body && request.body.byteLength > 0) {
        clientRequest.end(request.body);
      } else {
        clientRequest.end();
      }
    })
});
