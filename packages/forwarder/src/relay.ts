import {setTimeout as delay} from 'node:timers/promises';

import {createNoopLogger, type StructuredLogger} from '@relaygate/logging';

import {StreamRelayOptionsSchema, type HeaderMap, type StreamRelayOptions, type StreamRelayOptionsInput} from './contracts';
import type {ForwarderError, ForwarderErrorCode} from './errors';
import {filterResponseHeaders} from './headers';
import type {StreamOpenResult, StreamRead, StreamRequest, StreamSession, StreamTransport} from './streamTransport';

export type StreamSink = {
  /** Called once, before the first chunk, or when the stream ends without delivering any. */
  start: (upstream: {status: number; headers: HeaderMap}) => void;
  /** Resolves once the chunk has been handed to the caller's connection. */
  write: (chunk: Uint8Array) => Promise<void>;
  flush: () => Promise<void>;
};

export type RelayEndReason = 'upstream_closed' | 'empty_reads' | 'sentinel' | 'cancelled';

export type RelayOutcome =
  | {kind: 'completed'; transport: string; end_reason: RelayEndReason; chunks: number; bytes: number}
  | {kind: 'upstream_status'; transport: string; status: number; headers: HeaderMap; set_cookie: string[]; body: Buffer}
  | {kind: 'failed'; transport: string; error: ForwarderError; chunks: number; bytes: number};

export type RelayStreamInput = {
  request: StreamRequest;
  primary: StreamTransport;
  fallback: StreamTransport;
  sink: StreamSink;
  signal?: AbortSignal;
  options?: StreamRelayOptionsInput;
  logger?: StructuredLogger;
};

class StreamInactivityError extends Error {
  public constructor(timeoutMs: number) {
    super(`No data from upstream for ${timeoutMs}ms`);
    this.name = 'StreamInactivityError';
  }
}

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

/**
 * Resolves with the next read, or null once the caller cancels. Rejects when
 * the transport fails or stays silent past the inactivity timeout.
 */
const nextRead = ({
  session,
  timeoutMs,
  signal
}: {
  session: StreamSession;
  timeoutMs: number;
  signal: AbortSignal;
}) =>
  new Promise<StreamRead | null>((resolve, reject) => {
    const cleanup = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
    };
    const onAbort = () => {
      cleanup();
      resolve(null);
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new StreamInactivityError(timeoutMs));
    }, timeoutMs);

    signal.addEventListener('abort', onAbort, {once: true});
    session.read().then(
      value => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error instanceof Error ? error : new Error(describeError(error)));
      }
    );
  });

type AttemptContext = {
  transport: StreamTransport;
  request: StreamRequest;
  sink: StreamSink;
  signal: AbortSignal;
  options: StreamRelayOptions;
  logger: StructuredLogger;
};

const readErrorBody = async ({session, options, signal}: Pick<AttemptContext, 'options' | 'signal'> & {session: StreamSession}) => {
  const chunks: Buffer[] = [];
  let size = 0;

  while (size < options.max_error_body_bytes) {
    const read = await nextRead({session, timeoutMs: options.inactivity_timeout_ms, signal});
    if (read === null || read.done) {
      break;
    }

    const chunk = Buffer.from(read.chunk);
    chunks.push(chunk.subarray(0, options.max_error_body_bytes - size));
    size += chunk.byteLength;
  }

  return Buffer.concat(chunks);
};

const pump = async ({
  context,
  opened
}: {
  context: AttemptContext;
  opened: StreamOpenResult;
}): Promise<RelayOutcome> => {
  const {transport, sink, signal, options, logger} = context;
  const sentinel = options.end_sentinel ? Buffer.from(options.end_sentinel, 'utf8') : null;
  let tail = Buffer.alloc(0);
  let chunks = 0;
  let bytes = 0;
  let emptyReads = 0;
  let started = false;

  const ensureStarted = () => {
    if (!started) {
      started = true;
      sink.start({status: opened.status, headers: filterResponseHeaders(opened.headers)});
    }
  };
  const completed = (endReason: RelayEndReason): RelayOutcome => {
    if (endReason !== 'cancelled') {
      ensureStarted();
    }

    return {kind: 'completed', transport: transport.name, end_reason: endReason, chunks, bytes};
  };
  const failed = (code: ForwarderErrorCode, message: string): RelayOutcome => ({
    kind: 'failed',
    transport: transport.name,
    error: {code, message},
    chunks,
    bytes
  });

  while (true) {
    if (signal.aborted) {
      return completed('cancelled');
    }

    let read: StreamRead | null;
    try {
      read = await nextRead({session: opened.session, timeoutMs: options.inactivity_timeout_ms, signal});
    } catch (error) {
      if (signal.aborted) {
        return completed('cancelled');
      }

      return error instanceof StreamInactivityError
        ? failed('upstream_timeout', error.message)
        : failed('upstream_network_error', describeError(error));
    }

    if (read === null) {
      return completed('cancelled');
    }

    if (read.done) {
      return completed('upstream_closed');
    }

    // the upstream may keep the connection open after its last event
    if (read.chunk.byteLength === 0) {
      emptyReads += 1;
      if (emptyReads >= options.empty_read_limit) {
        return completed('empty_reads');
      }
      continue;
    }
    emptyReads = 0;

    ensureStarted();
    try {
      await sink.write(read.chunk);
      await sink.flush();
    } catch (error) {
      logger.warn({
        event: 'stream.sink.failed',
        component: 'forwarder.stream',
        message: 'Caller connection rejected a chunk',
        reason_code: 'caller_disconnected',
        metadata: {transport: transport.name, chunks, error}
      });
      return completed('cancelled');
    }
    chunks += 1;
    bytes += read.chunk.byteLength;

    // yield so intermediaries cannot coalesce consecutive chunks
    await delay(options.flush_interval_ms);

    if (sentinel) {
      const window = Buffer.concat([tail, read.chunk]);
      if (window.includes(sentinel)) {
        return completed('sentinel');
      }
      tail = window.subarray(Math.max(0, window.byteLength - (sentinel.byteLength - 1)));
    }
  }
};

const attemptRelay = async (context: AttemptContext): Promise<RelayOutcome> => {
  const {transport, request, signal, options} = context;
  if (signal.aborted) {
    return {kind: 'completed', transport: transport.name, end_reason: 'cancelled', chunks: 0, bytes: 0};
  }

  const attemptController = new AbortController();
  const abortAttempt = () => attemptController.abort();
  signal.addEventListener('abort', abortAttempt, {once: true});
  let connectTimedOut = false;
  const connectTimer = setTimeout(() => {
    connectTimedOut = true;
    attemptController.abort();
  }, options.connect_timeout_ms);

  let opened: StreamOpenResult;
  try {
    opened = await transport.open(request, attemptController.signal);
  } catch (error) {
    signal.removeEventListener('abort', abortAttempt);
    if (signal.aborted) {
      return {kind: 'completed', transport: transport.name, end_reason: 'cancelled', chunks: 0, bytes: 0};
    }

    return {
      kind: 'failed',
      transport: transport.name,
      error: connectTimedOut
        ? {code: 'upstream_timeout', message: `Upstream stream did not open within ${options.connect_timeout_ms}ms`}
        : {code: 'upstream_network_error', message: describeError(error)},
      chunks: 0,
      bytes: 0
    };
  } finally {
    clearTimeout(connectTimer);
  }

  try {
    if (opened.status < 200 || opened.status > 299) {
      let body: Buffer;
      try {
        body = await readErrorBody({session: opened.session, options, signal});
      } catch (error) {
        // the status line is what the caller needs; a truncated body is still relayed
        context.logger.debug({
          event: 'stream.error_body.truncated',
          component: 'forwarder.stream',
          metadata: {transport: transport.name, error}
        });
        body = Buffer.alloc(0);
      }

      return {
        kind: 'upstream_status',
        transport: transport.name,
        status: opened.status,
        headers: filterResponseHeaders(opened.headers),
        set_cookie: opened.set_cookie ?? [],
        body
      };
    }

    return await pump({context, opened});
  } finally {
    opened.session.close();
    signal.removeEventListener('abort', abortAttempt);
  }
};

/**
 * Relays an upstream event stream chunk by chunk.
 *
 * Every non-empty chunk is written, flushed and followed by a short yield.
 * The relay ends when the upstream closes, after `empty_read_limit`
 * consecutive empty reads, or on the chunk carrying `end_sentinel`. If the
 * primary transport fails before any chunk was delivered, the request is
 * issued once more over the fallback transport; a second failure is final.
 * The upstream connection is closed on every exit path.
 */
export const relayStream = async (input: RelayStreamInput): Promise<RelayOutcome> => {
  const options = StreamRelayOptionsSchema.parse(input.options ?? {});
  const logger = input.logger ?? createNoopLogger();
  const signal = input.signal ?? new AbortController().signal;
  const request: StreamRequest = {
    ...input.request,
    // Chunks reach the sink as sent, so the upstream must not compress them.
    headers: {...input.request.headers, accept: 'text/event-stream', 'accept-encoding': 'identity'}
  };

  const attempt = (transport: StreamTransport) =>
    attemptRelay({transport, request, sink: input.sink, signal, options, logger});

  const primaryOutcome = await attempt(input.primary);
  if (primaryOutcome.kind !== 'failed' || primaryOutcome.chunks > 0) {
    return primaryOutcome;
  }

  logger.warn({
    event: 'stream.fallback',
    component: 'forwarder.stream',
    message: `Primary stream transport failed, retrying over ${input.fallback.name}`,
    reason_code: primaryOutcome.error.code,
    metadata: {
      primary_transport: input.primary.name,
      fallback_transport: input.fallback.name,
      error_message: primaryOutcome.error.message
    }
  });

  const fallbackOutcome = await attempt(input.fallback);
  if (fallbackOutcome.kind !== 'failed' || fallbackOutcome.chunks > 0) {
    return fallbackOutcome;
  }

  return {
    ...fallbackOutcome,
    error: {
      code: 'upstream_stream_failed',
      message: `Stream failed over ${input.primary.name} (${primaryOutcome.error.message}) and ${input.fallback.name} (${fallbackOutcome.error.message})`
    }
  };
};
