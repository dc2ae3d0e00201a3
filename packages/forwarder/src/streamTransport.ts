import type {HeaderMap} from './contracts';

export type StreamRequest = {
  url: URL;
  method: string;
  headers: HeaderMap;
  body?: Buffer;
};

/** A zero-length chunk is an empty read, distinct from the end of the stream. */
export type StreamRead = {done: true} | {done: false; chunk: Uint8Array};

export type StreamSession = {
  read: () => Promise<StreamRead>;
  /** Idempotent. Releases the upstream connection. */
  close: () => void;
};

export type StreamOpenResult = {
  status: number;
  headers: HeaderMap;
  set_cookie?: string[];
  session: StreamSession;
};

/**
 * One way of opening an upstream stream. Implementations must reject when the
 * connection cannot be established and honour `signal` at any point.
 */
export type StreamTransport = {
  name: string;
  open: (request: StreamRequest, signal: AbortSignal) => Promise<StreamOpenResult>;
};
