import {z} from 'zod';

export const ForwarderTimeoutsSchema = z
  .object({
    connect_timeout_ms: z.number().int().min(100).max(120_000).default(10_000),
    read_timeout_ms: z.number().int().min(100).max(600_000).default(60_000)
  })
  .strict();

export const ForwarderLimitsSchema = z
  .object({
    max_response_bytes: z.number().int().min(1).max(64 * 1024 * 1024).default(10 * 1024 * 1024)
  })
  .strict();

export const StreamRelayOptionsSchema = z
  .object({
    connect_timeout_ms: z.number().int().min(100).max(120_000).default(10_000),
    inactivity_timeout_ms: z.number().int().min(10).max(3_600_000).default(300_000),
    empty_read_limit: z.number().int().min(1).max(1_000).default(5),
    flush_interval_ms: z.number().int().min(0).max(1_000).default(1),
    end_sentinel: z.string().min(1).optional(),
    max_error_body_bytes: z.number().int().min(1).max(10 * 1024 * 1024).default(1024 * 1024)
  })
  .strict();

export type ForwarderTimeouts = z.infer<typeof ForwarderTimeoutsSchema>;
export type ForwarderLimits = z.infer<typeof ForwarderLimitsSchema>;
export type StreamRelayOptions = z.infer<typeof StreamRelayOptionsSchema>;
export type StreamRelayOptionsInput = z.input<typeof StreamRelayOptionsSchema>;

export const DEFAULT_FORWARDER_TIMEOUTS = ForwarderTimeoutsSchema.parse({});
export const DEFAULT_FORWARDER_LIMITS = ForwarderLimitsSchema.parse({});
export const DEFAULT_STREAM_RELAY_OPTIONS = StreamRelayOptionsSchema.parse({});

export type FetchLike = (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>;

/** Lower-cased header names mapped to their (comma-joined) values. */
export type HeaderMap = Record<string, string>;

/** Header shape produced by node:http for inbound requests. */
export type InboundHeaders = Record<string, string | string[] | undefined>;

export type QueryParams = Record<string, string | string[]>;

export type UpstreamTarget = {
  base_url: string;
  timeouts?: Partial<ForwarderTimeouts>;
  limits?: Partial<ForwarderLimits>;
};

export type UpstreamResponse = {
  status: number;
  headers: HeaderMap;
  /** One entry per Set-Cookie line, in arrival order. */
  set_cookie: string[];
  body: Buffer;
};

/** Best-effort view of a request or response payload. */
export type Body =
  | {kind: 'empty'}
  | {kind: 'json'; value: unknown}
  | {kind: 'raw'; bytes: Buffer};

export const STRUCTURED_METHODS = ['GET', 'POST', 'PUT', 'DELETE'] as const;
export type StructuredMethod = (typeof STRUCTURED_METHODS)[number];
