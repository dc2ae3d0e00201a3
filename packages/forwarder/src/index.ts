export {parseBody, serializeBody} from './body';
export {
  DEFAULT_FORWARDER_LIMITS,
  DEFAULT_FORWARDER_TIMEOUTS,
  DEFAULT_STREAM_RELAY_OPTIONS,
  ForwarderLimitsSchema,
  ForwarderTimeoutsSchema,
  STRUCTURED_METHODS,
  StreamRelayOptionsSchema,
  type Body,
  type FetchLike,
  type ForwarderLimits,
  type ForwarderTimeouts,
  type HeaderMap,
  type InboundHeaders,
  type QueryParams,
  type StreamRelayOptions,
  type StreamRelayOptionsInput,
  type StructuredMethod,
  type UpstreamResponse,
  type UpstreamTarget
} from './contracts';
export {
  err,
  forwarderErrorCodes,
  ok,
  type ForwarderError,
  type ForwarderErrorCode,
  type ForwarderFailure,
  type ForwarderResult,
  type ForwarderSuccess
} from './errors';
export {createFetchStreamTransport} from './fetchStreamTransport';
export {
  buildUpstreamUrl,
  executeUpstreamRequest,
  forwardStraightforward,
  forwardStructured,
  preparePassthrough,
  resolveLimits,
  resolveTimeouts,
  type StraightforwardInput,
  type StructuredForwardInput
} from './forward';
export {
  buildPassthroughHeaders,
  filterResponseHeaders,
  HOP_BY_HOP_HEADER_NAMES,
  normalizeHeaderName,
  PASSTHROUGH_REMOVED_HEADER_NAMES,
  readSetCookies,
  stripHopByHopHeaders,
  toHeaderMap,
  validateHeaderValue
} from './headers';
export {createNodeHttpStreamTransport} from './nodeHttpStreamTransport';
export {relayStream, type RelayEndReason, type RelayOutcome, type RelayStreamInput, type StreamSink} from './relay';
export type {StreamOpenResult, StreamRead, StreamRequest, StreamSession, StreamTransport} from './streamTransport';
