import type {ServerResponse} from 'node:http'

import type {ReplySummary} from '@relaygate/credentials'
import {
  forwardStraightforward,
  forwardStructured,
  parseBody,
  preparePassthrough,
  relayStream,
  serializeBody,
  STRUCTURED_METHODS,
  type Body,
  type ForwarderError,
  type HeaderMap,
  type QueryParams,
  type RelayOutcome,
  type StreamSink,
  type UpstreamResponse
} from '@relaygate/forwarder'
import {setLogContextFields} from '@relaygate/logging'
import {buildDataScope, checkAccess, describeDataScope, type Rule} from '@relaygate/policy-engine'

import {
  AppError,
  badGateway,
  badRequest,
  forbidden,
  gatewayTimeout,
  methodNotAllowed,
  notFound,
  unauthorized
} from '../../errors'
import type {GatewayMount} from '../../gateway'
import type {HookContext} from '../../hooks'
import {readBodyBuffer, sendUpstreamReply, STREAM_RESPONSE_HEADERS} from '../../http'
import type {GatewayRouteLogicHandler, RouteHandlerContext} from './types'

const COMPONENT = 'gateway.pipeline'

export const toQueryParams = (searchParams: URLSearchParams): QueryParams => {
  const query: QueryParams = {}
  for (const name of new Set(searchParams.keys())) {
    const values = searchParams.getAll(name)
    const [first, ...rest] = values
    query[name] = first !== undefined && rest.length === 0 ? first : values
  }

  return query
}

export const toAppError = (error: ForwarderError): AppError => {
  switch (error.code) {
    case 'method_not_allowed':
      return methodNotAllowed('method_not_allowed', error.message)
    case 'invalid_input':
    case 'invalid_header_name':
    case 'invalid_header_value':
    case 'invalid_connection_header':
      return badRequest(error.code, error.message)
    case 'upstream_timeout':
      return gatewayTimeout('upstream_timeout', error.message)
    case 'upstream_stream_failed':
      return badGateway('upstream_stream_failed', error.message)
    case 'upstream_response_too_large':
      return badGateway('upstream_response_too_large', error.message)
    case 'request_url_invalid':
    case 'upstream_network_error':
      return badGateway('upstream_unreachable', error.message)
  }
}

const isSuccessStatus = (status: number) => status >= 200 && status <= 299

const isStructuredMethod = (method: string) => STRUCTURED_METHODS.some(candidate => candidate === method)

const headerValue = (value: string | string[] | undefined) => (Array.isArray(value) ? value.join(', ') : value)

/** Writes relayed chunks straight to the caller's connection. */
const createResponseSink = ({
  response,
  correlationId
}: {
  response: ServerResponse
  correlationId: string
}): StreamSink => ({
  start: ({status}) => {
    response.writeHead(status, {...STREAM_RESPONSE_HEADERS, 'x-correlation-id': correlationId})
    response.flushHeaders()
  },
  write: chunk =>
    new Promise<void>((resolve, reject) => {
      response.write(chunk, error => {
        if (error) {
          reject(error)
          return
        }
        resolve()
      })
    }),
  flush: () =>
    response.writableNeedDrain
      ? new Promise<void>(resolve => {
          const done = () => {
            response.off('drain', done)
            response.off('close', done)
            resolve()
          }
          response.once('drain', done)
          response.once('close', done)
        })
      : Promise.resolve()
})

type Pipeline = {
  context: RouteHandlerContext
  mount: GatewayMount
  rule: Rule
  upstreamPath: string
  requestBody: Body
  outgoingBytes: Buffer
}

/** Runs `attempt` through the upstream's credential manager when it has one. */
const withCredentials = async <T>({
  pipeline,
  attempt,
  summarize
}: {
  pipeline: Pipeline
  attempt: (injectedHeaders: HeaderMap) => Promise<T>
  summarize: (result: T) => ReplySummary | null
}): Promise<T> => {
  const manager = pipeline.mount.credentials
  if (!manager) {
    return attempt({})
  }

  const result = await manager.execute(token => attempt({authorization: token}), summarize)
  if (!result.ok) {
    pipeline.context.runtime.logger.warn({
      event: 'credential.unavailable',
      component: COMPONENT,
      message: result.error.message,
      reason_code: result.error.code,
      metadata: {identity: manager.identity}
    })
    throw badGateway('upstream_credential_unavailable', `Upstream credential unavailable: ${result.error.message}`)
  }

  return result.value
}

const relay = async (pipeline: Pipeline) => {
  const {context, mount, upstreamPath, outgoingBytes} = pipeline
  const {request, response, correlationId, method, rawQuery, runtime} = context
  const controller = new AbortController()
  const onClose = () => {
    if (!response.writableFinished) {
      controller.abort()
    }
  }
  response.on('close', onClose)

  let outcome: RelayOutcome
  try {
    outcome = await withCredentials({
      pipeline,
      attempt: async injectedHeaders => {
        const prepared = preparePassthrough({
          target: mount.target,
          path: upstreamPath,
          rawQuery,
          headers: request.headers,
          injectedHeaders
        })
        if (!prepared.ok) {
          throw toAppError(prepared.error)
        }

        return relayStream({
          request: {
            url: prepared.value.url,
            method,
            headers: prepared.value.headers,
            ...(outgoingBytes.byteLength > 0 ? {body: outgoingBytes} : {})
          },
          primary: runtime.streamTransports.primary,
          fallback: runtime.streamTransports.fallback,
          sink: createResponseSink({response, correlationId}),
          signal: controller.signal,
          options: {
            ...(mount.upstream.stream ?? {}),
            ...(mount.upstream.stream_end_sentinel ? {end_sentinel: mount.upstream.stream_end_sentinel} : {})
          },
          logger: runtime.logger
        })
      },
      summarize: result => (result.kind === 'upstream_status' ? {status: result.status} : null)
    })
  } finally {
    response.off('close', onClose)
  }

  switch (outcome.kind) {
    case 'upstream_status':
      runtime.logger.info({
        event: 'upstream.forwarded',
        component: COMPONENT,
        status_code: outcome.status,
        metadata: {mode: 'streaming', transport: outcome.transport, bytes: outcome.body.byteLength}
      })
      sendUpstreamReply({
        response,
        status: outcome.status,
        headers: outcome.headers,
        setCookies: outcome.set_cookie,
        body: outcome.body,
        correlationId
      })
      return
    case 'completed':
      runtime.logger.info({
        event: 'stream.completed',
        component: COMPONENT,
        reason_code: outcome.end_reason,
        metadata: {transport: outcome.transport, chunks: outcome.chunks, bytes: outcome.bytes}
      })
      response.end()
      return
    case 'failed':
      if (!response.headersSent) {
        throw toAppError(outcome.error)
      }

      runtime.logger.warn({
        event: 'stream.failed',
        component: COMPONENT,
        message: outcome.error.message,
        reason_code: outcome.error.code,
        metadata: {transport: outcome.transport, chunks: outcome.chunks, bytes: outcome.bytes}
      })
      response.end()
  }
}

const forward = async (pipeline: Pipeline): Promise<UpstreamResponse> => {
  const {context, mount, rule, upstreamPath, requestBody, outgoingBytes} = pipeline
  const {request, method, rawQuery, searchParams, runtime} = context
  const fetchImpl = runtime.fetchImpl
  const contentType = headerValue(request.headers['content-type'])

  const result = await withCredentials({
    pipeline,
    attempt: injectedHeaders =>
      rule.straightforward
        ? forwardStraightforward({
            target: mount.target,
            method,
            path: upstreamPath,
            rawQuery,
            headers: request.headers,
            body: outgoingBytes,
            injectedHeaders,
            ...(fetchImpl ? {fetchImpl} : {})
          })
        : forwardStructured({
            target: mount.target,
            method,
            path: upstreamPath,
            query: toQueryParams(searchParams),
            body: requestBody,
            ...(contentType ? {contentType} : {}),
            injectedHeaders,
            logger: runtime.logger,
            ...(fetchImpl ? {fetchImpl} : {})
          }),
    summarize: reply => (reply.ok ? {status: reply.value.status, body: reply.value.body} : null)
  })
  if (!result.ok) {
    throw toAppError(result.error)
  }

  runtime.logger.info({
    event: 'upstream.forwarded',
    component: COMPONENT,
    status_code: result.value.status,
    metadata: {mode: rule.straightforward ? 'straightforward' : 'structured', bytes: result.value.body.byteLength}
  })

  return result.value
}

const respond = async ({
  pipeline,
  upstream,
  hookContext
}: {
  pipeline: Pipeline
  upstream: UpstreamResponse
  hookContext: (payload: Body) => HookContext
}) => {
  const {context, mount, rule} = pipeline
  const {response, correlationId, runtime} = context
  const postHooks = mount.hooks.get(rule.rule_id)?.post ?? []

  // error replies and untouched passthrough replies go out byte for byte
  if (!isSuccessStatus(upstream.status) || (rule.straightforward && postHooks.length === 0)) {
    sendUpstreamReply({
      response,
      status: upstream.status,
      headers: upstream.headers,
      setCookies: upstream.set_cookie,
      body: upstream.body,
      correlationId
    })
    return
  }

  let payload = parseBody(upstream.body)
  for (const hook of postHooks) {
    const result = await hook.run(hookContext(payload))
    if (!result.ok) {
      runtime.logger.warn({
        event: 'pipeline.post.failed',
        component: COMPONENT,
        message: result.error.message,
        reason_code: result.error.code,
        metadata: {hook: hook.name, upstream_status: upstream.status}
      })
      throw new AppError({code: result.error.code, message: result.error.message, status: result.error.status ?? 500})
    }
    payload = result.payload
  }

  if (payload.kind !== 'json') {
    sendUpstreamReply({
      response,
      status: upstream.status,
      headers: upstream.headers,
      setCookies: upstream.set_cookie,
      body: upstream.body,
      correlationId
    })
    return
  }

  sendUpstreamReply({
    response,
    status: upstream.status,
    headers: {...upstream.headers, 'content-type': 'application/json; charset=utf-8'},
    setCookies: upstream.set_cookie,
    body: Buffer.from(JSON.stringify(payload.value), 'utf8'),
    correlationId
  })
}

/**
 * Mount, identity, rule, access and data scope are settled before the body is
 * read. Pre-processors may rewrite or reject the request; post-processors run
 * over successful replies only.
 */
export const handleGatewayRoute: GatewayRouteLogicHandler = async context => {
  const {request, method, pathname, searchParams, runtime} = context
  const {logger} = runtime

  const resolved = runtime.gateway.mounts.resolve(pathname)
  if (!resolved) {
    throw notFound('route_not_found', `No mount serves ${pathname}`)
  }

  const {mount, sub_path: subPath} = resolved
  setLogContextFields({mount_id: mount.id})

  const identity = await runtime.identityResolver(request)
  if (!identity) {
    throw unauthorized('caller_unauthenticated', 'Caller could not be identified')
  }
  setLogContextFields({caller_id: identity.user_id})

  const matched = mount.registry.match({sub_path: subPath, method})
  if (!matched.matched) {
    logger.warn({
      event: 'rule.denied',
      component: COMPONENT,
      message: `No rule matches ${method} ${subPath}`,
      reason_code: 'rule_not_found'
    })
    throw forbidden('rule_not_found', `No rule allows ${method} ${subPath}`)
  }

  const {rule} = matched
  setLogContextFields({rule_id: rule.rule_id})

  const access = checkAccess(identity, rule)
  if (!access.allowed) {
    logger.warn({
      event: 'rule.denied',
      component: COMPONENT,
      message: access.message,
      reason_code: access.reason_code
    })
    throw forbidden(access.reason_code, access.message)
  }

  const dataScope = buildDataScope(identity, mount.scope.entity, mount.scope.column)
  logger.info({
    event: 'rule.matched',
    component: COMPONENT,
    message: `Rule ${rule.rule_id} matched`,
    metadata: {
      matched_length: matched.matched_length,
      straightforward: rule.straightforward,
      streaming: rule.streaming,
      data_scope: describeDataScope(dataScope)
    }
  })

  if (!rule.streaming && !rule.straightforward && !isStructuredMethod(method)) {
    throw methodNotAllowed('method_not_allowed', `Method ${method} not allowed`)
  }

  const bodyBytes = await readBodyBuffer({request, maxBodyBytes: runtime.config.maxBodyBytes})
  const query = toQueryParams(searchParams)
  const hookContext = (payload: Body): HookContext => ({
    sub_path: subPath,
    request: {method, query, headers: request.headers},
    identity,
    data_scope: dataScope,
    scope_entity: mount.scope.entity,
    payload
  })

  const parsedBody = parseBody(bodyBytes)
  let requestBody = parsedBody
  for (const hook of mount.hooks.get(rule.rule_id)?.pre ?? []) {
    const result = await hook.run(hookContext(requestBody))
    if (!result.ok) {
      logger.warn({
        event: 'pipeline.pre.aborted',
        component: COMPONENT,
        message: result.error.message,
        reason_code: result.error.code,
        metadata: {hook: hook.name}
      })
      throw new AppError({code: result.error.code, message: result.error.message, status: result.error.status ?? 400})
    }
    requestBody = result.payload
  }

  // a payload a pre-processor replaced is re-encoded; otherwise the caller's bytes are kept
  const outgoingBytes =
    requestBody === parsedBody ? bodyBytes : (serializeBody(requestBody).bytes ?? Buffer.alloc(0))

  const pipeline: Pipeline = {
    context,
    mount,
    rule,
    upstreamPath: rule.upstream_path ?? subPath,
    requestBody,
    outgoingBytes
  }

  if (rule.streaming) {
    await relay(pipeline)
    return
  }

  const upstream = await forward(pipeline)
  await respond({pipeline, upstream, hookContext})
}
