import type {IncomingMessage, ServerResponse} from 'node:http'

import type {FetchLike} from '@relaygate/forwarder'
import type {StructuredLogger} from '@relaygate/logging'

import type {ServiceConfig} from '../../config'
import type {Gateway, StreamTransports} from '../../gateway'
import type {IdentityResolver} from '../../identity'

export type RouteRuntime = {
  config: ServiceConfig
  gateway: Gateway
  logger: StructuredLogger
  identityResolver: IdentityResolver
  streamTransports: StreamTransports
  fetchImpl?: FetchLike
  now: () => Date
}

export type RouteHandlerContext = {
  request: IncomingMessage
  response: ServerResponse
  correlationId: string
  method: string
  pathname: string
  /** query string as sent, without the leading `?` */
  rawQuery: string
  searchParams: URLSearchParams
  runtime: RouteRuntime
}

export type GatewayRouteKind = 'health' | 'gateway'

export type GatewayRouteLogicHandler = (context: RouteHandlerContext) => void | Promise<void>

export type GatewayRouteHandler = (request: IncomingMessage, response: ServerResponse) => Promise<void>

export type GatewayRouteHandlers = Record<GatewayRouteKind, GatewayRouteHandler>
