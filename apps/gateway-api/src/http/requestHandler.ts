import {type IncomingMessage, type ServerResponse} from 'node:http';
import {randomUUID} from 'node:crypto';

import {runWithLogContext, setLogContextFields} from '@relaygate/logging';

import {badRequest, isAppError} from '../errors';
import {extractCorrelationId, sendError} from '../http';
import {handleGatewayRoute} from './routes/gatewayRoute';
import {handleHealthRoute} from './routes/healthRoute';
import type {
  GatewayRouteHandler,
  GatewayRouteHandlers,
  GatewayRouteKind,
  GatewayRouteLogicHandler,
  RouteRuntime
} from './routes/types';

export const HEALTH_PATH = '/healthz';

const getRawRequestUrl = (request: IncomingMessage) => {
  const requestWithRoutingContext = request as IncomingMessage & {
    originalUrl?: string;
  };
  const originalUrl = requestWithRoutingContext.originalUrl;
  if (typeof originalUrl === 'string' && originalUrl.length > 0) {
    return originalUrl;
  }

  return request.url ?? '/';
};

const parseUrl = (request: IncomingMessage): URL | null => {
  const host = request.headers.host ?? 'localhost';
  try {
    return new URL(getRawRequestUrl(request), `http://${host}`);
  } catch {
    return null;
  }
};

/** The query exactly as the caller sent it; `URL#search` would re-encode it. */
const extractRawQuery = (rawUrl: string) => {
  const withoutFragment = rawUrl.split('#', 1)[0] ?? '';
  const queryIndex = withoutFragment.indexOf('?');
  return queryIndex === -1 ? '' : withoutFragment.slice(queryIndex + 1);
};

const sanitizeRouteForLog = ({rawUrl}: {rawUrl: string | undefined}) => {
  if (!rawUrl) {
    return '/';
  }

  const routeWithoutQuery = rawUrl.split('?', 1)[0] ?? '';
  const routeWithoutFragment = routeWithoutQuery.split('#', 1)[0] ?? '';
  return routeWithoutFragment.length > 0 ? routeWithoutFragment : '/';
};

export const resolveRouteKind = ({method, pathname}: {method: string; pathname: string}): GatewayRouteKind =>
  pathname === HEALTH_PATH && (method === 'GET' || method === 'HEAD') ? 'health' : 'gateway';

export const createGatewayRouteHandlers = (runtime: RouteRuntime): GatewayRouteHandlers => {
  const {logger, now} = runtime;

  const createRouteHandler = ({
    routeLogicHandler
  }: {
    routeLogicHandler: GatewayRouteLogicHandler;
  }): GatewayRouteHandler => {
    const executeRoute = (request: IncomingMessage, response: ServerResponse) => {
      const correlationId = extractCorrelationId(request);
      const requestId = randomUUID();
      const startedAtMs = now().getTime();
      const requestMethod = (request.method ?? 'GET').toUpperCase();

      return runWithLogContext(
        {
          correlation_id: correlationId,
          request_id: requestId,
          method: requestMethod
        },
        async () => {
          let pathname = '/';
          let responseReasonCode: string | undefined;

          logger.info({
            event: 'request.received',
            component: 'http.server',
            message: 'Request received',
            route: sanitizeRouteForLog({rawUrl: getRawRequestUrl(request)}),
            method: requestMethod
          });

          try {
            const url = parseUrl(request);
            if (!url) {
              throw badRequest('request_url_invalid', 'Request target is not a valid URL');
            }
            pathname = url.pathname;

            setLogContextFields({
              route: pathname,
              method: requestMethod
            });

            await routeLogicHandler({
              request,
              response,
              correlationId,
              method: requestMethod,
              pathname,
              rawQuery: extractRawQuery(getRawRequestUrl(request)),
              searchParams: url.searchParams,
              runtime
            });
          } catch (error) {
            if (response.headersSent) {
              responseReasonCode = isAppError(error) ? error.code : 'internal_error';
              logger.error({
                event: 'request.failed',
                component: 'http.server',
                message: 'Request failed after the response had started',
                reason_code: responseReasonCode,
                route: pathname,
                method: requestMethod,
                metadata: {
                  error
                }
              });
              response.end();
              return;
            }

            if (isAppError(error)) {
              responseReasonCode = error.code;
              logger.warn({
                event: 'request.rejected',
                component: 'http.server',
                message: `Request rejected: ${error.code}`,
                reason_code: error.code,
                route: pathname,
                method: requestMethod
              });

              sendError({
                response,
                status: error.status,
                error: error.code,
                message: error.message,
                correlationId
              });
              return;
            }

            responseReasonCode = 'internal_error';
            logger.error({
              event: 'request.failed',
              component: 'http.server',
              message: 'Unexpected internal error',
              reason_code: 'internal_error',
              route: pathname,
              method: requestMethod,
              metadata: {
                error
              }
            });

            sendError({
              response,
              status: 500,
              error: 'internal_error',
              message: 'Unexpected internal error',
              correlationId
            });
          } finally {
            const durationMs = Math.max(0, now().getTime() - startedAtMs);
            const statusCode = response.statusCode;
            const baseLog = {
              event: 'request.completed',
              component: 'http.server',
              message: 'Request completed',
              route: pathname,
              method: requestMethod,
              status_code: statusCode,
              duration_ms: durationMs,
              ...(responseReasonCode ? {reason_code: responseReasonCode} : {})
            };

            if (statusCode >= 500) {
              logger.error(baseLog);
            } else if (statusCode >= 400) {
              logger.warn(baseLog);
            } else {
              logger.info(baseLog);
            }
          }
        }
      );
    };

    return executeRoute;
  };

  return {
    health: createRouteHandler({routeLogicHandler: handleHealthRoute}),
    gateway: createRouteHandler({routeLogicHandler: handleGatewayRoute})
  };
};

/** Single entry point for every inbound request. */
export const createGatewayRequestHandler = (runtime: RouteRuntime): GatewayRouteHandler => {
  const handlers = createGatewayRouteHandlers(runtime);

  return (request, response) => {
    const pathname = parseUrl(request)?.pathname ?? '/';
    const kind = resolveRouteKind({method: (request.method ?? 'GET').toUpperCase(), pathname});
    return handlers[kind](request, response);
  };
};
