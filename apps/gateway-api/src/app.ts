import type {Server} from 'node:http'

import helmet from 'helmet'
import express from 'express'
import {NestFactory} from '@nestjs/core'
import {ExpressAdapter} from '@nestjs/platform-express'

import {createFileCredentialStore, type CredentialStore} from '@relaygate/credentials'
import type {FetchLike} from '@relaygate/forwarder'
import {createStructuredLogger, type StructuredLogger} from '@relaygate/logging'

import type {ServiceConfig} from './config'
import type {GatewayDefinition} from './definition'
import {createDefaultStreamTransports, createGateway, type StreamTransports} from './gateway'
import {createStaticIdentityResolver, type IdentityResolver} from './identity'
import {GatewayApiNestModule} from './nest/gatewayApiNestModule'
import type {ScopeStore} from './scopeStore'

export const SERVICE_NAME = 'gateway-api'

export const createGatewayLogger = (config: ServiceConfig) =>
  createStructuredLogger({
    service: SERVICE_NAME,
    env: config.nodeEnv,
    level: config.logLevel,
    extraSensitiveKeys: config.logRedactExtraKeys
  })

export const createGatewayApp = async ({
  config,
  definition,
  logger = createGatewayLogger(config),
  fetchImpl,
  streamTransports,
  identityResolver,
  scopeStore,
  credentialStore,
  now = () => new Date()
}: {
  config: ServiceConfig
  definition: GatewayDefinition
  logger?: StructuredLogger
  fetchImpl?: FetchLike
  streamTransports?: StreamTransports
  identityResolver?: IdentityResolver
  scopeStore?: ScopeStore
  credentialStore?: CredentialStore
  now?: () => Date
}) => {
  const store =
    credentialStore ??
    (config.credentialStorePath ? createFileCredentialStore({filePath: config.credentialStorePath}) : undefined)

  const gateway = createGateway({
    definition,
    config,
    logger,
    now,
    ...(fetchImpl ? {fetchImpl} : {}),
    ...(scopeStore ? {scopeStore} : {}),
    ...(store ? {credentialStore: store} : {})
  })

  const expressApp = express()
  expressApp.disable('x-powered-by')
  expressApp.use(
    helmet({
      contentSecurityPolicy: false
    })
  )

  const nestApp = await NestFactory.create(
    GatewayApiNestModule.register({
      config,
      gateway,
      logger,
      identityResolver: identityResolver ?? createStaticIdentityResolver(definition.callers),
      streamTransports: streamTransports ?? createDefaultStreamTransports(fetchImpl),
      now,
      ...(fetchImpl ? {fetchImpl} : {})
    }),
    new ExpressAdapter(expressApp),
    {
      bodyParser: false,
      logger: config.nodeEnv === 'test' ? false : ['error', 'warn', 'log']
    }
  )

  if (config.corsAllowedOrigins.length > 0) {
    nestApp.enableCors({
      origin: config.corsAllowedOrigins
    })
  }

  await nestApp.init()

  const server = nestApp.getHttpServer() as Server

  const start = async () => {
    await nestApp.listen(config.port, config.host)
    logger.info({
      event: 'process.started',
      component: 'process.entrypoint',
      message: `Gateway listening on ${config.host}:${config.port}`,
      metadata: {mounts: definition.mounts.map(mount => mount.prefix)}
    })
  }

  const stop = async () => {
    await nestApp.close()
  }

  return {
    server,
    start,
    stop,
    gateway
  }
}

export type GatewayApp = Awaited<ReturnType<typeof createGatewayApp>>
