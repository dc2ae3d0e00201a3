import 'reflect-metadata'

import {fileURLToPath} from 'node:url'

import {createStructuredLogger} from '@relaygate/logging'

import {createGatewayApp, createGatewayLogger, SERVICE_NAME} from './app'
import {loadConfig} from './config'
import {loadGatewayDefinition} from './definition'

export * from './app'
export * from './config'
export * from './definition'
export * from './errors'
export * from './gateway'
export * from './hooks'
export * from './http'
export * from './identity'
export * from './scopeStore'

const main = async () => {
  const config = loadConfig(process.env)
  const definition = await loadGatewayDefinition(config.definitionPath)
  const logger = createGatewayLogger(config)
  const app = await createGatewayApp({config, definition, logger})

  await app.start()

  const shutdown = async (signal: string) => {
    logger.info({
      event: 'process.stopping',
      component: 'process.entrypoint',
      message: `Received ${signal}, shutting down`
    })
    await app.stop()
    process.exit(0)
  }

  process.on('SIGINT', () => {
    void shutdown('SIGINT')
  })
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM')
  })
}

const isMainModule = (() => {
  const currentFile = fileURLToPath(import.meta.url)
  const entryFile = process.argv[1]
  if (!entryFile) {
    return false
  }

  return currentFile === entryFile
})()

if (isMainModule) {
  void main().catch(error => {
    const env = process.env.NODE_ENV === 'production' ? 'production' : process.env.NODE_ENV === 'test' ? 'test' : 'development'
    const startupLogger = createStructuredLogger({
      service: SERVICE_NAME,
      env,
      level: 'error'
    })
    startupLogger.fatal({
      event: 'process.startup.failed',
      component: 'process.entrypoint',
      message: 'Gateway startup failed',
      reason_code: 'startup_failed',
      metadata: {
        error
      }
    })
    process.exit(1)
  })
}
