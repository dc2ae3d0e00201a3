import {z} from 'zod'

import {LogLevelSchema, type LogLevel} from '@relaygate/logging'

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? value : parsed
}, z.number().int().positive())

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().optional())

const optionalLogLevel = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const normalized = value.trim().toLowerCase()
  return normalized.length === 0 ? undefined : normalized
}, LogLevelSchema.optional())

const parseCommaList = (raw: string | undefined) =>
  (raw ?? '')
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0)

const parseCorsAllowedOrigins = ({
  raw,
  envVarName
}: {
  raw: string | undefined
  envVarName: string
}) => {
  const origins = parseCommaList(raw)

  for (const origin of origins) {
    let parsed: URL
    try {
      parsed = new URL(origin)
    } catch {
      throw new Error(`${envVarName} contains an invalid URL origin: ${origin}`)
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new Error(`${envVarName} contains an unsupported origin protocol: ${origin}`)
    }
  }

  return origins
}

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    RELAYGATE_HOST: z.string().default('0.0.0.0'),
    RELAYGATE_PORT: numberFromEnv.default(8088),
    RELAYGATE_MAX_BODY_BYTES: numberFromEnv.default(10 * 1024 * 1024),
    RELAYGATE_LOG_LEVEL: optionalLogLevel,
    RELAYGATE_LOG_REDACT_EXTRA_KEYS: optionalString,
    RELAYGATE_DEFINITION_PATH: optionalString,
    RELAYGATE_CORS_ALLOWED_ORIGINS: optionalString,
    RELAYGATE_CREDENTIAL_STORE_PATH: optionalString
  })
  .strict()

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  host: string
  port: number
  maxBodyBytes: number
  logLevel: LogLevel
  logRedactExtraKeys: string[]
  definitionPath: string
  corsAllowedOrigins: string[]
  credentialStorePath?: string
  /** keyed by credential id as written in the definition, upper-cased */
  credentialPasswords: Record<string, string>
}

const CREDENTIAL_PASSWORD_PATTERN = /^RELAYGATE_CREDENTIAL_(.+)_PASSWORD$/u

/** `ai-search` and `AI_SEARCH` both name RELAYGATE_CREDENTIAL_AI_SEARCH_PASSWORD. */
export const toCredentialEnvKey = (credentialId: string) =>
  credentialId.toUpperCase().replace(/[^A-Z0-9]/gu, '_')

const collectCredentialPasswords = (env: NodeJS.ProcessEnv) => {
  const passwords: Record<string, string> = {}
  for (const [name, value] of Object.entries(env)) {
    const match = CREDENTIAL_PASSWORD_PATTERN.exec(name)
    const key = match?.[1]
    if (!key || typeof value !== 'string' || value.length === 0) {
      continue
    }

    passwords[key] = value
  }

  return passwords
}

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  RELAYGATE_HOST: env.RELAYGATE_HOST,
  RELAYGATE_PORT: env.RELAYGATE_PORT,
  RELAYGATE_MAX_BODY_BYTES: env.RELAYGATE_MAX_BODY_BYTES,
  RELAYGATE_LOG_LEVEL: env.RELAYGATE_LOG_LEVEL,
  RELAYGATE_LOG_REDACT_EXTRA_KEYS: env.RELAYGATE_LOG_REDACT_EXTRA_KEYS,
  RELAYGATE_DEFINITION_PATH: env.RELAYGATE_DEFINITION_PATH,
  RELAYGATE_CORS_ALLOWED_ORIGINS: env.RELAYGATE_CORS_ALLOWED_ORIGINS,
  RELAYGATE_CREDENTIAL_STORE_PATH: env.RELAYGATE_CREDENTIAL_STORE_PATH
})

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.parse(toEnvInput(env))

  const definitionPath = parsed.RELAYGATE_DEFINITION_PATH
  if (!definitionPath) {
    throw new Error('RELAYGATE_DEFINITION_PATH is required')
  }

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.RELAYGATE_HOST,
    port: parsed.RELAYGATE_PORT,
    maxBodyBytes: parsed.RELAYGATE_MAX_BODY_BYTES,
    logLevel: parsed.RELAYGATE_LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'silent' : 'info'),
    logRedactExtraKeys: parseCommaList(parsed.RELAYGATE_LOG_REDACT_EXTRA_KEYS),
    definitionPath,
    corsAllowedOrigins: parseCorsAllowedOrigins({
      raw: parsed.RELAYGATE_CORS_ALLOWED_ORIGINS,
      envVarName: 'RELAYGATE_CORS_ALLOWED_ORIGINS'
    }),
    ...(parsed.RELAYGATE_CREDENTIAL_STORE_PATH ? {credentialStorePath: parsed.RELAYGATE_CREDENTIAL_STORE_PATH} : {}),
    credentialPasswords: collectCredentialPasswords(env)
  }
}
