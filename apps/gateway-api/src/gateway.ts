import {
  createCredentialManager,
  createInMemoryCredentialStore,
  type CredentialManager,
  type CredentialStore
} from '@relaygate/credentials'
import {
  createFetchStreamTransport,
  createNodeHttpStreamTransport,
  type FetchLike,
  type StreamTransport,
  type UpstreamTarget
} from '@relaygate/forwarder'
import {createNoopLogger, type StructuredLogger} from '@relaygate/logging'
import {createMountTable, createRuleRegistry, type MountTable, type RuleRegistry} from '@relaygate/policy-engine'

import {toCredentialEnvKey, type ServiceConfig} from './config'
import type {CredentialDefinition, GatewayDefinition, UpstreamDefinition} from './definition'
import {createBuiltinHook, createHookRegistry, type PostHook, type PreHook} from './hooks'
import {createInMemoryScopeStore, type ScopeStore} from './scopeStore'

export type RuleHooks = {
  pre: PreHook[]
  post: PostHook[]
}

export type GatewayMount = {
  id: string
  prefix: string
  upstream: UpstreamDefinition
  target: UpstreamTarget
  registry: RuleRegistry
  /** keyed by rule_id */
  hooks: ReadonlyMap<string, RuleHooks>
  credentials: CredentialManager | null
  scope: {entity: string; column: string}
}

export type StreamTransports = {
  primary: StreamTransport
  fallback: StreamTransport
}

export type Gateway = {
  mounts: MountTable<GatewayMount>
  credentials: ReadonlyMap<string, CredentialManager>
}

const toTarget = (upstream: UpstreamDefinition): UpstreamTarget => ({
  base_url: upstream.base_url,
  ...(upstream.timeouts ? {timeouts: upstream.timeouts} : {}),
  ...(upstream.limits ? {limits: upstream.limits} : {})
})

export const createDefaultStreamTransports = (fetchImpl?: FetchLike): StreamTransports => ({
  primary: createFetchStreamTransport(fetchImpl ? {fetchImpl} : {}),
  fallback: createNodeHttpStreamTransport()
})

const buildCredentialManager = ({
  credential,
  upstream,
  config,
  store,
  logger,
  fetchImpl,
  now
}: {
  credential: CredentialDefinition
  upstream: UpstreamDefinition
  config: ServiceConfig
  store: CredentialStore
  logger: StructuredLogger
  fetchImpl?: FetchLike
  now?: () => Date
}) => {
  const envKey = toCredentialEnvKey(credential.id)
  const password = config.credentialPasswords[envKey]
  if (!password) {
    throw new Error(`RELAYGATE_CREDENTIAL_${envKey}_PASSWORD is required for credential ${credential.id}`)
  }

  if (!credential.public_key_pem) {
    throw new Error(`Credential ${credential.id} has no public key loaded`)
  }

  const created = createCredentialManager({
    config: {
      identity: credential.identity,
      password,
      public_key_pem: credential.public_key_pem,
      ...(credential.nickname ? {nickname: credential.nickname} : {}),
      ...(credential.login_path ? {login_path: credential.login_path} : {}),
      ...(credential.register_path ? {register_path: credential.register_path} : {}),
      ...(credential.expiry_window_ms ? {expiry_window_ms: credential.expiry_window_ms} : {})
    },
    target: toTarget(upstream),
    store,
    logger,
    ...(fetchImpl ? {fetchImpl} : {}),
    ...(now ? {now} : {})
  })
  if (!created.ok) {
    throw new Error(`Credential ${credential.id} is invalid: ${created.error.message}`)
  }

  return created.value
}

/**
 * Builds the read-only routing state from a validated definition. One
 * credential manager exists per credential; it logs in against the first
 * upstream that names it.
 */
export const createGateway = ({
  definition,
  config,
  logger = createNoopLogger(),
  fetchImpl,
  scopeStore = createInMemoryScopeStore(definition.scoped_items),
  credentialStore = createInMemoryCredentialStore(),
  now
}: {
  definition: GatewayDefinition
  config: ServiceConfig
  logger?: StructuredLogger
  fetchImpl?: FetchLike
  scopeStore?: ScopeStore
  credentialStore?: CredentialStore
  now?: () => Date
}): Gateway => {
  const upstreams = new Map(definition.upstreams.map(upstream => [upstream.id, upstream] as const))
  const hookRegistry = createHookRegistry(
    definition.hooks.map(hookDefinition => createBuiltinHook({definition: hookDefinition, scopeStore, logger}))
  )

  const credentials = new Map<string, CredentialManager>()
  for (const credential of definition.credentials) {
    const upstream = definition.upstreams.find(candidate => candidate.credential === credential.id)
    if (!upstream) {
      continue
    }

    credentials.set(
      credential.id,
      buildCredentialManager({
        credential,
        upstream,
        config,
        store: credentialStore,
        logger,
        ...(fetchImpl ? {fetchImpl} : {}),
        ...(now ? {now} : {})
      })
    )
  }

  const mounts = definition.mounts.map((mount): GatewayMount => {
    const upstream = upstreams.get(mount.upstream)
    if (!upstream) {
      throw new Error(`Mount ${mount.id} names unknown upstream ${mount.upstream}`)
    }

    const registry = createRuleRegistry(mount.rules)
    if (!registry.ok) {
      throw new Error(`Mount ${mount.id} has invalid rules: ${registry.message}`)
    }

    const hooks = new Map(
      registry.registry.rules.map((rule): [string, RuleHooks] => [
        rule.rule_id,
        {pre: hookRegistry.resolvePre(rule.pre_processors), post: hookRegistry.resolvePost(rule.post_processors)}
      ])
    )

    return {
      id: mount.id,
      prefix: mount.prefix,
      upstream,
      target: toTarget(upstream),
      registry: registry.registry,
      hooks,
      credentials: upstream.credential ? (credentials.get(upstream.credential) ?? null) : null,
      scope: {
        entity: mount.data_scope?.entity ?? mount.id,
        column: mount.data_scope?.scope_column ?? 'scope_id'
      }
    }
  })

  return {mounts: createMountTable(mounts), credentials}
}
